import fs from 'node:fs/promises';
import { google, sheets_v4 } from 'googleapis';
import { z } from 'zod';
import { createLogger } from '../utils/logger';

const logger = createLogger('sheets.gateway');

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets', 'https://www.googleapis.com/auth/drive'];

export type CellValue = string | number | boolean;

export interface CellRange {
  startRow: number; // 0-based, inclusive
  endRow: number; // exclusive
  startColumn: number;
  endColumn: number;
}

export type RangeFormat = 'header' | 'percent';

// The handful of spreadsheet operations the sheets client needs
export interface SpreadsheetGateway {
  getTitle: () => Promise<string>;
  listSheetTitles: () => Promise<string[]>;
  addSheet: (title: string, rowCount: number, columnCount: number) => Promise<void>;
  clearSheet: (title: string) => Promise<void>;
  // `range` in A1 notation without the sheet name, e.g. "A2:H10"
  writeRows: (title: string, range: string, rows: CellValue[][]) => Promise<void>;
  formatRange: (title: string, range: CellRange, format: RangeFormat) => Promise<void>;
  readRows: (title: string) => Promise<CellValue[][]>;
}

export interface GoogleSheetsGatewayOptions {
  spreadsheetId: string;
  credentialsPath?: string;
  credentialsJson?: string;
}

const ServiceAccountSchema = z.object({
  client_email: z.string(),
  private_key: z.string(),
  project_id: z.string().optional(),
});

export type ServiceAccountCredentials = z.infer<typeof ServiceAccountSchema>;

export const parseServiceAccount = (json: string): ServiceAccountCredentials => {
  return ServiceAccountSchema.parse(JSON.parse(json));
};

const loadCredentials = async (options: GoogleSheetsGatewayOptions): Promise<ServiceAccountCredentials> => {
  if (options.credentialsJson) {
    logger.info('Authenticating with Google Sheets using inline JSON credentials');
    return parseServiceAccount(options.credentialsJson);
  }
  if (options.credentialsPath) {
    logger.info(`Authenticating with Google Sheets using ${options.credentialsPath}`);
    return parseServiceAccount(await fs.readFile(options.credentialsPath, 'utf-8'));
  }
  throw new Error('Either credentialsPath or credentialsJson must be provided');
};

const quoteSheet = (title: string): string => `'${title.replace(/'/g, "''")}'`;

const toCell = (value: unknown): CellValue => {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  return value === null || value === undefined ? '' : String(value);
};

const FORMATS: Record<RangeFormat, { cell: sheets_v4.Schema$CellFormat; fields: string }> = {
  header: {
    cell: {
      textFormat: { bold: true },
      backgroundColor: { red: 0.8, green: 0.8, blue: 0.8 },
    },
    fields: 'userEnteredFormat(textFormat,backgroundColor)',
  },
  percent: {
    cell: { numberFormat: { type: 'PERCENT', pattern: '0.0%' } },
    fields: 'userEnteredFormat.numberFormat',
  },
};

/**
 * Google Sheets v4 implementation of SpreadsheetGateway, authenticated as a
 * service account.
 */
export const createGoogleSheetsGateway = async (
  options: GoogleSheetsGatewayOptions,
): Promise<SpreadsheetGateway> => {
  const credentials = await loadCredentials(options);
  const auth = new google.auth.GoogleAuth({ credentials, scopes: SCOPES });
  const sheets = google.sheets({ version: 'v4', auth });
  const { spreadsheetId } = options;

  const sheetIds = new Map<string, number>();

  const loadSheets = async (): Promise<sheets_v4.Schema$Sheet[]> => {
    const response = await sheets.spreadsheets.get({ spreadsheetId, fields: 'properties.title,sheets.properties' });
    const list = response.data.sheets ?? [];
    for (const sheet of list) {
      const title = sheet.properties?.title;
      const sheetId = sheet.properties?.sheetId;
      if (title && typeof sheetId === 'number') sheetIds.set(title, sheetId);
    }
    return list;
  };

  const sheetIdFor = async (title: string): Promise<number> => {
    if (!sheetIds.has(title)) await loadSheets();
    const id = sheetIds.get(title);
    if (id === undefined) throw new Error(`Worksheet not found: ${title}`);
    return id;
  };

  return {
    getTitle: async () => {
      const response = await sheets.spreadsheets.get({ spreadsheetId, fields: 'properties.title' });
      return response.data.properties?.title ?? '';
    },

    listSheetTitles: async () => {
      const list = await loadSheets();
      return list.map((sheet) => sheet.properties?.title ?? '').filter(Boolean);
    },

    addSheet: async (title, rowCount, columnCount) => {
      const response = await sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: [{ addSheet: { properties: { title, gridProperties: { rowCount, columnCount } } } }],
        },
      });
      const sheetId = response.data.replies?.[0]?.addSheet?.properties?.sheetId;
      if (typeof sheetId === 'number') sheetIds.set(title, sheetId);
    },

    clearSheet: async (title) => {
      await sheets.spreadsheets.values.clear({ spreadsheetId, range: quoteSheet(title) });
    },

    writeRows: async (title, range, rows) => {
      await sheets.spreadsheets.values.update({
        spreadsheetId,
        range: `${quoteSheet(title)}!${range}`,
        valueInputOption: 'RAW',
        requestBody: { values: rows },
      });
    },

    formatRange: async (title, range, format) => {
      const sheetId = await sheetIdFor(title);
      const { cell, fields } = FORMATS[format];
      await sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: {
          requests: [
            {
              repeatCell: {
                range: {
                  sheetId,
                  startRowIndex: range.startRow,
                  endRowIndex: range.endRow,
                  startColumnIndex: range.startColumn,
                  endColumnIndex: range.endColumn,
                },
                cell: { userEnteredFormat: cell },
                fields,
              },
            },
          ],
        },
      });
    },

    readRows: async (title) => {
      const response = await sheets.spreadsheets.values.get({ spreadsheetId, range: quoteSheet(title) });
      const values: unknown[][] = response.data.values ?? [];
      return values.map((row) => row.map(toCell));
    },
  };
};
