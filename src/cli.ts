#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { formatDuration, intervalToDuration } from 'date-fns';
import {
  AppConfig,
  ConfigError,
  createEnvTemplate,
  DEFAULT_TEMPLATE_FILE,
  formatConfigSummary,
  loadConfig,
} from './config';
import { createSyncManagerFromConfig, SyncManager } from './services/syncManager';
import { getTimeUntilNextSync } from './utils/dateUtils';
import { configureLogging, createLogger } from './utils/logger';

const logger = createLogger('cli');

const VERSION = '1.0.0';

interface GlobalOptions {
  config?: string;
  envFile?: string;
}

export interface CliDeps {
  loadConfig: (options: GlobalOptions) => AppConfig;
  createManager: (config: AppConfig) => Promise<SyncManager>;
  print: (line: string) => void;
  printError: (line: string) => void;
}

const defaultDeps: CliDeps = {
  loadConfig: (options) => loadConfig({ configPath: options.config, envFile: options.envFile }),
  createManager: createSyncManagerFromConfig,
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
};

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return parsed;
};

const icon = (ok: boolean): string => (ok ? '✅' : '❌');

const SERVICE_LABELS: Record<string, string> = {
  leetcode: 'LeetCode',
  googleSheets: 'Google Sheets',
};

export const buildProgram = (overrides: Partial<CliDeps> = {}): Command => {
  const deps: CliDeps = { ...defaultDeps, ...overrides };
  const { print, printError } = deps;
  const program = new Command();

  const globals = (): GlobalOptions => program.opts<GlobalOptions>();

  const readConfig = (): AppConfig => {
    const config = deps.loadConfig(globals());
    configureLogging({ level: config.logging.level, file: config.logging.file, timezone: config.sync.timezone });
    return config;
  };

  // Loads config, builds the sync manager and turns the outcome into an exit code
  const run = async (failure: string, action: (manager: SyncManager, config: AppConfig) => Promise<boolean>) => {
    try {
      const config = readConfig();
      const manager = await deps.createManager(config);
      const ok = await action(manager, config);
      process.exitCode = ok ? 0 : 1;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      printError(error instanceof ConfigError ? `❌ ${message}` : `❌ ${failure}: ${message}`);
      process.exitCode = 1;
    }
  };

  const printSyncSummary = async (manager: SyncManager): Promise<void> => {
    const { syncStats } = await manager.getSyncStatus();
    print('');
    print('📊 Sync Summary:');
    print(`   Total Problems: ${syncStats.totalProblems}`);
    print(`   New Problems: ${syncStats.newProblems}`);
    print(`   Last Sync: ${syncStats.lastSync ?? 'Unknown'}`);
  };

  program
    .name('leetcode-tracker')
    .description('Sync solved LeetCode problems and progress analytics to Google Sheets')
    .version(VERSION)
    .option('-c, --config <path>', 'JSON configuration file')
    .option('-e, --env-file <path>', 'environment file to load (default: .env)');

  program
    .command('test')
    .description('Test connections to LeetCode and Google Sheets')
    .action(() =>
      run('Connection test failed', async (manager) => {
        print('🔍 Testing connections...');
        const results = await manager.testConnections();

        print('');
        print('=== Connection Test Results ===');
        for (const [service, ok] of Object.entries(results)) {
          print(`${icon(ok)} ${SERVICE_LABELS[service] ?? service}: ${ok ? 'PASSED' : 'FAILED'}`);
        }

        const allOk = Object.values(results).every(Boolean);
        print('');
        print(allOk ? '🎉 All connections successful!' : '⚠️  Some connections failed. Please check your configuration.');
        return allOk;
      }),
    );

  program
    .command('sync')
    .description('Synchronize LeetCode data to Google Sheets')
    .option('--force-full', 'ignore the last sync time and fetch everything', false)
    .option('--incremental', 'only add problems missing from the spreadsheet', false)
    .action((options: { forceFull: boolean; incremental: boolean }) =>
      run('Synchronization error', async (manager) => {
        print('🔄 Starting data synchronization...');
        let ok: boolean;
        if (options.incremental) {
          print('📈 Performing incremental synchronization...');
          ok = await manager.incrementalSync();
        } else {
          print('📊 Performing full synchronization...');
          ok = await manager.syncAllData(options.forceFull);
        }

        if (!ok) {
          print('❌ Synchronization failed!');
          return false;
        }
        print('✅ Synchronization completed successfully!');
        await printSyncSummary(manager);
        return true;
      }),
    );

  program
    .command('status')
    .description('Show current synchronization status')
    .action(() =>
      run('Failed to get status', async (manager) => {
        print('📊 Getting synchronization status...');
        const status = await manager.getSyncStatus();
        const { syncStats } = status;

        print('');
        print('=== LeetCode Tracker Status ===');
        print('');
        print('🔌 Connections:');
        for (const [service, ok] of Object.entries(status.connections)) {
          print(`   ${icon(ok)} ${SERVICE_LABELS[service] ?? service}`);
        }
        print('');
        print('📈 Sync Statistics:');
        print(`   Total Problems: ${syncStats.totalProblems}`);
        print(`   New Problems: ${syncStats.newProblems}`);
        print(`   Updated Problems: ${syncStats.updatedProblems}`);
        print(`   Errors: ${syncStats.errors}`);
        print(`   Last Sync: ${syncStats.lastSync ?? 'Never'}`);
        print('');
        print(`🔧 Configuration: ${icon(status.configLoaded)}`);
        return true;
      }),
    );

  program
    .command('backup')
    .description('Write the Problems worksheet to a JSON backup file')
    .option('-p, --path <path>', 'backup file path')
    .action((options: { path?: string }) =>
      run('Backup error', async (manager) => {
        print('💾 Creating data backup...');
        const written = await manager.backupData(options.path);
        print(written ? `✅ Backup created: ${written}` : '❌ Backup creation failed!');
        return written !== null;
      }),
    );

  program
    .command('restore')
    .description('Rewrite the spreadsheet from a backup file')
    .argument('<backupPath>', 'backup file to restore')
    .action((backupPath: string) =>
      run('Restore error', async (manager) => {
        print(`🔄 Restoring data from backup: ${backupPath}`);
        const ok = await manager.restoreData(backupPath);
        print(ok ? '✅ Data restored successfully!' : '❌ Data restoration failed!');
        return ok;
      }),
    );

  program
    .command('cleanup')
    .description('Drop problems solved before the retention window')
    .option('-d, --days <days>', 'days of data to keep', parsePositiveInt, 365)
    .action((options: { days: number }) =>
      run('Cleanup error', async (manager) => {
        print(`🧹 Cleaning up data older than ${options.days} days...`);
        const ok = await manager.cleanupOldData(options.days);
        print(ok ? '✅ Data cleanup completed successfully!' : '❌ Data cleanup failed!');
        return ok;
      }),
    );

  program
    .command('setup')
    .description('Create an environment template file')
    .option('-o, --output <path>', 'template file path', DEFAULT_TEMPLATE_FILE)
    .action((options: { output: string }) => {
      try {
        createEnvTemplate(options.output);
        print(`✅ Environment template created at ${options.output}`);
        print(`📝 Please copy ${options.output} to .env and fill in your values`);
        process.exitCode = 0;
      } catch (error) {
        printError(`❌ Failed to create environment template: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      }
    });

  program
    .command('config')
    .description('Print the resolved configuration')
    .action(() => {
      try {
        print(formatConfigSummary(readConfig()));
        process.exitCode = 0;
      } catch (error) {
        printError(`❌ ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      }
    });

  program
    .command('schedule')
    .description('Run an incremental sync now and then once per SYNC_INTERVAL until interrupted')
    .action(() =>
      run('Scheduler error', async (manager, config) => {
        const { interval, timezone } = config.sync;
        let stopped = false;
        let timer: NodeJS.Timeout | undefined;
        let wake: (() => void) | undefined;

        process.once('SIGINT', () => {
          stopped = true;
          clearTimeout(timer);
          wake?.();
          print('');
          print('⚠️  Scheduler stopped by user');
        });

        print(`⏰ Scheduling ${interval} synchronization`);
        while (!stopped) {
          const ok = await manager.incrementalSync();
          print(ok ? '✅ Scheduled sync completed' : '❌ Scheduled sync failed');
          if (stopped) break;

          const delay = getTimeUntilNextSync(interval, timezone);
          print(`⏳ Next sync in ${formatDuration(intervalToDuration({ start: 0, end: delay }))}`);
          await new Promise<void>((resolve) => {
            wake = resolve;
            timer = setTimeout(resolve, delay);
          });
        }
        return true;
      }),
    );

  return program;
};

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error('Unexpected CLI failure', error);
      console.error(`❌ Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    });
}
