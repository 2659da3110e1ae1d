// Leading number followed by an optional unit: "45 ms", "12.3MB", "83%", "1.5 s"
const SUFFIXED_NUMBER = /^([-+]?\d+(?:\.\d+)?|[-+]?\.\d+)\s*(%|ms|s|kb|mb|gb)?$/i;

/**
 * Parses LeetCode's display values ("52 ms", "17.4 MB", "53.2%") into numbers.
 * Anything that is not a finite number or a recognised suffixed string gives 0.
 */
export const parseNumericValue = (value: unknown): number => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value !== 'string') return 0;

  const match = SUFFIXED_NUMBER.exec(value.trim());
  if (!match) return 0;
  const parsed = Number.parseFloat(match[1]);
  return Number.isFinite(parsed) ? parsed : 0;
};

export const clamp = (value: number, min: number, max: number): number => {
  return Math.min(max, Math.max(min, value));
};

// Share of `part` in `total`, 0 when there is nothing to divide by
export const ratio = (part: number, total: number): number => {
  return total > 0 ? part / total : 0;
};
