const DAY_PREFIX = /^(mon|tue|wed|thu|fri|sat|sun)/i;

/** Sheet names this tool writes itself; never read back as input. */
export const OUTPUT_SHEETS = ['total', 'max'] as const;

/**
 * Day sheets in stored order. Stored order is the chronological order,
 * so 'tue6', 'wed6', 'THU6' stay as they are even though they don't sort.
 */
export function selectDaySheets(sheetNames: readonly string[]): string[] {
  return sheetNames.filter(name => {
    const lower = name.toLowerCase();
    return DAY_PREFIX.test(name) && !OUTPUT_SHEETS.some(out => out === lower);
  });
}
