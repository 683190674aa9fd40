/**
 * Shared CLI utilities.
 */

/**
 * Print a usage error and exit with code 2.
 */
export function usageError(message: string, usage: string): void {
  console.error(`Error: ${message}`);
  console.log(`Usage: ${usage.split('\n')[0]}`);
  process.exit(2);
}

/**
 * Parse a whole decimal integer, or undefined if `value` is not one.
 */
export function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || !/^[+-]?\d+$/.test(value.trim())) return undefined;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Parse a comma-separated list of integers, or undefined if any item is not one.
 */
export function parseIntegerList(value: string | undefined): number[] | undefined {
  if (value === undefined) return undefined;
  const items = splitList(value);
  const numbers: number[] = [];
  for (const item of items) {
    const parsed = parseInteger(item);
    if (parsed === undefined) return undefined;
    numbers.push(parsed);
  }
  return numbers;
}

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
