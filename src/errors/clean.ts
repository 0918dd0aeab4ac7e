const ERROR_PREFIX = 'ERROR: ';

/**
 * Reduces bq diagnostic output to its first meaningful line.
 */
export function cleanErrorOutput(errorText: string): string {
  let cleaned = errorText.trim();

  if (cleaned.startsWith(ERROR_PREFIX)) {
    cleaned = cleaned.slice(ERROR_PREFIX.length);
  }

  const lines = cleaned
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('WARNING'));

  return lines[0] ?? cleaned;
}
