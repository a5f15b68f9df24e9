export function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new Error(`Option --${flagName} must be a positive number.`);
  }
  return Math.floor(parsed);
}
