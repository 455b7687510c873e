/**
 * Read the value following `--<name>` in an argument list
 */
export function getFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(`--${name}`);
  const value = index >= 0 ? args[index + 1] : undefined;
  return value !== undefined && !value.startsWith('--') ? value : undefined;
}

/**
 * Read a positive integer flag
 *
 * @throws Error if the flag is present but not a positive integer
 */
export function getIntFlag(args: string[], name: string): number | undefined {
  const raw = getFlag(args, name);
  if (raw === undefined) {
    return undefined;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}
