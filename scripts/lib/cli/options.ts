/** `--key value` pairs; bare flags listed in `flags` are taken out first. */
export function parseCliOptionMap(args: string[], flags: string[] = []): Map<string, string> {
  const options = new Map<string, string>();
  const remaining = args.filter((arg) => !flags.includes(arg));

  for (let index = 0; index < remaining.length; index += 1) {
    const keyToken = remaining[index];
    if (!keyToken.startsWith('--')) {
      throw new Error(`Unexpected argument '${keyToken}'. Expected --key value pairs`);
    }

    const key = keyToken.slice(2).trim();
    if (!key) {
      throw new Error(`Invalid option '${keyToken}'`);
    }

    const value = remaining[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for option '--${key}'`);
    }

    options.set(key, value);
    index += 1;
  }

  return options;
}
