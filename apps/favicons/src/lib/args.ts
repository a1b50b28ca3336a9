/**
 * Value of a `--name=value` flag. Everything after the first `=` belongs
 * to the value, so paths may contain `=`.
 */
export function getFlagValue(
  args: string[],
  name: string,
): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find(a => a.startsWith(prefix));
  return arg === undefined ? undefined : arg.slice(prefix.length);
}
