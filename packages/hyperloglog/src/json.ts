/**
 * `JSON.stringify` that also accepts bigints, rendered as `"<digits>n"`
 * strings.
 */
export function stringifyJSON(item: unknown): string | undefined {
  return JSON.stringify(item, bigintReplacer);
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? `${value}n` : value;
}
