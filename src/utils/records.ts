export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const readText = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
};

// Reads `{ text: "..." }` wrappers as well as plain strings.
export const readTextField = (node: Record<string, unknown>, key: string): string | undefined => {
  const value = node[key];
  if (isRecord(value)) return readText(value.text);
  return readText(value);
};
