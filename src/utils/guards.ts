/**
 * Plain JSON object check used when narrowing request bodies and fixture files
 */
export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
