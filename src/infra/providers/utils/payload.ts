export type JsonObject = Record<string, unknown>;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Accepts numbers and numeric strings; anything else (including empty strings and NaN) is null.
 */
export const readNumber = (source: JsonObject, key: string): number | null => {
  const raw = source[key];
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }

  if (typeof raw === "string" && raw.trim()) {
    const parsed = Number(raw.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
};

export const readString = (
  source: JsonObject,
  key: string,
): string | undefined => {
  const raw = source[key];
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

export const readObjects = (value: unknown): JsonObject[] | null =>
  Array.isArray(value) ? value.filter(isJsonObject) : null;

export const readNumbers = (source: JsonObject, key: string): number[] | null => {
  const raw = source[key];
  if (!Array.isArray(raw)) {
    return null;
  }

  return raw.map((value) =>
    typeof value === "number" && Number.isFinite(value) ? value : Number.NaN,
  );
};
