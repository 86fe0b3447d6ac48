// Pictographs plus the joiners/modifiers that only make sense inside emoji sequences.
const pictographicPattern =
  /[\p{Extended_Pictographic}\p{Emoji_Modifier}\p{Regional_Indicator}\u200D\uFE0E\uFE0F\u20E3]/gu;
const controlPattern = /[\p{Cc}\p{Cf}]/gu;
const whitespacePattern = /\s+/g;

/**
 * Reduces any scalar to printable single-line text. Never returns a string
 * longer than the input text.
 */
export const sanitizeText = (value: unknown): string => {
  if (value == null) return "";
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "";
  if (typeof value === "boolean") return String(value);
  if (typeof value !== "string") return "";

  return value
    .replace(pictographicPattern, "")
    .replace(whitespacePattern, " ")
    .replace(controlPattern, "")
    .replace(/ {2,}/g, " ")
    .trim();
};

export const sanitizeCount = (value: unknown): string =>
  typeof value === "number" && Number.isFinite(value) ? String(value) : "";

const pad2 = (value: number) => String(value).padStart(2, "0");

/** ISO timestamps become DD/MM/YYYY (UTC); anything else is kept as sanitized text. */
export const formatApiDate = (value: unknown): string => {
  const text = sanitizeText(value);
  if (!/^\d{4}-\d{2}-\d{2}T/.test(text)) return text;

  const parsed = new Date(text);
  if (Number.isNaN(parsed.getTime())) return text;

  return `${pad2(parsed.getUTCDate())}/${pad2(parsed.getUTCMonth() + 1)}/${parsed.getUTCFullYear()}`;
};
