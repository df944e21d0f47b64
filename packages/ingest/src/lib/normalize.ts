export const normalizeWhitespace = (value: string) =>
  value.replace(/\s+/g, " ").trim();

// Lowercased, whitespace-collapsed text; the basis for content hashes.
export const normalizeText = (value: string) =>
  normalizeWhitespace(value).toLowerCase();

export const slugify = (value: string) =>
  normalizeText(value).replace(/ /g, "-");

export const titleCase = (value: string) =>
  normalizeWhitespace(value)
    .toLowerCase()
    .replace(/(^|[\s'-])(\p{L})/gu, (_, separator: string, letter: string) =>
      `${separator}${letter.toUpperCase()}`);

export const emptyToNull = (value: string | null | undefined) => {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
};

const QUOTE_MARKS = /^[\s"“”«»]+|[\s"“”«»]+$/g;

export const stripQuoteMarks = (value: string) => value.replace(QUOTE_MARKS, "");
