const NAMED_ENTITIES: Record<string, string> = {
  nbsp: " ",
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  mdash: "—",
  ndash: "–",
  hellip: "…",
};

export function normalizeWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x?[0-9a-f]+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#")) {
      const hex = entity[1] === "x" || entity[1] === "X";
      const codePoint = Number.parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
      return Number.isFinite(codePoint) && codePoint > 0 && codePoint <= 0x10ffff
        ? String.fromCodePoint(codePoint)
        : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

// Keeps paragraph breaks; everything else collapses to single spaces.
export function stripMarkup(text: string): string {
  // Decoded first so escaped tags are stripped too.
  const plain = decodeEntities(text)
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/p>/gi, "\n")
    .replace(/<[^>]*>/g, "")
    .replace(/~!|!~/g, "")
    .replace(/\[Written by [^\]]*\]/gi, "");

  return plain
    .split("\n")
    .map((line) => normalizeWhitespace(line))
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function toEnumToken(value: string): string {
  return normalizeWhitespace(value)
    .toUpperCase()
    .replace(/[\s-]+/g, "_");
}
