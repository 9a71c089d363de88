/**
 * Small text helpers shared by the registry, invoker and aggregator.
 */

/** Case- and punctuation-insensitive key for dependency name matching */
export function normalizeName(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

/** Locale-independent ordering by UTF-16 code units */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Keep at most `maxWords` words, marking the cut with an ellipsis */
export function truncateWords(text: string, maxWords: number): string {
  const words = collapseWhitespace(text).split(" ");
  if (words.length <= maxWords) {
    return words.join(" ");
  }
  return `${words.slice(0, maxWords).join(" ")}...`;
}

export function truncateChars(text: string, maxChars: number): string {
  const collapsed = collapseWhitespace(text);
  if (collapsed.length <= maxChars) {
    return collapsed;
  }
  return `${collapsed.slice(0, maxChars - 3).trimEnd()}...`;
}

export function splitSentences(text: string): string[] {
  return collapseWhitespace(text)
    .split(/(?<=[.!?])\s+/)
    .filter((sentence) => sentence.length > 0);
}

export function firstSentences(text: string, count: number): string {
  return splitSentences(text).slice(0, count).join(" ");
}
