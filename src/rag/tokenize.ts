const WORD = /[\p{L}\p{N}]+/gu;

/** Lower-cased letter/digit runs, in order, duplicates kept. */
export function wordTokens(text: string): string[] {
  return text.toLowerCase().match(WORD) ?? [];
}

export function tokenSet(text: string): Set<string> {
  return new Set(wordTokens(text));
}
