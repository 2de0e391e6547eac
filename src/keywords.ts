/**
 * Case-insensitive substring match. Returns the keywords found in `text`, in
 * configured order and original spelling. Blank keywords never match.
 */
export function matchKeywords(text: string, keywords: readonly string[]): string[] {
  if (keywords.length === 0) return [];
  const haystack = text.toLowerCase();
  return keywords.filter((k) => k.length > 0 && haystack.includes(k.toLowerCase()));
}
