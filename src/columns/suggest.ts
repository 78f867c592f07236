export const MAX_SUGGESTIONS = 3;

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost
      );
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Closest configured options to `input`: substring matches (either way,
 * case-insensitive) rank first, then by edit distance on lowercased text.
 * Ties keep configuration order. Never empty while `options` is non-empty.
 */
export function suggestOptions(input: string, options: readonly string[], limit = MAX_SUGGESTIONS): string[] {
  const needle = input.trim().toLowerCase();

  const ranked = options.map((option, index) => {
    const candidate = option.toLowerCase();
    const contains = needle.length > 0 && (candidate.includes(needle) || needle.includes(candidate));
    return {
      option,
      index,
      contains,
      distance: levenshtein(needle, candidate),
    };
  });

  ranked.sort((x, y) => {
    if (x.contains !== y.contains) return x.contains ? -1 : 1;
    if (x.distance !== y.distance) return x.distance - y.distance;
    return x.index - y.index;
  });

  const seen = new Set<string>();
  const result: string[] = [];
  for (const entry of ranked) {
    if (seen.has(entry.option)) continue;
    seen.add(entry.option);
    result.push(entry.option);
    if (result.length >= limit) break;
  }
  return result;
}
