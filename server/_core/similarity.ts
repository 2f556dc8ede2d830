/**
 * String similarity helpers used by the matchers.
 */

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost,
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/** 1 - distance / longer length, in [0, 1]. */
export function levenshteinSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (!a.length || !b.length) return 0;
  return 1 - levenshteinDistance(a, b) / Math.max(a.length, b.length);
}

function sortTokens(value: string): string {
  return value.split(" ").filter(Boolean).sort().join(" ");
}

/**
 * Similarity of two already-normalized names, tolerant of word order
 * ("james lebron" vs "lebron james").
 */
export function nameSimilarity(a: string, b: string): number {
  return Math.max(levenshteinSimilarity(a, b), levenshteinSimilarity(sortTokens(a), sortTokens(b)));
}
