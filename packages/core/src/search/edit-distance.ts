/**
 * String distance helpers for approximate matching.
 */

/**
 * Levenshtein edit distance between two strings, in O(min(m, n)) space.
 */
export function editDistance(a: string, b: string): number {
  if (a.length > b.length) {
    return editDistance(b, a);
  }

  const m = a.length;
  const n = b.length;

  let previousRow = new Array<number>(m + 1);
  let currentRow = new Array<number>(m + 1);

  for (let j = 0; j <= m; j++) {
    previousRow[j] = j;
  }

  for (let i = 1; i <= n; i++) {
    currentRow[0] = i;

    for (let j = 1; j <= m; j++) {
      const cost = a[j - 1] === b[i - 1] ? 0 : 1;

      const deletion = (previousRow[j] ?? 0) + 1;
      const insertion = (currentRow[j - 1] ?? 0) + 1;
      const substitution = (previousRow[j - 1] ?? 0) + cost;

      currentRow[j] = Math.min(deletion, insertion, substitution);
    }

    [previousRow, currentRow] = [currentRow, previousRow];
  }

  return previousRow[m] ?? 0;
}

/**
 * `1 - distance / maxLen` when the strings are within `maxDistance` edits,
 * otherwise 0.
 */
export function boundedSimilarity(a: string, b: string, maxDistance: number): number {
  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) {
    return 1;
  }
  // The distance is at least the length difference.
  if (Math.abs(a.length - b.length) > maxDistance) {
    return 0;
  }
  const distance = editDistance(a, b);
  return distance <= maxDistance ? 1 - distance / maxLen : 0;
}

/**
 * How tightly `query` occurs in `text` as a subsequence: the query length
 * over the shortest span of `text` holding the query characters in order.
 * Returns 0 when the characters do not all occur.
 */
export function subsequenceScore(query: string, text: string): number {
  if (query.length === 0 || query.length > text.length) {
    return 0;
  }

  let shortest = Infinity;

  for (let start = text.indexOf(query.charAt(0)); start !== -1; start = text.indexOf(query.charAt(0), start + 1)) {
    let q = 1;
    let i = start + 1;
    while (q < query.length && i < text.length) {
      if (text[i] === query[q]) {
        q++;
      }
      i++;
    }
    if (q < query.length) {
      // No later start can complete either.
      break;
    }
    shortest = Math.min(shortest, i - start);
    if (shortest === query.length) {
      break;
    }
  }

  return shortest === Infinity ? 0 : query.length / shortest;
}
