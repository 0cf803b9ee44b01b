/**
 * String similarity scores on a 0-100 scale
 */

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
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

export function ratio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 0;
  return Math.round((1 - levenshtein(a, b) / longest) * 1000) / 10;
}

/** Word order does not matter: tokens are sorted before comparison */
export function tokenSortRatio(a: string[], b: string[]): number {
  const left = [...a].sort().join(' ');
  const right = [...b].sort().join(' ');
  return ratio(left, right);
}
