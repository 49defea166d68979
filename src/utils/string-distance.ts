/**
 * Fuzzy matching used for "did you mean" hints on unknown deployment names.
 */

/**
 * Levenshtein edit distance, single-row variant.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
  let curr = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      curr[j] = Math.min(curr[j - 1] + 1, prev[j] + 1, prev[j - 1] + cost);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[b.length];
}

/**
 * Short names get a tighter threshold so "qa" does not suggest "prod".
 */
function maxDistanceFor(target: string): number {
  if (target.length <= 3) return 1;
  if (target.length <= 6) return 2;
  return 3;
}

/**
 * Candidates within the edit-distance threshold, closest first. Ties keep
 * the candidates' original order.
 */
export function suggestNames(target: string, candidates: Iterable<string>, maxDistance?: number): string[] {
  const limit = maxDistance ?? maxDistanceFor(target);
  const scored: Array<{ name: string; distance: number }> = [];

  for (const name of candidates) {
    if (name === target) continue;
    const distance = levenshteinDistance(target.toLowerCase(), name.toLowerCase());
    if (distance <= limit) {
      scored.push({ name, distance });
    }
  }

  return scored.sort((x, y) => x.distance - y.distance).map((s) => s.name);
}
