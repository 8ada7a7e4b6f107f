export interface SimilarityMatch {
  candidate: string;
  score: number;
  /** Position of `candidate` in the input sequence. */
  index: number;
}

export const DEFAULT_SIMILARITY_CUTOFF = 0.8;

/**
 * Ratcliff/Obershelp similarity: twice the number of characters in matching
 * blocks divided by the combined length. 1.0 means identical.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * countMatchingCharacters(a, b)) / total;
}

/**
 * Highest-scoring candidate whose ratio against `reference` is at least
 * `cutoff`. Ties go to the earliest candidate.
 */
export function bestMatch(
  reference: string,
  candidates: readonly string[],
  cutoff: number = DEFAULT_SIMILARITY_CUTOFF,
): SimilarityMatch | null {
  if (!(cutoff >= 0 && cutoff <= 1)) {
    throw new RangeError(`cutoff must be within [0, 1], got ${cutoff}`);
  }

  let best: SimilarityMatch | null = null;
  for (let index = 0; index < candidates.length; index++) {
    const candidate = candidates[index];
    const score = similarityRatio(reference, candidate);
    if (score < cutoff) continue;
    if (!best || score > best.score) {
      best = { candidate, score, index };
    }
  }
  return best;
}

function countMatchingCharacters(a: string, b: string): number {
  const positions = indexPositions(b);
  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  for (let range = pending.pop(); range; range = pending.pop()) {
    const [alo, ahi, blo, bhi] = range;
    const [i, j, size] = longestMatch(a, positions, alo, ahi, blo, bhi);
    if (size === 0) continue;

    matched += size;
    if (alo < i && blo < j) pending.push([alo, i, blo, j]);
    if (i + size < ahi && j + size < bhi) pending.push([i + size, ahi, j + size, bhi]);
  }
  return matched;
}

function indexPositions(text: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < text.length; j++) {
    const list = positions.get(text[j]);
    if (list) {
      list.push(j);
    } else {
      positions.set(text[j], [j]);
    }
  }
  return positions;
}

/**
 * Longest common block of a[alo:ahi] and b[blo:bhi]. Among equally long
 * blocks the one starting earliest in `a`, then earliest in `b`, wins.
 */
function longestMatch(
  a: string,
  positions: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): [number, number, number] {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;
  let runLengths = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runLengths.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    runLengths = next;
  }
  return [bestI, bestJ, bestSize];
}
