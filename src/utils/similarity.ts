// Ratcliff/Obershelp similarity for near-duplicate text detection
// Characters that are too common in a long `b` are left out of the index and
// only matched by extending a run found through rarer ones.

type Range = [aLo: number, aHi: number, bLo: number, bHi: number];

const POPULAR_MIN_LENGTH = 200;

function indexPositions(b: string): Map<string, number[]> {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j++) {
    const ch = b[j];
    const list = positions.get(ch);
    if (list) {
      list.push(j);
    } else {
      positions.set(ch, [j]);
    }
  }

  if (b.length >= POPULAR_MIN_LENGTH) {
    const limit = Math.floor(b.length / 100) + 1;
    for (const [ch, list] of positions) {
      if (list.length > limit) {
        positions.delete(ch);
      }
    }
  }
  return positions;
}

/** First index in the sorted list whose value is >= target. */
function lowerBound(list: readonly number[], target: number): number {
  let lo = 0;
  let hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (list[mid] < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Longest common substring of a[aLo:aHi] and b[bLo:bHi]. Ties go to the
 * match that starts earliest in `a`, then earliest in `b`.
 */
function longestMatch(
  a: string,
  b: string,
  positions: Map<string, number[]>,
  [aLo, aHi, bLo, bHi]: Range
): [number, number, number] {
  let bestI = aLo;
  let bestJ = bLo;
  let bestSize = 0;
  let runs = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    const list = positions.get(a[i]);
    if (list) {
      for (let k = lowerBound(list, bLo); k < list.length; k++) {
        const j = list[k];
        if (j >= bHi) break;
        const size = (runs.get(j - 1) ?? 0) + 1;
        next.set(j, size);
        if (size > bestSize) {
          bestI = i - size + 1;
          bestJ = j - size + 1;
          bestSize = size;
        }
      }
    }
    runs = next;
  }

  // Grow the run through characters left out of the index
  while (bestI > aLo && bestJ > bLo && a[bestI - 1] === b[bestJ - 1]) {
    bestI -= 1;
    bestJ -= 1;
    bestSize += 1;
  }
  while (bestI + bestSize < aHi && bestJ + bestSize < bHi && a[bestI + bestSize] === b[bestJ + bestSize]) {
    bestSize += 1;
  }

  return [bestI, bestJ, bestSize];
}

/** Total characters covered by the recursive longest-match decomposition. */
export function matchingCharacters(a: string, b: string): number {
  const positions = indexPositions(b);
  const pending: Range[] = [[0, a.length, 0, b.length]];
  let matched = 0;

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const [i, j, size] = longestMatch(a, b, positions, range);
    if (size === 0) continue;

    matched += size;
    if (aLo < i && bLo < j) pending.push([aLo, i, bLo, j]);
    if (i + size < aHi && j + size < bHi) pending.push([i + size, aHi, j + size, bHi]);
  }

  return matched;
}

/** 2·M / T in [0, 1]; two empty strings are identical. */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 1;
  return (2 * matchingCharacters(a, b)) / total;
}
