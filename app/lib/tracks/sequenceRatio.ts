/**
 * sequenceRatio.ts
 *
 * Ratcliff/Obershelp similarity: find the longest matching block, recurse on
 * the pieces to its left and right, and score 2 * matched / total length.
 *
 * Elements are code points. When the second string has 200 or more elements,
 * elements occurring in more than 1% of it are "popular" and cannot seed a
 * match (they can still extend one).
 */

interface MatchingBlock {
  a: number;
  b: number;
  size: number;
}

const AUTOJUNK_MIN_LENGTH = 200;

/**
 * Positions of each element of `b`, minus popular elements
 */
function indexElements(b: string[]): Map<string, number[]> {
  const b2j = new Map<string, number[]>();
  b.forEach((elt, j) => {
    const indices = b2j.get(elt);
    if (indices) {
      indices.push(j);
    } else {
      b2j.set(elt, [j]);
    }
  });

  if (b.length >= AUTOJUNK_MIN_LENGTH) {
    const popularThreshold = Math.floor(b.length / 100) + 1;
    for (const [elt, indices] of Array.from(b2j)) {
      if (indices.length > popularThreshold) b2j.delete(elt);
    }
  }

  return b2j;
}

function findLongestMatch(
  a: string[],
  b: string[],
  b2j: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): MatchingBlock {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;

  // lengths of matches ending at a[i - 1], b[j]
  let j2len = new Map<number, number>();
  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    j2len = next;
  }

  // Extend across popular elements that could not seed the match
  while (bestI > alo && bestJ > blo && a[bestI - 1] === b[bestJ - 1]) {
    bestI--;
    bestJ--;
    bestSize++;
  }
  while (
    bestI + bestSize < ahi &&
    bestJ + bestSize < bhi &&
    a[bestI + bestSize] === b[bestJ + bestSize]
  ) {
    bestSize++;
  }

  return { a: bestI, b: bestJ, size: bestSize };
}

/**
 * Non-overlapping matching blocks in ascending order
 */
export function getMatchingBlocks(first: string, second: string): MatchingBlock[] {
  const a = Array.from(first);
  const b = Array.from(second);
  const b2j = indexElements(b);

  const blocks: MatchingBlock[] = [];
  const queue: Array<[number, number, number, number]> = [
    [0, a.length, 0, b.length],
  ];

  for (let range = queue.pop(); range; range = queue.pop()) {
    const [alo, ahi, blo, bhi] = range;
    const block = findLongestMatch(a, b, b2j, alo, ahi, blo, bhi);
    if (block.size === 0) continue;

    blocks.push(block);
    if (alo < block.a && blo < block.b) {
      queue.push([alo, block.a, blo, block.b]);
    }
    if (block.a + block.size < ahi && block.b + block.size < bhi) {
      queue.push([block.a + block.size, ahi, block.b + block.size, bhi]);
    }
  }

  return blocks.sort((x, y) => x.a - y.a || x.b - y.b);
}

/**
 * Similarity in [0, 1]; 1 only for identical strings.
 * Two empty strings are identical.
 */
export function sequenceRatio(first: string, second: string): number {
  const total = Array.from(first).length + Array.from(second).length;
  if (total === 0) return 1;

  const matched = getMatchingBlocks(first, second).reduce(
    (sum, block) => sum + block.size,
    0,
  );
  return (2 * matched) / total;
}
