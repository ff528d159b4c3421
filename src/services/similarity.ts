/**
 * Gestalt pattern-matching ratio (Ratcliff/Obershelp) of two strings,
 * compared case-insensitively: `2 * M / (|a| + |b|)` where M counts the
 * characters in matching blocks. Returns 0 when either side is empty.
 *
 * Block selection depends on argument order, so both orders are measured
 * and the larger ratio is returned.
 */
export function similarity(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  const left = a.toLowerCase();
  const right = b.toLowerCase();
  const matches = Math.max(matchingCharacters(left, right), matchingCharacters(right, left));
  return (2 * matches) / (left.length + right.length);
}

interface Block {
  i: number;
  j: number;
  size: number;
}

function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (pending.length > 0) {
    const range = pending.pop();
    if (!range) {
      break;
    }

    const [alo, ahi, blo, bhi] = range;
    const { i, j, size } = longestMatch(a, alo, ahi, b, blo, bhi);
    if (size === 0) {
      continue;
    }

    total += size;
    if (alo < i && blo < j) {
      pending.push([alo, i, blo, j]);
    }
    if (i + size < ahi && j + size < bhi) {
      pending.push([i + size, ahi, j + size, bhi]);
    }
  }

  return total;
}

/** Longest common substring within the ranges; ties go to the earliest in `a`, then in `b`. */
function longestMatch(a: string, alo: number, ahi: number, b: string, blo: number, bhi: number): Block {
  let best: Block = { i: alo, j: blo, size: 0 };
  let previous = new Map<number, number>();

  for (let i = alo; i < ahi; i += 1) {
    const current = new Map<number, number>();
    for (let j = blo; j < bhi; j += 1) {
      if (a[i] !== b[j]) {
        continue;
      }
      const size = (previous.get(j - 1) ?? 0) + 1;
      current.set(j, size);
      if (size > best.size) {
        best = { i: i - size + 1, j: j - size + 1, size };
      }
    }
    previous = current;
  }

  return best;
}
