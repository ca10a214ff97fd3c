// src/domain/sequence.ts
// Ratcliff/Obershelp "gestalt" matching between two strings.

type Match = { i: number; j: number; size: number };

/** Second strings at least this long get their most frequent characters excluded from match seeds. */
const POPULAR_MIN_LENGTH = 200;

/**
 * Index of every code point of `b` → ascending positions.
 * For long inputs, characters that occur in more than 1% (+1) of positions
 * are dropped; they can still extend a match, but never start one.
 */
function indexPositions(b: string[]): Map<string, number[]> {
    const b2j = new Map<string, number[]>();
    b.forEach((ch, j) => {
        const list = b2j.get(ch);
        if (list) list.push(j);
        else b2j.set(ch, [j]);
    });

    if (b.length >= POPULAR_MIN_LENGTH) {
        const limit = Math.floor(b.length / 100) + 1;
        for (const [ch, list] of [...b2j]) {
            if (list.length > limit) b2j.delete(ch);
        }
    }
    return b2j;
}

/** Longest common block in a[alo:ahi] × b[blo:bhi]; earliest in `a`, then in `b`, on ties. */
function longestMatch(
    a: string[],
    b: string[],
    b2j: Map<string, number[]>,
    alo: number,
    ahi: number,
    blo: number,
    bhi: number
): Match {
    let besti = alo;
    let bestj = blo;
    let bestsize = 0;

    let j2len = new Map<number, number>();
    for (let i = alo; i < ahi; i++) {
        const next = new Map<number, number>();
        for (const j of b2j.get(a[i]) ?? []) {
            if (j < blo) continue;
            if (j >= bhi) break;
            const k = (j2len.get(j - 1) ?? 0) + 1;
            next.set(j, k);
            if (k > bestsize) {
                besti = i - k + 1;
                bestj = j - k + 1;
                bestsize = k;
            }
        }
        j2len = next;
    }

    // popular characters were not indexed; grow the block across them
    while (besti > alo && bestj > blo && a[besti - 1] === b[bestj - 1]) {
        besti--;
        bestj--;
        bestsize++;
    }
    while (besti + bestsize < ahi && bestj + bestsize < bhi && a[besti + bestsize] === b[bestj + bestsize]) {
        bestsize++;
    }

    return { i: besti, j: bestj, size: bestsize };
}

/** Total size of the matching blocks between `a` and `b`. */
export function matchedCharacters(a: string, b: string): number {
    const as = Array.from(a);
    const bs = Array.from(b);
    const b2j = indexPositions(bs);

    let matched = 0;
    const queue: Array<[number, number, number, number]> = [[0, as.length, 0, bs.length]];
    for (let block = queue.pop(); block; block = queue.pop()) {
        const [alo, ahi, blo, bhi] = block;
        const m = longestMatch(as, bs, b2j, alo, ahi, blo, bhi);
        if (m.size === 0) continue;
        matched += m.size;
        if (alo < m.i && blo < m.j) queue.push([alo, m.i, blo, m.j]);
        if (m.i + m.size < ahi && m.j + m.size < bhi) queue.push([m.i + m.size, ahi, m.j + m.size, bhi]);
    }
    return matched;
}

/**
 * Similarity ratio 2·M / T, where M = matched characters and T = total length.
 * Two empty strings are identical (1.0).
 */
export function sequenceRatio(a: string, b: string): number {
    const total = Array.from(a).length + Array.from(b).length;
    if (total === 0) return 1;
    return (2 * matchedCharacters(a, b)) / total;
}
