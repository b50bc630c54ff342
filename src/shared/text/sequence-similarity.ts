/**
 * Ratcliff/Obershelp similarity between two strings, in [0, 1].
 *
 * Matching blocks are found by taking the longest common contiguous block, then recursing
 * on the unmatched parts to its left and right. The ratio is `2 * matched / totalLength`,
 * computed over code points. Two empty strings are identical (1.0).
 *
 * When `right` has 200 or more characters, characters appearing in it more than
 * `floor(length / 100) + 1` times are popular: they never start a block, they only extend one.
 */
export function sequenceSimilarity(left: string, right: string): number {
    const a = Array.from(left);
    const b = Array.from(right);
    const total = a.length + b.length;

    if (total === 0) {
        return 1;
    }

    return (2 * countMatchingCharacters(a, b)) / total;
}

/**
 * Sum of the sizes of all matching blocks between `a` and `b`
 */
export function countMatchingCharacters(a: string[], b: string[]): number {
    const positionsInB = indexPositions(b);
    pruneRepeatedCharacters(positionsInB, b.length);
    const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
    let matched = 0;

    while (pending.length > 0) {
        const next = pending.pop();
        if (!next) break;

        const [aLow, aHigh, bLow, bHigh] = next;
        const block = findLongestMatch(a, b, positionsInB, aLow, aHigh, bLow, bHigh);
        if (block.size === 0) continue;

        matched += block.size;

        if (aLow < block.a && bLow < block.b) {
            pending.push([aLow, block.a, bLow, block.b]);
        }
        if (block.a + block.size < aHigh && block.b + block.size < bHigh) {
            pending.push([block.a + block.size, aHigh, block.b + block.size, bHigh]);
        }
    }

    return matched;
}

interface MatchingBlock {
    a: number;
    b: number;
    size: number;
}

const POPULAR_MIN_LENGTH = 200;

/**
 * Longest block shared by a[aLow:aHigh] and b[bLow:bHigh].
 * Ties resolve to the block starting earliest in `a`, then earliest in `b`. The block found
 * through `positionsInB` is then widened over equal neighbours, which only grows it when
 * popular characters were pruned.
 */
function findLongestMatch(
    a: string[],
    b: string[],
    positionsInB: Map<string, number[]>,
    aLow: number,
    aHigh: number,
    bLow: number,
    bHigh: number,
): MatchingBlock {
    let best: MatchingBlock = { a: aLow, b: bLow, size: 0 };
    // Length of the match ending at a[i - 1], b[j], keyed by j
    let runLengths = new Map<number, number>();

    for (let i = aLow; i < aHigh; i++) {
        const nextRunLengths = new Map<number, number>();

        for (const j of positionsInB.get(a[i]) ?? []) {
            if (j < bLow) continue;
            if (j >= bHigh) break;

            const length = (runLengths.get(j - 1) ?? 0) + 1;
            nextRunLengths.set(j, length);

            if (length > best.size) {
                best = { a: i - length + 1, b: j - length + 1, size: length };
            }
        }

        runLengths = nextRunLengths;
    }

    let { a: start, b: startInB, size } = best;
    while (start > aLow && startInB > bLow && a[start - 1] === b[startInB - 1]) {
        start--;
        startInB--;
        size++;
    }
    while (
        start + size < aHigh &&
        startInB + size < bHigh &&
        a[start + size] === b[startInB + size]
    ) {
        size++;
    }

    return { a: start, b: startInB, size };
}

function indexPositions(characters: string[]): Map<string, number[]> {
    const positions = new Map<string, number[]>();

    characters.forEach((character, index) => {
        const existing = positions.get(character);
        if (existing) {
            existing.push(index);
        } else {
            positions.set(character, [index]);
        }
    });

    return positions;
}

function pruneRepeatedCharacters(positions: Map<string, number[]>, length: number): void {
    if (length < POPULAR_MIN_LENGTH) return;

    const maxOccurrences = Math.floor(length / 100) + 1;
    for (const [character, indexes] of positions) {
        if (indexes.length > maxOccurrences) {
            positions.delete(character);
        }
    }
}
