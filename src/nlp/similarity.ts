import { tokenize } from './tokenizer.js';

/**
 * Dice coefficient between two token sets: 2·|A ∩ B| / (|A| + |B|).
 * Returns value in [0, 1].
 */
export function diceCoefficient(tokensA: ReadonlySet<string>, tokensB: ReadonlySet<string>): number {
    if (tokensA.size === 0 || tokensB.size === 0) return 0;

    // Use the smaller set for iteration efficiency
    const [smaller, larger] = tokensA.size <= tokensB.size ? [tokensA, tokensB] : [tokensB, tokensA];

    let overlap = 0;
    for (const token of smaller) {
        if (larger.has(token)) overlap++;
    }

    return (2 * overlap) / (tokensA.size + tokensB.size);
}

/**
 * Similarity of two names, compared as token sets.
 */
export function nameSimilarity(a: string, b: string): number {
    return diceCoefficient(new Set(tokenize(a)), new Set(tokenize(b)));
}

export interface SimilarPair {
    a: string;
    b: string;
    similarity: number;
}

/**
 * Find every pair of named items whose names reach the threshold.
 * Pairs are ordered `a < b` and sorted by similarity, then ids.
 *
 * @param items - Items with a unique id and a display name
 * @param threshold - Minimum similarity for a pair to be returned
 */
export function findSimilarPairs(
    items: ReadonlyArray<{ id: string; name: string }>,
    threshold: number
): SimilarPair[] {
    const tokenSets = items.map((item) => ({ id: item.id, tokens: new Set(tokenize(item.name)) }));
    tokenSets.sort((x, y) => (x.id < y.id ? -1 : x.id > y.id ? 1 : 0));

    const pairs: SimilarPair[] = [];
    for (let i = 0; i < tokenSets.length; i++) {
        const left = tokenSets[i]!;
        for (let j = i + 1; j < tokenSets.length; j++) {
            const right = tokenSets[j]!;

            const similarity = diceCoefficient(left.tokens, right.tokens);
            if (similarity >= threshold) {
                pairs.push({ a: left.id, b: right.id, similarity });
            }
        }
    }

    pairs.sort((x, y) => y.similarity - x.similarity || (x.a < y.a ? -1 : x.a > y.a ? 1 : x.b < y.b ? -1 : x.b > y.b ? 1 : 0));
    return pairs;
}
