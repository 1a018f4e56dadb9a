import { STOPWORDS } from './stopwords.js';

/**
 * Tokenize an entity name into lowercase tokens.
 * - Lowercase
 * - Split on whitespace, underscores and punctuation
 * - Remove stopwords
 * - No stemming (deterministic)
 */
export function tokenize(text: string): string[] {
    if (!text) return [];

    return text
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]/gu, ' ')
        .split(/\s+/)
        .filter((token) => token.length > 0 && !STOPWORDS.has(token));
}
