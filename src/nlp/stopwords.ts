/**
 * Filler words ignored when comparing entity names.
 */
export const STOPWORDS: ReadonlySet<string> = new Set([
    'a', 'an', 'and', 'at', 'by', 'for', 'from', 'in', 'of', 'on', 'or', 'the', 'to', 'with',
]);
