import type { EntityKind, EntityByKind } from './entity.js';

/**
 * ContentGraph: the merged dataset, one id-keyed map per entity kind.
 *
 * Diseases are the roots; they reference symptoms, which reference
 * examinations and treatments. Every pipeline stage receives a graph and
 * returns a new one; none of them mutates its input.
 */
export type ContentGraph = {
    readonly [K in EntityKind]: Map<string, EntityByKind[K]>;
};
