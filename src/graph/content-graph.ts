import type {
    ContentGraph,
    Disease,
    Symptom,
    Examination,
    Treatment,
    EntityKind,
} from '../types/index.js';

/**
 * Build a graph from entity lists. Maps are filled in id order so that
 * iteration (and therefore every report and export) is deterministic.
 */
export function graphFrom(entities: {
    diseases?: Disease[];
    symptoms?: Symptom[];
    examinations?: Examination[];
    treatments?: Treatment[];
}): ContentGraph {
    return {
        disease: toSortedMap(entities.diseases ?? []),
        symptom: toSortedMap(entities.symptoms ?? []),
        examination: toSortedMap(entities.examinations ?? []),
        treatment: toSortedMap(entities.treatments ?? []),
    };
}

/**
 * Deep copy of a graph. Stages work on a copy and hand it forward,
 * leaving the snapshot they received untouched.
 */
export function cloneGraph(graph: ContentGraph): ContentGraph {
    return {
        disease: new Map(
            [...graph.disease].map(([id, d]) => [id, { ...d, tags: [...d.tags], secondarySymptoms: [...d.secondarySymptoms] }])
        ),
        symptom: new Map(
            [...graph.symptom].map(([id, s]) => [
                id,
                { ...s, examinations: [...s.examinations], collapseSymptoms: [...s.collapseSymptoms] },
            ])
        ),
        examination: new Map([...graph.examination].map(([id, e]) => [id, { ...e, labPeers: [...e.labPeers] }])),
        treatment: new Map(
            [...graph.treatment].map(([id, t]) => [id, { ...t, complicationSymptoms: [...t.complicationSymptoms] }])
        ),
    };
}

/**
 * Entity counts per kind.
 */
export function countEntities(graph: ContentGraph): Record<EntityKind, number> {
    return {
        disease: graph.disease.size,
        symptom: graph.symptom.size,
        examination: graph.examination.size,
        treatment: graph.treatment.size,
    };
}

/**
 * Diseases that have not been removed by a reassignment directive.
 */
export function retainedDiseases(graph: ContentGraph): Disease[] {
    return [...graph.disease.values()].filter((d) => !d.removed);
}

/**
 * Remove repeated values, keeping first occurrences in order.
 */
export function unique<T>(values: Iterable<T>): T[] {
    return [...new Set(values)];
}

function toSortedMap<T extends { id: string }>(entities: T[]): Map<string, T> {
    const sorted = [...entities].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return new Map(sorted.map((entity) => [entity.id, entity]));
}
