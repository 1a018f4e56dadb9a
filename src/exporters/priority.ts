import type { ContentGraph } from '../types/index.js';
import { retainedDiseases } from '../graph/content-graph.js';
import { ROOM_CATEGORY_RANK, roomFor } from './engine-schema.js';

/** Priority of the last examination group; groups above it count up from here */
export const PRIORITY_FLOOR = 25;

export interface ExaminationRank {
    /** Rank of the examination's room category, cheapest first */
    categoryRank: number;

    /**
     * Diagnostic coverage. Each disease the examination can detect adds the
     * disease count of its most widely shared detectable symptom, once.
     */
    score: number;

    /** Distinct retained diseases the examination can detect */
    diseaseCount: number;

    /** Engine `Procedure/Priority`; equal within a (category, score) group */
    priority: number;
}

type Ranked = Pick<ExaminationRank, 'categoryRank' | 'score'>;

const UNRANKED: Ranked = { categoryRank: Number.MAX_SAFE_INTEGER, score: 0 };

/**
 * Score and prioritize every examination of a graph.
 *
 * Order is room category (cheapest first), then score (highest first),
 * then id. The returned map iterates in that order.
 */
export function rankExaminations(graph: ContentGraph): Map<string, ExaminationRank> {
    const diseases = retainedDiseases(graph);

    // How many diseases use each symptom
    const frequency = new Map<string, number>();
    for (const disease of diseases) {
        for (const symptomId of new Set([disease.mainSymptom, ...disease.secondarySymptoms])) {
            frequency.set(symptomId, (frequency.get(symptomId) ?? 0) + 1);
        }
    }

    const scores = new Map<string, { score: number; diseaseCount: number }>();
    for (const disease of diseases) {
        const best = new Map<string, number>();
        for (const symptomId of [disease.mainSymptom, ...disease.secondarySymptoms]) {
            const symptom = graph.symptom.get(symptomId);
            if (!symptom) continue;
            const freq = frequency.get(symptomId) ?? 0;
            for (const examId of symptom.examinations) {
                best.set(examId, Math.max(best.get(examId) ?? 0, freq));
            }
        }
        for (const [examId, freq] of best) {
            const entry = scores.get(examId) ?? { score: 0, diseaseCount: 0 };
            entry.score += freq;
            entry.diseaseCount += 1;
            scores.set(examId, entry);
        }
    }

    const entries = [...graph.examination.values()].map((exam) => {
        const room = roomFor(exam.facility);
        const coverage = scores.get(exam.id) ?? { score: 0, diseaseCount: 0 };
        return {
            id: exam.id,
            categoryRank: room ? ROOM_CATEGORY_RANK[room.category] : UNRANKED.categoryRank,
            ...coverage,
        };
    });
    entries.sort((a, b) => compareRanked(a, b) || compareIds(a.id, b.id));

    const groupOf: number[] = [];
    entries.forEach((entry, i) => {
        const prev = entries[i - 1];
        const group = groupOf[i - 1] ?? 0;
        groupOf.push(prev && compareRanked(prev, entry) !== 0 ? group + 1 : group);
    });
    const highest = PRIORITY_FLOOR + (groupOf.at(-1) ?? 0);

    const ranking = new Map<string, ExaminationRank>();
    entries.forEach((entry, i) => {
        ranking.set(entry.id, {
            categoryRank: entry.categoryRank,
            score: entry.score,
            diseaseCount: entry.diseaseCount,
            priority: highest - (groupOf[i] ?? 0),
        });
    });
    return ranking;
}

/**
 * Examination ids in ranking order. Ids missing from the ranking go last.
 */
export function orderByRank(ids: readonly string[], ranking: ReadonlyMap<string, ExaminationRank>): string[] {
    return [...ids].sort(
        (a, b) => compareRanked(ranking.get(a) ?? UNRANKED, ranking.get(b) ?? UNRANKED) || compareIds(a, b)
    );
}

function compareRanked(a: Ranked, b: Ranked): number {
    return a.categoryRank - b.categoryRank || b.score - a.score;
}

function compareIds(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}
