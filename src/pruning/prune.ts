import type { ContentGraph, PruneReport } from '../types/index.js';
import { cloneGraph } from '../graph/content-graph.js';
import { computeReachable } from '../graph/reachability.js';
import { getLogger } from '../utils/logger.js';

export interface PruneResult {
    graph: ContentGraph;
    report: PruneReport;
}

/**
 * Pruning Pass.
 *
 * Keeps the retained diseases and everything reachable from them; drops
 * removed diseases and every symptom, examination and treatment outside the
 * closure. Running it on its own output changes nothing.
 */
export function pruneGraph(graph: ContentGraph): PruneResult {
    const reachable = computeReachable(graph);

    const report: PruneReport = {
        diseases: [...graph.disease.keys()].filter((id) => !reachable.diseases.has(id)),
        symptoms: [...graph.symptom.keys()].filter((id) => !reachable.symptoms.has(id)),
        examinations: [...graph.examination.keys()].filter((id) => !reachable.examinations.has(id)),
        treatments: [...graph.treatment.keys()].filter((id) => !reachable.treatments.has(id)),
    };

    const pruned = cloneGraph(graph);
    report.diseases.forEach((id) => pruned.disease.delete(id));
    report.symptoms.forEach((id) => pruned.symptom.delete(id));
    report.examinations.forEach((id) => pruned.examination.delete(id));
    report.treatments.forEach((id) => pruned.treatment.delete(id));

    getLogger().info(
        {
            diseases: report.diseases.length,
            symptoms: report.symptoms.length,
            examinations: report.examinations.length,
            treatments: report.treatments.length,
        },
        'Graph pruned'
    );

    return { graph: pruned, report };
}

/**
 * Total number of entities a prune removed.
 */
export function prunedCount(report: PruneReport): number {
    return report.diseases.length + report.symptoms.length + report.examinations.length + report.treatments.length;
}
