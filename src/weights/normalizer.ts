import {
    EntityKind,
    WarningCode,
    type ContentGraph,
    type Disease,
    type ValidationWarning,
    type WeightChange,
    type WeightConfig,
    type WeightReport,
} from '../types/index.js';
import { cloneGraph, retainedDiseases } from '../graph/content-graph.js';
import { getLogger } from '../utils/logger.js';

export interface WeightResult {
    graph: ContentGraph;
    report: WeightReport;
}

/**
 * Weight Normalizer.
 *
 * Rescales patient-generation weights so each department receives its
 * configured share of `scale`, keeping the ratios between diseases of one
 * department exactly as authored:
 *
 *   normalized = scale × share(d) × raw / Σ raw(d)
 *
 * Diseases without a frequency use `baseline`. A department present in the
 * graph but absent from a non-empty share table gets `fallbackShare` and a
 * warning. Shares are normalized over the departments present.
 */
export function normalizeWeights(graph: ContentGraph, config: WeightConfig): WeightResult {
    const logger = getLogger();
    const working = cloneGraph(graph);
    const warnings: ValidationWarning[] = [];

    const byDepartment = groupByDepartment(retainedDiseases(working));
    const departments = [...byDepartment.keys()].sort();
    const explicitShares = Object.keys(config.departmentShares).length > 0;

    const rawShares = new Map<string, number>();
    for (const department of departments) {
        const configured = config.departmentShares[department];
        if (configured === undefined) {
            if (explicitShares) {
                warnings.push({
                    code: WarningCode.MISSING_DEPARTMENT_SHARE,
                    kind: EntityKind.DISEASE,
                    entityId: department,
                    message: `Department "${department}" has no configured share; using ${config.fallbackShare}`,
                });
            }
            rawShares.set(department, config.fallbackShare);
        } else {
            rawShares.set(department, configured);
        }
    }

    const shareTotal = sum(rawShares.values());
    const shares: Record<string, number> = {};
    for (const department of departments) {
        shares[department] = shareTotal > 0 ? (rawShares.get(department) ?? 0) / shareTotal : 0;
    }

    const changes: WeightChange[] = [];
    for (const department of departments) {
        const diseases = byDepartment.get(department) ?? [];
        const rawTotal = sum(diseases.map((d) => rawWeight(d, config)));
        const share = shares[department] ?? 0;

        for (const disease of diseases) {
            const raw = rawWeight(disease, config);
            const normalized = rawTotal > 0 ? (config.scale * share * raw) / rawTotal : 0;
            disease.weight = normalized;
            changes.push({ diseaseId: disease.id, department, raw, normalized });

            if (!(normalized > 0)) {
                warnings.push({
                    code: WarningCode.ZERO_WEIGHT_DISEASE,
                    kind: EntityKind.DISEASE,
                    entityId: disease.id,
                    message: `Disease "${disease.id}" has normalized weight ${normalized} and will never be generated`,
                });
            }
        }
    }

    logger.info(
        { departments: departments.length, diseases: changes.length, warnings: warnings.length },
        'Weights normalized'
    );

    return { graph: working, report: { shares, changes, warnings } };
}

/**
 * Weight of a disease before normalization.
 */
export function rawWeight(disease: Disease, config: Pick<WeightConfig, 'baseline'>): number {
    return disease.frequency ?? config.baseline;
}

function groupByDepartment(diseases: Disease[]): Map<string, Disease[]> {
    const groups = new Map<string, Disease[]>();
    for (const disease of diseases) {
        const list = groups.get(disease.department);
        if (list) list.push(disease);
        else groups.set(disease.department, [disease]);
    }
    return groups;
}

function sum(values: Iterable<number>): number {
    let total = 0;
    for (const v of values) total += v;
    return total;
}
