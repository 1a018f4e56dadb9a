import type {
    ContentGraph,
    ContentPackage,
    Directive,
    IntegrationReport,
    MedpackConfig,
    PackageSummary,
    ResolutionReport,
    ValidationResult,
} from '../types/index.js';
import { countEntities, graphFrom } from '../graph/content-graph.js';
import { splitDirectives } from '../loader/directives.js';
import { resolveIdentities } from '../resolver/identity-resolver.js';
import { validateGraph } from '../validator/conflict-validator.js';
import { applyReassignments } from '../reassignment/reassignment-engine.js';
import { pruneGraph } from '../pruning/prune.js';
import { normalizeWeights } from '../weights/normalizer.js';
import { exportGraph } from '../exporters/export.js';
import { getLogger } from '../utils/logger.js';

export type RunStatus = 'ok' | 'invalid';

export interface PipelineResult {
    status: RunStatus;

    /** Last graph snapshot the run produced */
    graph: ContentGraph;

    report: IntegrationReport;

    /** Serialized export; present only when status is `ok` */
    output?: string;
}

/**
 * Settings a run reads from the configuration.
 */
export type PipelineConfig = Pick<MedpackConfig, 'format' | 'facilityKinds' | 'departments' | 'resolver' | 'weights'>;

/**
 * Integration pipeline:
 *
 * 1. Resolve identities (merge directives applied here)
 * 2. Validate; an invalid graph halts the run
 * 3. Apply reassignment directives
 * 4. Prune unreachable content
 * 5. Normalize weights
 * 6. Validate again as the export gate
 * 7. Export
 *
 * Directive errors propagate as exceptions. Violations are returned as data
 * with status `invalid`.
 */
export function runPipeline(
    packages: readonly ContentPackage[],
    directives: readonly Directive[],
    config: PipelineConfig
): PipelineResult {
    const logger = getLogger();
    const startTime = Date.now();
    const { merges, reassignments } = splitDirectives([...directives]);

    // ──────────────────────────────────────────────────
    // Step 1–2: Resolve and validate
    // ──────────────────────────────────────────────────
    const { graph: resolved, resolution, validation } = resolveAndValidate(packages, merges, config);

    const report: IntegrationReport = {
        packages: summarizePackages(packages),
        resolution,
        validation,
        reassignments: [],
        pruned: { diseases: [], symptoms: [], examinations: [], treatments: [] },
        weights: null,
        finalValidation: null,
    };

    if (!validation.valid) {
        logger.warn({ violations: validation.violations.length }, 'Graph is invalid; halting before export');
        return { status: 'invalid', graph: resolved, report };
    }

    // ──────────────────────────────────────────────────
    // Step 3–5: Reassign, prune, weight
    // ──────────────────────────────────────────────────
    const reassigned = applyReassignments(resolved, reassignments, { departments: config.departments });
    report.reassignments = reassigned.changes;

    const pruned = pruneGraph(reassigned.graph);
    report.pruned = pruned.report;

    const weighted = normalizeWeights(pruned.graph, config.weights);
    report.weights = weighted.report;

    // ──────────────────────────────────────────────────
    // Step 6–7: Gate and export
    // ──────────────────────────────────────────────────
    const gate = validateGraph(weighted.graph, { facilityKinds: config.facilityKinds });
    report.finalValidation = {
        ...gate,
        warnings: [...gate.warnings, ...weighted.report.warnings],
    };

    if (!gate.valid) {
        logger.warn({ violations: gate.violations.length }, 'Final graph is invalid; nothing exported');
        return { status: 'invalid', graph: weighted.graph, report };
    }

    const output = exportGraph(weighted.graph, config.format);

    logger.info(
        { ...countEntities(weighted.graph), elapsedMs: Date.now() - startTime },
        'Integration complete'
    );
    return { status: 'ok', graph: weighted.graph, report, output };
}

/**
 * Resolve identities and validate, without changing anything further.
 */
export function resolveAndValidate(
    packages: readonly ContentPackage[],
    merges: Parameters<typeof resolveIdentities>[1],
    config: Pick<MedpackConfig, 'facilityKinds' | 'resolver'>
): { graph: ContentGraph; resolution: ResolutionReport; validation: ValidationResult } {
    if (packages.length === 0) {
        getLogger().warn('No content packages given');
        return {
            graph: graphFrom({}),
            resolution: { merges: [], nearDuplicates: [] },
            validation: { valid: true, violations: [], warnings: [] },
        };
    }

    const { graph, report } = resolveIdentities(packages, merges, config.resolver);
    const validation = validateGraph(graph, { facilityKinds: config.facilityKinds });
    return { graph, resolution: report, validation };
}

/**
 * Package metadata and entity counts, sorted by tag.
 */
export function summarizePackages(packages: readonly ContentPackage[]): PackageSummary[] {
    return [...packages]
        .sort((a, b) => (a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0))
        .map((p) => ({
            tag: p.tag,
            version: p.version,
            priority: p.priority,
            counts: {
                disease: p.diseases.length,
                symptom: p.symptoms.length,
                examination: p.examinations.length,
                treatment: p.treatments.length,
            },
        }));
}
