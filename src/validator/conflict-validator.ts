/**
 * Conflict Validator
 *
 * Checks a resolved content graph against the rules the engine depends on:
 *
 *   DuplicateMainSymptom  two diseases share a main symptom
 *   MainSymptomMismatch   main symptom not flagged isMain, or a secondary one is
 *   MissingTreatment      a symptom has no treatment, or it does not resolve
 *   UncoveredSymptom      a symptom has no resolvable examination
 *   UnknownFacility       an examination needs a facility outside the closed set
 *   DanglingReference     any reference that names a missing entity
 *
 * Every check runs (no short-circuit) so one pass reports every problem.
 * The graph is never modified. Removed diseases are skipped.
 */

import {
    EntityKind,
    ViolationCode,
    WarningCode,
    type ContentGraph,
    type ValidationResult,
    type ValidationWarning,
    type Violation,
} from '../types/index.js';
import { retainedDiseases } from '../graph/content-graph.js';
import { getLogger } from '../utils/logger.js';

/**
 * Static inputs the validator checks against.
 */
export interface ValidatorOptions {
    facilityKinds: readonly string[];
}

type Check = (graph: ContentGraph, options: ValidatorOptions) => Violation[];

/**
 * Run every check and collect the results.
 */
export function validateGraph(graph: ContentGraph, options: ValidatorOptions): ValidationResult {
    const checks: Check[] = [
        checkMainSymptomUniqueness,
        checkMainSymptomFlags,
        checkTreatments,
        checkExaminationCoverage,
        checkFacilities,
        checkReferences,
    ];

    const violations = checks.flatMap((check) => check(graph, options));
    const warnings = checkOrphanMainSymptoms(graph);

    const result: ValidationResult = {
        valid: violations.length === 0,
        violations,
        warnings,
    };

    getLogger().info(
        { valid: result.valid, violations: violations.length, warnings: warnings.length },
        'Graph validated'
    );
    return result;
}

/**
 * Group violations by code, for summaries.
 */
export function countByCode(violations: readonly Violation[]): Partial<Record<ViolationCode, number>> {
    const counts: Partial<Record<ViolationCode, number>> = {};
    for (const v of violations) {
        counts[v.code] = (counts[v.code] ?? 0) + 1;
    }
    return counts;
}

// ─── Checks ──────────────────────────────────────────────

export function checkMainSymptomUniqueness(graph: ContentGraph): Violation[] {
    const owners = new Map<string, string[]>();
    for (const disease of retainedDiseases(graph)) {
        const list = owners.get(disease.mainSymptom);
        if (list) list.push(disease.id);
        else owners.set(disease.mainSymptom, [disease.id]);
    }

    const violations: Violation[] = [];
    for (const [symptomId, diseaseIds] of owners) {
        if (diseaseIds.length < 2) continue;
        violations.push({
            code: ViolationCode.DUPLICATE_MAIN_SYMPTOM,
            kind: EntityKind.SYMPTOM,
            entityId: symptomId,
            message: `Symptom "${symptomId}" is the main symptom of ${diseaseIds.length} diseases: ${diseaseIds.join(', ')}`,
            related: diseaseIds,
        });
    }
    return violations;
}

export function checkMainSymptomFlags(graph: ContentGraph): Violation[] {
    const violations: Violation[] = [];
    for (const disease of retainedDiseases(graph)) {
        const main = graph.symptom.get(disease.mainSymptom);
        if (main && !main.isMain) {
            violations.push({
                code: ViolationCode.MAIN_SYMPTOM_MISMATCH,
                kind: EntityKind.DISEASE,
                entityId: disease.id,
                message: `Main symptom "${main.id}" of disease "${disease.id}" is not flagged as a main symptom`,
                related: [main.id],
            });
        }

        for (const secondaryId of disease.secondarySymptoms) {
            const secondary = graph.symptom.get(secondaryId);
            if (secondary?.isMain) {
                violations.push({
                    code: ViolationCode.MAIN_SYMPTOM_MISMATCH,
                    kind: EntityKind.DISEASE,
                    entityId: disease.id,
                    message: `Secondary symptom "${secondaryId}" of disease "${disease.id}" is flagged as a main symptom`,
                    related: [secondaryId],
                });
            }
        }
    }
    return violations;
}

export function checkTreatments(graph: ContentGraph): Violation[] {
    const violations: Violation[] = [];
    for (const symptom of graph.symptom.values()) {
        if (symptom.treatment === null) {
            violations.push({
                code: ViolationCode.MISSING_TREATMENT,
                kind: EntityKind.SYMPTOM,
                entityId: symptom.id,
                message: `Symptom "${symptom.id}" has no treatment`,
            });
        } else if (!graph.treatment.has(symptom.treatment)) {
            violations.push({
                code: ViolationCode.MISSING_TREATMENT,
                kind: EntityKind.SYMPTOM,
                entityId: symptom.id,
                message: `Treatment "${symptom.treatment}" of symptom "${symptom.id}" does not exist`,
                related: [symptom.treatment],
            });
        }
    }
    return violations;
}

export function checkExaminationCoverage(graph: ContentGraph): Violation[] {
    const violations: Violation[] = [];
    for (const symptom of graph.symptom.values()) {
        const valid = symptom.examinations.filter((id) => graph.examination.has(id));
        if (valid.length === 0) {
            violations.push({
                code: ViolationCode.UNCOVERED_SYMPTOM,
                kind: EntityKind.SYMPTOM,
                entityId: symptom.id,
                message: `Symptom "${symptom.id}" cannot be detected by any examination`,
            });
        }
    }
    return violations;
}

export function checkFacilities(graph: ContentGraph, options: ValidatorOptions): Violation[] {
    const known = new Set(options.facilityKinds);
    const violations: Violation[] = [];
    for (const exam of graph.examination.values()) {
        if (!known.has(exam.facility)) {
            violations.push({
                code: ViolationCode.UNKNOWN_FACILITY,
                kind: EntityKind.EXAMINATION,
                entityId: exam.id,
                message: `Examination "${exam.id}" requires unknown facility "${exam.facility}"`,
            });
        }
    }
    return violations;
}

export function checkReferences(graph: ContentGraph): Violation[] {
    const violations: Violation[] = [];

    const dangling = (kind: EntityKind, entityId: string, target: EntityKind, ref: string, field: string) => {
        violations.push({
            code: ViolationCode.DANGLING_REFERENCE,
            kind,
            entityId,
            message: `${kind} "${entityId}" ${field} references missing ${target} "${ref}"`,
            related: [ref],
        });
    };

    for (const disease of retainedDiseases(graph)) {
        if (!graph.symptom.has(disease.mainSymptom)) {
            dangling(EntityKind.DISEASE, disease.id, EntityKind.SYMPTOM, disease.mainSymptom, 'mainSymptom');
        }
        for (const ref of disease.secondarySymptoms) {
            if (!graph.symptom.has(ref)) {
                dangling(EntityKind.DISEASE, disease.id, EntityKind.SYMPTOM, ref, 'secondarySymptoms');
            }
        }
    }

    for (const symptom of graph.symptom.values()) {
        for (const ref of symptom.examinations) {
            if (!graph.examination.has(ref)) {
                dangling(EntityKind.SYMPTOM, symptom.id, EntityKind.EXAMINATION, ref, 'examinations');
            }
        }
        if (symptom.treatment !== null && !graph.treatment.has(symptom.treatment)) {
            dangling(EntityKind.SYMPTOM, symptom.id, EntityKind.TREATMENT, symptom.treatment, 'treatment');
        }
        for (const ref of symptom.collapseSymptoms) {
            if (!graph.symptom.has(ref)) {
                dangling(EntityKind.SYMPTOM, symptom.id, EntityKind.SYMPTOM, ref, 'collapseSymptoms');
            }
        }
    }

    for (const exam of graph.examination.values()) {
        for (const ref of exam.labPeers) {
            if (!graph.examination.has(ref)) {
                dangling(EntityKind.EXAMINATION, exam.id, EntityKind.EXAMINATION, ref, 'labPeers');
            }
        }
    }

    for (const treatment of graph.treatment.values()) {
        for (const ref of treatment.complicationSymptoms) {
            if (!graph.symptom.has(ref)) {
                dangling(EntityKind.TREATMENT, treatment.id, EntityKind.SYMPTOM, ref, 'complicationSymptoms');
            }
        }
    }

    return violations;
}

// ─── Warnings ────────────────────────────────────────────

function checkOrphanMainSymptoms(graph: ContentGraph): ValidationWarning[] {
    const used = new Set(retainedDiseases(graph).map((d) => d.mainSymptom));
    const warnings: ValidationWarning[] = [];
    for (const symptom of graph.symptom.values()) {
        if (symptom.isMain && !used.has(symptom.id)) {
            warnings.push({
                code: WarningCode.ORPHAN_MAIN_SYMPTOM,
                kind: EntityKind.SYMPTOM,
                entityId: symptom.id,
                message: `Main symptom "${symptom.id}" is not the main symptom of any disease`,
            });
        }
    }
    return warnings;
}
