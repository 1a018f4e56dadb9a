import type { EntityKind } from './entity.js';

// ─── Identity resolution ─────────────────────────────────

/** Why two entity instances were collapsed */
export type MergeReason = 'name' | 'id' | 'directive';

/**
 * One superseded instance and the canonical entity it was folded into.
 */
export interface MergeRecord {
    kind: EntityKind;
    supersededId: string;
    supersededPackage: string;
    canonicalId: string;
    canonicalPackage: string;
    reason: MergeReason;
}

/**
 * Two distinct entities whose names look alike.
 * Flagged for curator review; never merged automatically.
 */
export interface NearDuplicate {
    kind: EntityKind;
    ids: [string, string];
    names: [string, string];
    similarity: number;
}

export interface ResolutionReport {
    merges: MergeRecord[];
    nearDuplicates: NearDuplicate[];
}

// ─── Validation ──────────────────────────────────────────

/**
 * Hard violation codes. Any of them halts the pipeline before export.
 */
export enum ViolationCode {
    DUPLICATE_MAIN_SYMPTOM = 'DuplicateMainSymptom',
    MISSING_TREATMENT = 'MissingTreatment',
    UNCOVERED_SYMPTOM = 'UncoveredSymptom',
    UNKNOWN_FACILITY = 'UnknownFacility',
    DANGLING_REFERENCE = 'DanglingReference',
    MAIN_SYMPTOM_MISMATCH = 'MainSymptomMismatch',
}

/** Warning codes; reported for review, never blocking */
export enum WarningCode {
    ORPHAN_MAIN_SYMPTOM = 'OrphanMainSymptom',
    ZERO_WEIGHT_DISEASE = 'ZeroWeightDisease',
    MISSING_DEPARTMENT_SHARE = 'MissingDepartmentShare',
}

export interface Violation {
    code: ViolationCode;
    kind: EntityKind;
    entityId: string;
    message: string;

    /** Other entities involved, e.g. every disease sharing a main symptom */
    related?: string[];
}

export interface ValidationWarning {
    code: WarningCode;
    kind: EntityKind;

    /** Entity id; the department name for `MissingDepartmentShare` */
    entityId: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    violations: Violation[];
    warnings: ValidationWarning[];
}

// ─── Reassignment ────────────────────────────────────────

export type ReassignmentChange =
    | { type: 'moved'; kind: EntityKind; entityId: string; from: string | null; to: string }
    | { type: 'removed'; entityId: string; department: string };

// ─── Pruning ─────────────────────────────────────────────

export interface PruneReport {
    diseases: string[];
    symptoms: string[];
    examinations: string[];
    treatments: string[];
}

// ─── Weights ─────────────────────────────────────────────

export interface WeightChange {
    diseaseId: string;
    department: string;
    raw: number;
    normalized: number;
}

export interface WeightReport {
    /** Normalized department shares (sum to 1 over present departments) */
    shares: Record<string, number>;
    changes: WeightChange[];
    warnings: ValidationWarning[];
}

// ─── Whole run ───────────────────────────────────────────

export interface PackageSummary {
    tag: string;
    version: string;
    priority: number;
    counts: Record<EntityKind, number>;
}

/**
 * Everything a curator reviews before release.
 */
export interface IntegrationReport {
    packages: PackageSummary[];
    resolution: ResolutionReport;
    validation: ValidationResult;
    reassignments: ReassignmentChange[];
    pruned: PruneReport;
    weights: WeightReport | null;

    /** Result of the gate run right before export (absent when the run halted earlier) */
    finalValidation: ValidationResult | null;
}
