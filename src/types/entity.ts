/**
 * The four entity kinds that make up a content package.
 */
export enum EntityKind {
    DISEASE = 'disease',
    SYMPTOM = 'symptom',
    EXAMINATION = 'examination',
    TREATMENT = 'treatment',
}

/** All entity kinds, in the order they are listed in reports */
export const ENTITY_KINDS: readonly EntityKind[] = [
    EntityKind.DISEASE,
    EntityKind.SYMPTOM,
    EntityKind.EXAMINATION,
    EntityKind.TREATMENT,
];

/** Treatment kind as the engine distinguishes it */
export type TreatmentKind = 'Surgical' | 'NonSurgical';

/**
 * Disease: the root of the content graph.
 * A disease is cured exactly when its main symptom is cured.
 */
export interface Disease {
    /** Stable id (package-local before resolution, canonical after) */
    id: string;

    name: string;

    /** Department (hospital specialty) the disease belongs to */
    department: string;

    /** Curator tags, e.g. "mental-health" */
    tags: string[];

    /** Symptom id; never empty */
    mainSymptom: string;

    secondarySymptoms: string[];

    /** Raw patient-generation weight; the configured baseline applies when absent */
    frequency?: number;

    /** Normalized weight, written by the weight normalizer */
    weight?: number;

    treatmentCost?: number;

    /** Set by `restrictToCategory`; removed diseases are dropped by pruning */
    removed: boolean;

    /** Tag of the package the canonical attributes came from */
    packageTag: string;
}

export interface Symptom {
    id: string;
    name: string;
    department?: string;
    isMain: boolean;

    /** Examination ids that can detect this symptom */
    examinations: string[];

    /** The single treatment that cures this symptom */
    treatment: string | null;

    severity?: number;
    discomfort?: number;
    complication?: boolean;

    /** Symptoms this one may collapse into (kept together by pruning) */
    collapseSymptoms: string[];

    packageTag: string;
}

export interface Examination {
    id: string;
    name: string;

    /** Facility (room) kind; validated against the configured closed set */
    facility: string;

    duration?: number;
    discomfort?: number;

    /** Examinations processed together in the lab (undirected) */
    labPeers: string[];

    packageTag: string;
}

export interface Treatment {
    id: string;
    name: string;
    kind: TreatmentKind;
    hospitalization: boolean;
    discomfort?: number;

    /** Symptoms a surgical treatment may cause as complications */
    complicationSymptoms: string[];

    packageTag: string;
}

/** Any entity of the content graph */
export type Entity = Disease | Symptom | Examination | Treatment;

/** Maps each kind to its entity interface */
export interface EntityByKind {
    [EntityKind.DISEASE]: Disease;
    [EntityKind.SYMPTOM]: Symptom;
    [EntityKind.EXAMINATION]: Examination;
    [EntityKind.TREATMENT]: Treatment;
}
