import type { Disease, Symptom, Examination, Treatment } from './entity.js';

/**
 * ContentPackage: the provenance unit.
 * A named, versioned bundle loaded together. Ids are unique per kind
 * within one package; across packages they may collide until resolution.
 */
export interface ContentPackage {
    /** Package tag, e.g. "cardiology" */
    tag: string;

    version: string;

    /** Curator-assigned merge priority; higher wins during identity resolution */
    priority: number;

    /** Directory the package was loaded from (absent for in-memory packages) */
    sourcePath?: string;

    diseases: Disease[];
    symptoms: Symptom[];
    examinations: Examination[];
    treatments: Treatment[];
}
