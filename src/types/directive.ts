import type { Disease, EntityKind } from './entity.js';

/**
 * Data form of a `restrictToCategory` keep predicate, as written in a
 * directive file. A disease is kept when its id is listed in `ids`, or
 * when it passes every tag clause that is given.
 */
export interface CategoryRule {
    /** Keep when the disease carries at least one of these tags */
    tagsAny?: string[];

    /** Keep when the disease carries all of these tags */
    tagsAll?: string[];

    /** Keep these disease ids regardless of tags */
    ids?: string[];
}

export type DiseasePredicate = (disease: Disease) => boolean;

/**
 * Collapse a set of entities into one canonical entity.
 * Applied by the identity resolver after automatic merging.
 */
export interface MergeDirective {
    op: 'merge';
    kind: EntityKind;
    ids: string[];
    into: string;
}

/** Move a disease or symptom to another department */
export interface MoveToDepartmentDirective {
    op: 'moveToDepartment';
    entityId: string;
    department: string;
    /** Disambiguates when a disease and a symptom share the id; disease wins otherwise */
    kind?: EntityKind.DISEASE | EntityKind.SYMPTOM;
}

/** Remove every disease of a department that the predicate rejects */
export interface RestrictToCategoryDirective {
    op: 'restrictToCategory';
    department: string;
    keep: CategoryRule | DiseasePredicate;
}

export type ReassignmentDirective = MoveToDepartmentDirective | RestrictToCategoryDirective;

export type Directive = MergeDirective | ReassignmentDirective;
