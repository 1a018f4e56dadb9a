import type { ContentGraph, EntityKind } from '../types/index.js';

/**
 * A directive or reference names an entity that does not exist.
 */
export class UnknownEntityReferenceError extends Error {
    public readonly entityId: string;
    public readonly kind: EntityKind | undefined;

    constructor(entityId: string, kind?: EntityKind, context?: string) {
        const what = kind ? `${kind} "${entityId}"` : `entity "${entityId}"`;
        super(`Unknown ${what}${context ? ` (${context})` : ''}`);
        this.name = 'UnknownEntityReferenceError';
        this.entityId = entityId;
        this.kind = kind;
    }
}

/**
 * A directive names a department that is not configured.
 */
export class UnknownDepartmentError extends Error {
    public readonly department: string;

    constructor(department: string, known: readonly string[]) {
        super(`Unknown department "${department}". Known: ${known.join(', ')}`);
        this.name = 'UnknownDepartmentError';
        this.department = department;
    }
}

/**
 * The exporter cannot represent an entity in the engine schema.
 * Reaching this after a clean validation means the validator missed a case.
 */
export class UnsupportedEntityShapeError extends Error {
    public readonly kind: EntityKind;
    public readonly entityId: string;

    constructor(kind: EntityKind, entityId: string, reason: string) {
        super(`Cannot export ${kind} "${entityId}": ${reason}`);
        this.name = 'UnsupportedEntityShapeError';
        this.kind = kind;
        this.entityId = entityId;
    }
}

/**
 * A content package could not be read or failed schema validation.
 */
export class PackageLoadError extends Error {
    public readonly packagePath: string;
    public readonly issues: string[];

    constructor(packagePath: string, issues: string[]) {
        super(`Failed to load package at ${packagePath}:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
        this.name = 'PackageLoadError';
        this.packagePath = packagePath;
        this.issues = issues;
    }
}

/**
 * A directive file or config file is malformed.
 */
export class ConfigError extends Error {
    public readonly filePath: string;
    public readonly issues: string[];

    constructor(filePath: string, issues: string[]) {
        super(`Invalid configuration in ${filePath}:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
        this.name = 'ConfigError';
        this.filePath = filePath;
        this.issues = issues;
    }
}

/**
 * Reassignment stopped at a failing directive.
 * Directives before it stay applied to `graph`; the run is rejected.
 */
export class ReassignmentAbortedError extends Error {
    public readonly appliedCount: number;
    public readonly graph: ContentGraph;
    public override readonly cause: Error;

    constructor(appliedCount: number, graph: ContentGraph, cause: Error) {
        super(`Reassignment aborted after ${appliedCount} directive(s): ${cause.message}`);
        this.name = 'ReassignmentAbortedError';
        this.appliedCount = appliedCount;
        this.graph = graph;
        this.cause = cause;
    }
}
