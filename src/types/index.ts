/**
 * Barrel export for all shared types.
 */
export { EntityKind, ENTITY_KINDS } from './entity.js';
export type {
    Entity,
    EntityByKind,
    Disease,
    Symptom,
    Examination,
    Treatment,
    TreatmentKind,
} from './entity.js';
export type { ContentPackage } from './package.js';
export type { ContentGraph } from './graph.js';
export type {
    CategoryRule,
    DiseasePredicate,
    Directive,
    MergeDirective,
    MoveToDepartmentDirective,
    RestrictToCategoryDirective,
    ReassignmentDirective,
} from './directive.js';
export { ViolationCode, WarningCode } from './report.js';
export type {
    MergeReason,
    MergeRecord,
    NearDuplicate,
    ResolutionReport,
    Violation,
    ValidationWarning,
    ValidationResult,
    ReassignmentChange,
    PruneReport,
    WeightChange,
    WeightReport,
    PackageSummary,
    IntegrationReport,
} from './report.js';
export { DEFAULT_CONFIG, FACILITY_KINDS } from './config.js';
export type {
    FacilityKind,
    LogLevel,
    ExportFormat,
    ResolverConfig,
    WeightConfig,
    MedpackConfig,
    RunRecord,
} from './config.js';
