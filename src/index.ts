export * from './types/index.js';
export * from './utils/errors.js';
export { initLogger, getLogger } from './utils/logger.js';
export { resolveConfig, mergeConfig, type ConfigOverrides } from './utils/config.js';
export { loadPackages, parsePackage, MANIFEST_FILE } from './loader/package-loader.js';
export { loadDirectives, parseDirectives, splitDirectives } from './loader/directives.js';
export { resolveIdentities, type ResolutionResult } from './resolver/identity-resolver.js';
export { normalizeName } from './resolver/normalize.js';
export { validateGraph, countByCode, type ValidatorOptions } from './validator/conflict-validator.js';
export { applyReassignments, compileCategoryRule, type ReassignmentResult } from './reassignment/reassignment-engine.js';
export { pruneGraph, type PruneResult } from './pruning/prune.js';
export { normalizeWeights, type WeightResult } from './weights/normalizer.js';
export { exportGraph, sortExaminations } from './exporters/export.js';
export { rankExaminations, PRIORITY_FLOOR, type ExaminationRank } from './exporters/priority.js';
export { ENGINE_ROOMS } from './exporters/engine-schema.js';
export { formatReport, summarizeDepartments } from './report/format.js';
export { runPipeline, resolveAndValidate, type PipelineResult, type PipelineConfig } from './pipeline/pipeline.js';
export { RunHistoryDatabase, type RunHistoryOptions } from './storage/database.js';
export { VERSION } from './version.js';
