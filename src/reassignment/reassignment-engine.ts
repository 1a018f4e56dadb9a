import {
    EntityKind,
    type CategoryRule,
    type ContentGraph,
    type DiseasePredicate,
    type MoveToDepartmentDirective,
    type ReassignmentChange,
    type ReassignmentDirective,
    type RestrictToCategoryDirective,
} from '../types/index.js';
import { cloneGraph } from '../graph/content-graph.js';
import {
    ReassignmentAbortedError,
    UnknownDepartmentError,
    UnknownEntityReferenceError,
} from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export interface ReassignmentOptions {
    departments: readonly string[];
}

export interface ReassignmentResult {
    graph: ContentGraph;
    changes: ReassignmentChange[];
}

/**
 * Reassignment Engine.
 *
 * Applies curator directives in declaration order to a copy of the graph;
 * each directive sees the effect of the ones before it.
 *
 * On the first failing directive the engine stops: the directives before it
 * stay applied to the working copy, which is attached to the thrown
 * `ReassignmentAbortedError` together with the number applied. The input
 * graph is never modified.
 */
export function applyReassignments(
    graph: ContentGraph,
    directives: readonly ReassignmentDirective[],
    options: ReassignmentOptions
): ReassignmentResult {
    const logger = getLogger();
    const working = cloneGraph(graph);
    const departments = new Set(options.departments);
    const changes: ReassignmentChange[] = [];

    directives.forEach((directive, index) => {
        try {
            const applied =
                directive.op === 'moveToDepartment'
                    ? moveToDepartment(working, directive, departments, options.departments)
                    : restrictToCategory(working, directive, departments, options.departments);
            changes.push(...applied);
            logger.debug({ index, op: directive.op, changes: applied.length }, 'Directive applied');
        } catch (error) {
            const cause = error instanceof Error ? error : new Error(String(error));
            logger.error(
                { index, op: directive.op, applied: index, error: cause.message },
                'Reassignment aborted; earlier directives remain applied to the working graph'
            );
            throw new ReassignmentAbortedError(index, working, cause);
        }
    });

    logger.info({ directives: directives.length, changes: changes.length }, 'Reassignments applied');
    return { graph: working, changes };
}

/**
 * Compile a keep rule into a predicate.
 */
export function compileCategoryRule(rule: CategoryRule): DiseasePredicate {
    const ids = new Set(rule.ids ?? []);
    const hasTagClause = rule.tagsAny !== undefined || rule.tagsAll !== undefined;

    return (disease) => {
        if (ids.has(disease.id)) return true;
        if (!hasTagClause) return false;

        const tags = new Set(disease.tags);
        if (rule.tagsAny && !rule.tagsAny.some((t) => tags.has(t))) return false;
        if (rule.tagsAll && !rule.tagsAll.every((t) => tags.has(t))) return false;
        return true;
    };
}

// ─── Directives ──────────────────────────────────────────

function moveToDepartment(
    graph: ContentGraph,
    directive: MoveToDepartmentDirective,
    departments: ReadonlySet<string>,
    known: readonly string[]
): ReassignmentChange[] {
    if (!departments.has(directive.department)) {
        throw new UnknownDepartmentError(directive.department, known);
    }

    const { entityId, department } = directive;

    if (directive.kind !== EntityKind.SYMPTOM) {
        const disease = graph.disease.get(entityId);
        if (disease) {
            const from = disease.department;
            disease.department = department;
            return [{ type: 'moved', kind: EntityKind.DISEASE, entityId, from, to: department }];
        }
    }

    if (directive.kind !== EntityKind.DISEASE) {
        const symptom = graph.symptom.get(entityId);
        if (symptom) {
            const from = symptom.department ?? null;
            symptom.department = department;
            return [{ type: 'moved', kind: EntityKind.SYMPTOM, entityId, from, to: department }];
        }
    }

    throw new UnknownEntityReferenceError(entityId, directive.kind, 'moveToDepartment');
}

function restrictToCategory(
    graph: ContentGraph,
    directive: RestrictToCategoryDirective,
    departments: ReadonlySet<string>,
    known: readonly string[]
): ReassignmentChange[] {
    if (!departments.has(directive.department)) {
        throw new UnknownDepartmentError(directive.department, known);
    }

    let keep: DiseasePredicate;
    if (typeof directive.keep === 'function') {
        keep = directive.keep;
    } else {
        for (const id of directive.keep.ids ?? []) {
            if (!graph.disease.has(id)) {
                throw new UnknownEntityReferenceError(id, EntityKind.DISEASE, 'restrictToCategory keep.ids');
            }
        }
        keep = compileCategoryRule(directive.keep);
    }

    const changes: ReassignmentChange[] = [];
    for (const disease of graph.disease.values()) {
        if (disease.removed || disease.department !== directive.department) continue;
        if (!keep(disease)) {
            disease.removed = true;
            changes.push({ type: 'removed', entityId: disease.id, department: disease.department });
        }
    }
    return changes;
}
