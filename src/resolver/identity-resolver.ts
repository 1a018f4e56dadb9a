import {
    EntityKind,
    type ContentGraph,
    type ContentPackage,
    type Disease,
    type Entity,
    type Examination,
    type MergeDirective,
    type MergeReason,
    type MergeRecord,
    type NearDuplicate,
    type ResolutionReport,
    type ResolverConfig,
    type Symptom,
    type Treatment,
} from '../types/index.js';
import { graphFrom, unique } from '../graph/content-graph.js';
import { compareTags } from '../loader/package-loader.js';
import { findSimilarPairs } from '../nlp/similarity.js';
import { UnknownEntityReferenceError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { normalizeName } from './normalize.js';
import { UnionFind } from './union-find.js';

/**
 * Result of identity resolution.
 */
export interface ResolutionResult {
    graph: ContentGraph;
    report: ResolutionReport;
}

/**
 * One equivalence class of instances for a single entity kind.
 */
interface EntityClass<T extends Entity> {
    canonical: T;
    members: T[];
}

/**
 * Resolution state for one entity kind.
 */
class KindTable<T extends Entity> {
    /** Canonical id → class */
    readonly classes = new Map<string, EntityClass<T>>();

    /** Instance key → canonical id */
    readonly canonicalOf = new Map<string, string>();

    /** Local id → canonical id (instances sharing an id always share a class) */
    readonly byId = new Map<string, string>();

    /** Instance keys moved into another class by a merge directive */
    readonly directiveMoves = new Set<string>();

    constructor(readonly kind: EntityKind) {}

    /**
     * Look up the canonical id for a reference: a local id, or a
     * package-qualified `tag/id`.
     */
    lookup(ref: string): string | undefined {
        return this.canonicalOf.get(ref) ?? this.byId.get(ref);
    }
}

/**
 * Identity Resolver.
 *
 * Partitions every kind's instances into equivalence classes (same
 * normalized name, or same id) and collapses each class onto the instance
 * from the highest-priority package (ties: lexically smaller tag, then id).
 * Explicit merge directives then join further classes. Finally every
 * reference is rewritten to canonical ids and look-alike names are flagged.
 *
 * @param packages - Loaded packages, in any order
 * @param merges - Curator merge directives, applied in order
 * @param config - Resolver settings
 */
export function resolveIdentities(
    packages: readonly ContentPackage[],
    merges: readonly MergeDirective[],
    config: ResolverConfig
): ResolutionResult {
    const logger = getLogger();
    const sorted = [...packages].sort((a, b) => compareTags(a.tag, b.tag));
    const priorities = new Map(sorted.map((p) => [p.tag, p.priority]));

    const diseases = buildTable(EntityKind.DISEASE, sorted.flatMap((p) => p.diseases), priorities);
    const symptoms = buildTable(EntityKind.SYMPTOM, sorted.flatMap((p) => p.symptoms), priorities);
    const examinations = buildTable(EntityKind.EXAMINATION, sorted.flatMap((p) => p.examinations), priorities);
    const treatments = buildTable(EntityKind.TREATMENT, sorted.flatMap((p) => p.treatments), priorities);

    for (const directive of merges) {
        switch (directive.kind) {
            case EntityKind.DISEASE:
                applyMergeDirective(diseases, directive);
                break;
            case EntityKind.SYMPTOM:
                applyMergeDirective(symptoms, directive);
                break;
            case EntityKind.EXAMINATION:
                applyMergeDirective(examinations, directive);
                break;
            case EntityKind.TREATMENT:
                applyMergeDirective(treatments, directive);
                break;
        }
    }

    const symptomRef = refResolver(symptoms);
    const examinationRef = refResolver(examinations);
    const treatmentRef = refResolver(treatments);

    const graph = graphFrom({
        diseases: canonicals(diseases).map((d): Disease => {
            const mainSymptom = symptomRef(d.mainSymptom);
            return {
                ...d,
                tags: unique(d.tags),
                mainSymptom,
                secondarySymptoms: unique(d.secondarySymptoms.map(symptomRef)).filter((s) => s !== mainSymptom),
            };
        }),
        symptoms: canonicals(symptoms).map(
            (s): Symptom => ({
                ...s,
                examinations: unique(s.examinations.map(examinationRef)),
                treatment: s.treatment === null ? null : treatmentRef(s.treatment),
                collapseSymptoms: unique(s.collapseSymptoms.map(symptomRef)),
            })
        ),
        examinations: canonicals(examinations).map(
            (e): Examination => ({
                ...e,
                labPeers: unique(e.labPeers.map(examinationRef)).filter((peer) => peer !== e.id),
            })
        ),
        treatments: canonicals(treatments).map(
            (t): Treatment => ({
                ...t,
                complicationSymptoms: unique(t.complicationSymptoms.map(symptomRef)),
            })
        ),
    });

    const threshold = config.nearDuplicateThreshold;
    const report: ResolutionReport = {
        merges: [
            ...mergeRecords(diseases, priorities),
            ...mergeRecords(symptoms, priorities),
            ...mergeRecords(examinations, priorities),
            ...mergeRecords(treatments, priorities),
        ],
        nearDuplicates: [
            ...nearDuplicates(EntityKind.DISEASE, graph.disease, threshold),
            ...nearDuplicates(EntityKind.SYMPTOM, graph.symptom, threshold),
            ...nearDuplicates(EntityKind.EXAMINATION, graph.examination, threshold),
            ...nearDuplicates(EntityKind.TREATMENT, graph.treatment, threshold),
        ],
    };

    logger.info(
        {
            packages: sorted.length,
            merges: report.merges.length,
            nearDuplicates: report.nearDuplicates.length,
            diseases: graph.disease.size,
            symptoms: graph.symptom.size,
            examinations: graph.examination.size,
            treatments: graph.treatment.size,
        },
        'Identities resolved'
    );

    return { graph, report };
}

/**
 * Key that identifies one instance across all packages.
 * Tags never contain "/", so the key splits unambiguously.
 */
export function instanceKey(entity: { packageTag: string; id: string }): string {
    return `${entity.packageTag}/${entity.id}`;
}

// ─── Internal helpers ─────────────────────────────────

function buildTable<T extends Entity>(
    kind: EntityKind,
    instances: T[],
    priorities: ReadonlyMap<string, number>
): KindTable<T> {
    const table = new KindTable<T>(kind);
    const sets = new UnionFind();
    const byKey = new Map<string, T>();
    const firstByName = new Map<string, string>();
    const firstById = new Map<string, string>();

    for (const instance of instances) {
        const key = instanceKey(instance);
        byKey.set(key, instance);
        sets.add(key);

        const name = normalizeName(instance.name, instance.packageTag);
        const sameName = firstByName.get(name);
        if (sameName === undefined) firstByName.set(name, key);
        else sets.union(sameName, key);

        const sameId = firstById.get(instance.id);
        if (sameId === undefined) firstById.set(instance.id, key);
        else sets.union(sameId, key);
    }

    for (const keys of sets.groups().values()) {
        const members = keys.map((key) => byKey.get(key)).filter((m): m is T => m !== undefined);
        members.sort((a, b) => compareCanonical(a, b, priorities));
        const canonical = members[0];
        if (canonical === undefined) continue;

        table.classes.set(canonical.id, { canonical, members });
        for (const member of members) {
            table.canonicalOf.set(instanceKey(member), canonical.id);
            table.byId.set(member.id, canonical.id);
        }
    }

    return table;
}

/**
 * Canonical order: higher priority first, then smaller tag, then smaller id.
 */
function compareCanonical(a: Entity, b: Entity, priorities: ReadonlyMap<string, number>): number {
    const byPriority = (priorities.get(b.packageTag) ?? 0) - (priorities.get(a.packageTag) ?? 0);
    if (byPriority !== 0) return byPriority;
    return compareTags(a.packageTag, b.packageTag) || compareTags(a.id, b.id);
}

function applyMergeDirective<T extends Entity>(table: KindTable<T>, directive: MergeDirective): void {
    const logger = getLogger();
    const targetId = table.lookup(directive.into);
    if (targetId === undefined) {
        throw new UnknownEntityReferenceError(directive.into, table.kind, 'merge directive target');
    }

    // Validate every id before touching the table
    const sourceIds = directive.ids.map((ref) => {
        const id = table.lookup(ref);
        if (id === undefined) {
            throw new UnknownEntityReferenceError(ref, table.kind, 'merge directive');
        }
        return id;
    });

    const target = table.classes.get(targetId);
    if (!target) {
        throw new UnknownEntityReferenceError(directive.into, table.kind, 'merge directive target');
    }

    for (const sourceId of unique(sourceIds)) {
        if (sourceId === targetId) continue;
        const source = table.classes.get(sourceId);
        if (!source) continue;

        for (const member of source.members) {
            table.canonicalOf.set(instanceKey(member), targetId);
            table.byId.set(member.id, targetId);
            table.directiveMoves.add(instanceKey(member));
            target.members.push(member);
        }
        table.classes.delete(sourceId);
        logger.debug({ kind: table.kind, from: sourceId, into: targetId }, 'Merge directive applied');
    }
}

function canonicals<T extends Entity>(table: KindTable<T>): T[] {
    return [...table.classes.values()].map((c) => c.canonical);
}

/**
 * Rewrites a reference to its canonical id; unknown refs pass through
 * unchanged for the validator to report as dangling.
 */
function refResolver<T extends Entity>(table: KindTable<T>): (ref: string) => string {
    return (ref) => table.lookup(ref) ?? ref;
}

function mergeRecords<T extends Entity>(
    table: KindTable<T>,
    priorities: ReadonlyMap<string, number>
): MergeRecord[] {
    const records: MergeRecord[] = [];
    const ordered = [...table.classes.values()].sort((a, b) => compareTags(a.canonical.id, b.canonical.id));

    for (const { canonical, members } of ordered) {
        const rest = members
            .filter((m) => m !== canonical)
            .sort((a, b) => compareCanonical(a, b, priorities));

        for (const member of rest) {
            records.push({
                kind: table.kind,
                supersededId: member.id,
                supersededPackage: member.packageTag,
                canonicalId: canonical.id,
                canonicalPackage: canonical.packageTag,
                reason: mergeReason(table, member, canonical),
            });
        }
    }

    return records;
}

function mergeReason<T extends Entity>(table: KindTable<T>, member: T, canonical: T): MergeReason {
    if (table.directiveMoves.has(instanceKey(member))) return 'directive';
    return member.id === canonical.id ? 'id' : 'name';
}

function nearDuplicates<T extends Entity>(
    kind: EntityKind,
    entities: ReadonlyMap<string, T>,
    threshold: number
): NearDuplicate[] {
    const items = [...entities.values()];
    const pairs = findSimilarPairs(items, threshold);

    return pairs.map((pair): NearDuplicate => ({
        kind,
        ids: [pair.a, pair.b],
        names: [entities.get(pair.a)?.name ?? pair.a, entities.get(pair.b)?.name ?? pair.b],
        similarity: pair.similarity,
    }));
}
