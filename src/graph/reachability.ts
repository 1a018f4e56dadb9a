import { DirectedGraph } from 'graphology';
import { toUndirected } from 'graphology-operators';
import { EntityKind, type ContentGraph } from '../types/index.js';
import { retainedDiseases } from './content-graph.js';
import { getLogger } from '../utils/logger.js';

/**
 * Reference relations between graph nodes.
 */
export type Relation = 'main' | 'secondary' | 'detects' | 'treats' | 'collapses' | 'complication';

type NodeAttributes = {
    kind: EntityKind;
    id: string;
};

type EdgeAttributes = {
    relation: Relation;
};

/**
 * Entities reachable from the retained diseases, per kind.
 */
export interface ReachableSet {
    diseases: Set<string>;
    symptoms: Set<string>;
    examinations: Set<string>;
    treatments: Set<string>;
}

/**
 * Node key of an entity in the reference graph.
 */
export function nodeKey(kind: EntityKind, id: string): string {
    return `${kind}:${id}`;
}

/**
 * Build the directed reference graph of a content graph.
 * References to missing entities are left out.
 *
 * Complication edges come only from surgical treatments.
 */
export function buildReferenceGraph(graph: ContentGraph): DirectedGraph<NodeAttributes, EdgeAttributes> {
    const refs = new DirectedGraph<NodeAttributes, EdgeAttributes>();

    for (const kind of [EntityKind.DISEASE, EntityKind.SYMPTOM, EntityKind.EXAMINATION, EntityKind.TREATMENT]) {
        for (const id of graph[kind].keys()) {
            refs.addNode(nodeKey(kind, id), { kind, id });
        }
    }

    const link = (from: string, to: string, relation: Relation) => {
        if (refs.hasNode(from) && refs.hasNode(to) && from !== to) {
            refs.mergeEdge(from, to, { relation });
        }
    };

    for (const disease of graph.disease.values()) {
        const from = nodeKey(EntityKind.DISEASE, disease.id);
        link(from, nodeKey(EntityKind.SYMPTOM, disease.mainSymptom), 'main');
        for (const s of disease.secondarySymptoms) {
            link(from, nodeKey(EntityKind.SYMPTOM, s), 'secondary');
        }
    }

    for (const symptom of graph.symptom.values()) {
        const from = nodeKey(EntityKind.SYMPTOM, symptom.id);
        for (const e of symptom.examinations) {
            link(from, nodeKey(EntityKind.EXAMINATION, e), 'detects');
        }
        if (symptom.treatment !== null) {
            link(from, nodeKey(EntityKind.TREATMENT, symptom.treatment), 'treats');
        }
        for (const s of symptom.collapseSymptoms) {
            link(from, nodeKey(EntityKind.SYMPTOM, s), 'collapses');
        }
    }

    for (const treatment of graph.treatment.values()) {
        if (treatment.kind !== 'Surgical') continue;
        const from = nodeKey(EntityKind.TREATMENT, treatment.id);
        for (const s of treatment.complicationSymptoms) {
            link(from, nodeKey(EntityKind.SYMPTOM, s), 'complication');
        }
    }

    return refs;
}

/**
 * Build the lab-peer graph: examinations processed together.
 * Declared one way, followed both ways.
 */
export function buildLabPeerGraph(graph: ContentGraph) {
    const peers = new DirectedGraph();
    for (const exam of graph.examination.values()) {
        for (const peer of exam.labPeers) {
            if (!graph.examination.has(peer) || peer === exam.id) continue;
            peers.mergeNode(exam.id);
            peers.mergeNode(peer);
            peers.mergeEdge(exam.id, peer);
        }
    }
    return toUndirected(peers);
}

/**
 * Compute the reachable closure from all retained diseases.
 *
 * Follows every reference edge plus lab-peer equivalence, so the result is
 * already a fixed point: anything kept keeps everything it needs.
 */
export function computeReachable(graph: ContentGraph): ReachableSet {
    const refs = buildReferenceGraph(graph);
    const peers = buildLabPeerGraph(graph);

    const visited = new Set<string>();
    const queue: string[] = [];
    const visit = (key: string) => {
        if (!visited.has(key) && refs.hasNode(key)) {
            visited.add(key);
            queue.push(key);
        }
    };

    for (const disease of retainedDiseases(graph)) {
        visit(nodeKey(EntityKind.DISEASE, disease.id));
    }

    for (let head = 0; head < queue.length; head++) {
        const key = queue[head]!;

        refs.forEachOutNeighbor(key, (neighbor) => visit(neighbor));

        const { kind, id } = refs.getNodeAttributes(key);
        if (kind === EntityKind.EXAMINATION && peers.hasNode(id)) {
            peers.forEachNeighbor(id, (peer) => visit(nodeKey(EntityKind.EXAMINATION, peer)));
        }
    }

    const reachable: ReachableSet = {
        diseases: new Set(),
        symptoms: new Set(),
        examinations: new Set(),
        treatments: new Set(),
    };
    for (const key of visited) {
        const { kind, id } = refs.getNodeAttributes(key);
        switch (kind) {
            case EntityKind.DISEASE:
                reachable.diseases.add(id);
                break;
            case EntityKind.SYMPTOM:
                reachable.symptoms.add(id);
                break;
            case EntityKind.EXAMINATION:
                reachable.examinations.add(id);
                break;
            case EntityKind.TREATMENT:
                reachable.treatments.add(id);
                break;
        }
    }

    getLogger().debug(
        { nodes: refs.order, edges: refs.size, reachable: visited.size },
        'Reachable closure computed'
    );
    return reachable;
}
