import { describe, it, expect } from 'vitest';
import { pruneGraph, prunedCount } from '../pruning/prune.js';
import { buildReferenceGraph, computeReachable, nodeKey } from '../graph/reachability.js';
import { graphFrom } from '../graph/content-graph.js';
import { EntityKind, type Symptom } from '../types/index.js';
import { combine, condition, dump, makePackage, resolveGraph } from './helpers.js';

// Helper: a symptom with its own exam and treatment
function symptomChain(id: string) {
    return {
        symptoms: [{ id, name: `${id}sign`, examinations: [`${id}_exam`], treatment: `${id}_cure` }],
        examinations: [{ id: `${id}_exam`, name: `${id}check`, facility: 'DoctorOffice' }],
        treatments: [{ id: `${id}_cure`, name: `${id}cure`, kind: 'NonSurgical' as const }],
    };
}

describe('Reference graph', () => {
    it('should link diseases to symptoms and symptoms to exams and treatments', () => {
        const graph = resolveGraph(makePackage('general', condition('flu', 'internal_medicine')));
        const refs = buildReferenceGraph(graph);

        expect(refs.order).toBe(4);
        expect(refs.size).toBe(3);
        expect(refs.hasEdge(nodeKey(EntityKind.DISEASE, 'flu'), nodeKey(EntityKind.SYMPTOM, 'flu_main'))).toBe(true);
        expect(refs.getEdgeAttribute(
            nodeKey(EntityKind.SYMPTOM, 'flu_main'),
            nodeKey(EntityKind.TREATMENT, 'flu_cure'),
            'relation'
        )).toBe('treats');
    });
});

describe('computeReachable', () => {
    it('should follow a long collapse chain to its end', () => {
        const length = 5000;
        const symptoms: Symptom[] = Array.from({ length }, (_, i) => ({
            id: `s${i}`,
            name: `stage${i}`,
            isMain: i === 0,
            examinations: ['look'],
            treatment: 'rest',
            collapseSymptoms: i + 1 < length ? [`s${i + 1}`] : [],
            packageTag: 'general',
        }));
        const graph = graphFrom({
            diseases: [
                {
                    id: 'decline',
                    name: 'Decline',
                    department: 'general',
                    tags: [],
                    mainSymptom: 's0',
                    secondarySymptoms: [],
                    removed: false,
                    packageTag: 'general',
                },
            ],
            symptoms,
            examinations: [{ id: 'look', name: 'Look', facility: 'DoctorOffice', labPeers: [], packageTag: 'general' }],
            treatments: [
                {
                    id: 'rest',
                    name: 'Rest',
                    kind: 'NonSurgical',
                    hospitalization: false,
                    complicationSymptoms: [],
                    packageTag: 'general',
                },
            ],
        });

        const reachable = computeReachable(graph);

        expect(reachable.symptoms.size).toBe(length);
        expect(reachable.symptoms.has(`s${length - 1}`)).toBe(true);
        expect([...reachable.examinations]).toEqual(['look']);
        expect([...reachable.treatments]).toEqual(['rest']);
    });
});

describe('pruneGraph', () => {
    it('should drop entities no retained disease reaches', () => {
        const graph = resolveGraph(makePackage('general', combine(condition('flu', 'internal_medicine'), symptomChain('spare'))));

        const { graph: pruned, report } = pruneGraph(graph);

        expect([...pruned.symptom.keys()]).toEqual(['flu_main']);
        expect(report).toEqual({
            diseases: [],
            symptoms: ['spare'],
            examinations: ['spare_exam'],
            treatments: ['spare_cure'],
        });
        expect(prunedCount(report)).toBe(3);
    });

    it('should be idempotent', () => {
        const graph = resolveGraph(makePackage('general', combine(condition('flu', 'internal_medicine'), symptomChain('spare'))));

        const once = pruneGraph(graph);
        const twice = pruneGraph(once.graph);

        expect(dump(twice.graph)).toEqual(dump(once.graph));
        expect(prunedCount(twice.report)).toBe(0);
    });

    it('should keep every symptom a kept symptom may collapse into', () => {
        const base = condition('flu', 'internal_medicine');
        const graph = resolveGraph(
            makePackage(
                'general',
                combine(
                    {
                        ...base,
                        symptoms: [
                            {
                                id: 'flu_main',
                                name: 'fluache',
                                isMain: true,
                                examinations: ['flu_exam'],
                                treatment: 'flu_cure',
                                collapseSymptoms: ['fainting'],
                            },
                        ],
                    },
                    symptomChain('fainting'),
                    symptomChain('coma'),
                    symptomChain('hiccups')
                )
            )
        );
        const fainting = graph.symptom.get('fainting');
        if (fainting) fainting.collapseSymptoms = ['coma'];

        const { graph: pruned, report } = pruneGraph(graph);

        expect([...pruned.symptom.keys()]).toEqual(['coma', 'fainting', 'flu_main']);
        expect(report.symptoms).toEqual(['hiccups']);
        expect(pruned.examination.has('coma_exam')).toBe(true);
    });

    it('should keep lab peers declared on either side', () => {
        const base = condition('flu', 'internal_medicine');
        const graph = resolveGraph(
            makePackage('general', {
                ...base,
                examinations: [
                    { id: 'flu_exam', name: 'flucheck', facility: 'Lab' },
                    { id: 'culture', name: 'Culture', facility: 'Lab', labPeers: ['flu_exam'] },
                    { id: 'biopsy', name: 'Biopsy', facility: 'Lab', labPeers: ['culture'] },
                    { id: 'scan', name: 'Scan', facility: 'Radiology' },
                ],
            })
        );

        const { report } = pruneGraph(graph);
        expect(report.examinations).toEqual(['scan']);
    });

    it('should keep complication symptoms of kept surgical treatments only', () => {
        const graph = resolveGraph(
            makePackage(
                'surgery',
                combine(
                    {
                        diseases: [{ id: 'appendicitis', name: 'Appendicitis', department: 'general_surgery', mainSymptom: 'belly' }],
                        symptoms: [
                            { id: 'belly', name: 'Belly Pain', isMain: true, examinations: ['palpate'], treatment: 'appendectomy' },
                            { id: 'cramp', name: 'Cramp', examinations: ['palpate'], treatment: 'pill' },
                        ],
                        examinations: [{ id: 'palpate', name: 'Palpation', facility: 'DoctorOffice' }],
                        treatments: [
                            { id: 'appendectomy', name: 'Appendectomy', kind: 'Surgical', complicationSymptoms: ['bleeding'] },
                            { id: 'pill', name: 'Pill', kind: 'NonSurgical', complicationSymptoms: ['nausea'] },
                        ],
                    },
                    symptomChain('bleeding'),
                    symptomChain('nausea')
                )
            )
        );

        const { graph: pruned } = pruneGraph(graph);
        expect([...pruned.symptom.keys()]).toEqual(['belly', 'bleeding']);
        expect([...pruned.treatment.keys()]).toEqual(['appendectomy', 'bleeding_cure']);
    });

    it('should drop removed diseases and what only they used', () => {
        const graph = resolveGraph(
            makePackage('general', combine(condition('flu', 'internal_medicine'), condition('cold', 'internal_medicine')))
        );
        const cold = graph.disease.get('cold');
        if (cold) cold.removed = true;

        const reachable = computeReachable(graph);
        expect([...reachable.diseases]).toEqual(['flu']);

        const { graph: pruned, report } = pruneGraph(graph);
        expect([...pruned.disease.keys()]).toEqual(['flu']);
        expect(report.treatments).toEqual(['cold_cure']);
    });

    it('should not modify its input', () => {
        const graph = resolveGraph(makePackage('general', combine(condition('flu', 'internal_medicine'), symptomChain('spare'))));
        pruneGraph(graph);
        expect(graph.symptom.has('spare')).toBe(true);
    });
});
