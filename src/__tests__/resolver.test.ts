import { describe, it, expect } from 'vitest';
import { resolveIdentities, instanceKey } from '../resolver/identity-resolver.js';
import { normalizeName } from '../resolver/normalize.js';
import { UnionFind } from '../resolver/union-find.js';
import { UnknownEntityReferenceError } from '../utils/errors.js';
import { EntityKind, type MergeDirective } from '../types/index.js';
import { makePackage, dump } from './helpers.js';

const settings = { nearDuplicateThreshold: 0.5 };

describe('normalizeName', () => {
    it('should fold case, underscores and dashes', () => {
        expect(normalizeName('Blood_Test')).toBe('blood test');
        expect(normalizeName('  BLOOD -  test ')).toBe('blood test');
    });

    it('should strip a package prefix and bracketed qualifiers', () => {
        expect(normalizeName('Cardio: Blood_Test (ER)', 'cardio')).toBe('blood test');
        expect(normalizeName('cardio - Blood Test [v2]', 'cardio')).toBe('blood test');
    });

    it('should keep a prefix that is not the package tag', () => {
        expect(normalizeName('Neuro: Blood Test', 'cardio')).toBe('neuro: blood test');
    });
});

describe('UnionFind', () => {
    it('should group joined keys under the smallest root', () => {
        const sets = new UnionFind();
        sets.union('c', 'b');
        sets.union('b', 'a');
        sets.add('z');

        expect(sets.find('c')).toBe('a');
        expect([...sets.groups().entries()]).toEqual([
            ['a', ['c', 'b', 'a']],
            ['z', ['z']],
        ]);
    });
});

describe('resolveIdentities', () => {
    const cardio = makePackage(
        'cardio',
        {
            symptoms: [
                {
                    id: 'chest_pain',
                    name: 'Chest Pain',
                    isMain: true,
                    examinations: ['blood_test'],
                    treatment: 'rest',
                },
            ],
            examinations: [{ id: 'blood_test', name: 'Blood Test', facility: 'Lab', duration: 10 }],
            treatments: [{ id: 'rest', name: 'Bed Rest', kind: 'NonSurgical' }],
        },
        1
    );
    const general = makePackage(
        'general',
        {
            examinations: [{ id: 'gen_blood', name: 'blood test', facility: 'Lab', duration: 20 }],
        },
        5
    );

    it('should keep the highest-priority definition of a shared name', () => {
        const { graph, report } = resolveIdentities([cardio, general], [], settings);

        expect([...graph.examination.keys()]).toEqual(['gen_blood']);
        expect(graph.examination.get('gen_blood')).toMatchObject({ duration: 20, packageTag: 'general' });
        expect(report.merges).toEqual([
            {
                kind: EntityKind.EXAMINATION,
                supersededId: 'blood_test',
                supersededPackage: 'cardio',
                canonicalId: 'gen_blood',
                canonicalPackage: 'general',
                reason: 'name',
            },
        ]);
    });

    it('should rewrite references to the canonical id', () => {
        const { graph } = resolveIdentities([cardio, general], [], settings);
        expect(graph.symptom.get('chest_pain')?.examinations).toEqual(['gen_blood']);
    });

    it('should break priority ties by package tag', () => {
        const alpha = makePackage('alpha', { treatments: [{ id: 'a_rest', name: 'Rest', kind: 'NonSurgical' }] });
        const beta = makePackage('beta', { treatments: [{ id: 'b_rest', name: 'REST', kind: 'NonSurgical' }] });

        const { graph } = resolveIdentities([beta, alpha], [], settings);
        expect([...graph.treatment.keys()]).toEqual(['a_rest']);
    });

    it('should merge instances that share an id', () => {
        const a = makePackage('a', { examinations: [{ id: 'xray', name: 'X-Ray', facility: 'Radiology' }] });
        const b = makePackage('b', { examinations: [{ id: 'xray', name: 'Chest Radiograph', facility: 'Radiology' }] }, 2);

        const { graph, report } = resolveIdentities([a, b], [], settings);
        expect(graph.examination.get('xray')?.name).toBe('Chest Radiograph');
        expect(report.merges.map((m) => m.reason)).toEqual(['id']);
    });

    it('should produce the same graph and report for any package order', () => {
        const first = resolveIdentities([cardio, general], [], settings);
        const second = resolveIdentities([general, cardio], [], settings);

        expect(dump(second.graph)).toEqual(dump(first.graph));
        expect(second.report).toEqual(first.report);
    });

    it('should not modify the input packages', () => {
        resolveIdentities([cardio, general], [], settings);
        expect(cardio.symptoms[0]?.examinations).toEqual(['blood_test']);
    });

    describe('near-duplicates and merge directives', () => {
        const lab = makePackage('lab', {
            examinations: [
                { id: 'blood_test', name: 'Blood Test', facility: 'Lab' },
                { id: 'blood_panel', name: 'Blood Panel', facility: 'Lab' },
            ],
        });

        it('should flag look-alike names without merging them', () => {
            const { graph, report } = resolveIdentities([lab], [], settings);

            expect(graph.examination.size).toBe(2);
            expect(report.nearDuplicates).toEqual([
                {
                    kind: EntityKind.EXAMINATION,
                    ids: ['blood_panel', 'blood_test'],
                    names: ['Blood Panel', 'Blood Test'],
                    similarity: 0.5,
                },
            ]);
        });

        it('should apply an explicit merge directive', () => {
            const merge: MergeDirective = {
                op: 'merge',
                kind: EntityKind.EXAMINATION,
                ids: ['blood_panel'],
                into: 'blood_test',
            };
            const { graph, report } = resolveIdentities([lab], [merge], settings);

            expect([...graph.examination.keys()]).toEqual(['blood_test']);
            expect(report.merges).toEqual([
                {
                    kind: EntityKind.EXAMINATION,
                    supersededId: 'blood_panel',
                    supersededPackage: 'lab',
                    canonicalId: 'blood_test',
                    canonicalPackage: 'lab',
                    reason: 'directive',
                },
            ]);
            expect(report.nearDuplicates).toEqual([]);
        });

        it('should reject a directive naming an unknown entity', () => {
            const merge: MergeDirective = {
                op: 'merge',
                kind: EntityKind.EXAMINATION,
                ids: ['blood_smear'],
                into: 'blood_test',
            };
            expect(() => resolveIdentities([lab], [merge], settings)).toThrow(UnknownEntityReferenceError);
        });
    });

    it('should drop a secondary symptom that resolves to the main symptom', () => {
        const pkg = makePackage('derm', {
            diseases: [
                {
                    id: 'rash',
                    name: 'Rash',
                    department: 'dermatology',
                    mainSymptom: 'itch',
                    secondarySymptoms: ['itching', 'redness'],
                },
            ],
            symptoms: [
                { id: 'itch', name: 'Itching', isMain: true },
                { id: 'itching', name: 'itching' },
                { id: 'redness', name: 'Redness' },
            ],
        });

        const { graph } = resolveIdentities([pkg], [], settings);
        expect(graph.disease.get('rash')?.secondarySymptoms).toEqual(['redness']);
    });

    it('should pass unknown references through unchanged', () => {
        const pkg = makePackage('solo', {
            symptoms: [{ id: 'cough', name: 'Cough', examinations: ['missing_exam'] }],
        });
        const { graph } = resolveIdentities([pkg], [], settings);
        expect(graph.symptom.get('cough')?.examinations).toEqual(['missing_exam']);
    });

    it('should key instances by package and id', () => {
        expect(instanceKey({ packageTag: 'cardio', id: 'ecg' })).toBe('cardio/ecg');
    });
});
