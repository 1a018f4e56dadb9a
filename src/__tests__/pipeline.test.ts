import { describe, it, expect } from 'vitest';
import { runPipeline } from '../pipeline/pipeline.js';
import { formatReport, summarizeDepartments } from '../report/format.js';
import {
    ReassignmentAbortedError,
    UnknownEntityReferenceError,
    UnsupportedEntityShapeError,
} from '../utils/errors.js';
import { DEFAULT_CONFIG, EntityKind, ViolationCode } from '../types/index.js';
import { combine, condition, makePackage } from './helpers.js';

const config = { ...DEFAULT_CONFIG, format: 'json' as const };

const psych = makePackage(
    'psych',
    combine(
        condition('depression', 'psychology', { tags: ['mental-health'], frequency: 3 }),
        condition('concussion', 'psychology', { tags: ['trauma'] }),
        condition('migraine', 'neurology')
    )
);

describe('runPipeline', () => {
    it('should integrate, prune and weight a valid set of packages', () => {
        const result = runPipeline(
            [psych],
            [{ op: 'restrictToCategory', department: 'psychology', keep: { tagsAny: ['mental-health'] } }],
            config
        );

        expect(result.status).toBe('ok');
        expect([...result.graph.disease.keys()]).toEqual(['depression', 'migraine']);
        expect(result.report.pruned.diseases).toEqual(['concussion']);
        expect(result.report.weights?.shares).toEqual({ neurology: 0.5, psychology: 0.5 });
        expect(result.report.finalValidation?.valid).toBe(true);
        expect(result.output).toBeDefined();

        const json: unknown = JSON.parse(result.output ?? '');
        expect(json).toMatchObject({ diseases: [{ id: 'depression', weight: 500 }, { id: 'migraine', weight: 500 }] });
    });

    it('should halt before export when the graph is invalid', () => {
        const broken = makePackage('broken', condition('rash', 'dermatology', { facility: 'Helipad' }));

        const result = runPipeline([broken], [], config);

        expect(result.status).toBe('invalid');
        expect(result.output).toBeUndefined();
        expect(result.report.validation.violations.map((v) => v.code)).toEqual([ViolationCode.UNKNOWN_FACILITY]);
        expect(result.report.weights).toBeNull();
        expect(result.report.finalValidation).toBeNull();
    });

    it('should halt when two packages claim the same main symptom', () => {
        const derm = makePackage('derm', {
            diseases: [{ id: 'severe_rash', name: 'Severe Rash', department: 'dermatology', mainSymptom: 'skin_itching' }],
            symptoms: [
                { id: 'skin_itching', name: 'Skin Itching', isMain: true, examinations: ['look'], treatment: 'cream' },
            ],
            examinations: [{ id: 'look', name: 'Visual Check', facility: 'DoctorOffice' }],
            treatments: [{ id: 'cream', name: 'Cream', kind: 'NonSurgical' }],
        });
        const allergy = makePackage('allergy', {
            diseases: [
                { id: 'allergic_reaction', name: 'Allergic Reaction', department: 'emergency', mainSymptom: 'itching' },
            ],
            symptoms: [{ id: 'itching', name: 'skin itching', isMain: true, examinations: ['look'], treatment: 'cream' }],
        });

        const result = runPipeline([derm, allergy], [], config);

        expect(result.status).toBe('invalid');
        expect(result.output).toBeUndefined();
        expect(result.report.validation.violations.map((v) => [v.code, v.entityId, v.related])).toEqual([
            [ViolationCode.DUPLICATE_MAIN_SYMPTOM, 'itching', ['allergic_reaction', 'severe_rash']],
        ]);
    });

    it('should fail in the exporter when validation accepts a facility the engine lacks', () => {
        const pack = makePackage('air', condition('lift', 'emergency', { facility: 'Helipad' }));
        const lenient = { ...config, facilityKinds: [...DEFAULT_CONFIG.facilityKinds, 'Helipad'] };

        expect(() => runPipeline([pack], [], lenient)).toThrow(UnsupportedEntityShapeError);
        expect(() => runPipeline([pack], [], lenient)).toThrow('the engine has no room for facility "Helipad"');
    });

    it('should throw on a failing reassignment directive', () => {
        expect(() =>
            runPipeline([psych], [{ op: 'moveToDepartment', entityId: 'migraine', department: 'astrology' }], config)
        ).toThrow(ReassignmentAbortedError);
    });

    it('should throw on a merge directive naming an unknown entity', () => {
        expect(() =>
            runPipeline([psych], [{ op: 'merge', kind: EntityKind.DISEASE, ids: ['ghost'], into: 'migraine' }], config)
        ).toThrow(UnknownEntityReferenceError);
    });

    it('should succeed with nothing to integrate', () => {
        const result = runPipeline([], [], config);
        expect(result.status).toBe('ok');
        expect(result.output).toBe('{\n  "diseases": [],\n  "symptoms": [],\n  "examinations": [],\n  "treatments": []\n}');
    });
});

describe('formatReport', () => {
    it('should summarize the run for review', () => {
        const result = runPipeline(
            [psych],
            [{ op: 'restrictToCategory', department: 'psychology', keep: { tagsAny: ['mental-health'] } }],
            config
        );
        const lines = formatReport(result.report, result.graph).split('\n');

        expect(lines[0]).toBe('# medpack integration report');
        expect(lines).toContain('- psych@1.0.0 (priority 0): 3 disease, 3 symptom, 3 examination, 3 treatment');
        expect(lines).toContain('## Validation: valid');
        expect(lines).toContain('- removed disease concussion from psychology');
        expect(lines).toContain('- diseases: concussion');
        expect(lines).toContain('- psychology: 1 diseases, weight 500.00');
    });

    it('should count diseases per department', () => {
        const result = runPipeline([psych], [], config);
        expect(summarizeDepartments(result.graph)).toEqual([
            { department: 'neurology', diseases: 1, totalWeight: 500 },
            { department: 'psychology', diseases: 2, totalWeight: 500 },
        ]);
    });
});
