import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, ENTITY_KINDS, EntityKind, FACILITY_KINDS, ViolationCode, WarningCode } from '../types/index.js';

describe('Types', () => {
    describe('EntityKind', () => {
        it('should list the four kinds in report order', () => {
            expect(ENTITY_KINDS).toEqual(['disease', 'symptom', 'examination', 'treatment']);
            expect(Object.values(EntityKind)).toHaveLength(4);
        });
    });

    describe('Codes', () => {
        it('should have 6 violation codes', () => {
            expect(Object.values(ViolationCode)).toHaveLength(6);
        });

        it('violation and warning codes should not overlap', () => {
            const violations = new Set<string>(Object.values(ViolationCode));
            for (const code of Object.values(WarningCode)) {
                expect(violations.has(code)).toBe(false);
            }
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should have sensible defaults', () => {
            expect(DEFAULT_CONFIG.format).toBe('xml');
            expect(DEFAULT_CONFIG.facilityKinds).toEqual([...FACILITY_KINDS]);
            expect(DEFAULT_CONFIG.resolver.nearDuplicateThreshold).toBe(0.5);
            expect(DEFAULT_CONFIG.weights).toEqual({ baseline: 1, scale: 1000, fallbackShare: 1, departmentShares: {} });
        });

        it('should not repeat a department', () => {
            expect(new Set(DEFAULT_CONFIG.departments).size).toBe(DEFAULT_CONFIG.departments.length);
        });
    });
});
