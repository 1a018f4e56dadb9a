import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadPackages, parsePackage } from '../loader/package-loader.js';
import { loadDirectives, parseDirectives, splitDirectives } from '../loader/directives.js';
import { ConfigError, PackageLoadError } from '../utils/errors.js';
import { EntityKind } from '../types/index.js';

// Helper: write a package directory
function writePackage(dir: string, manifest: object, files: Record<string, unknown> = {}): void {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'medpack.json'), JSON.stringify(manifest));
    for (const [name, value] of Object.entries(files)) {
        fs.writeFileSync(path.join(dir, name), typeof value === 'string' ? value : JSON.stringify(value));
    }
}

describe('parsePackage', () => {
    it('should apply defaults and tag every entity', () => {
        const pkg = parsePackage({
            manifest: { tag: 'cardio' },
            diseases: [{ id: 'angina', name: 'Angina', department: 'cardiology', mainSymptom: 'chest_pain' }],
        });

        expect(pkg).toMatchObject({ tag: 'cardio', version: '0.0.0', priority: 0, symptoms: [] });
        expect(pkg.diseases[0]).toMatchObject({
            id: 'angina',
            tags: [],
            secondarySymptoms: [],
            removed: false,
            packageTag: 'cardio',
        });
    });

    it('should list schema problems', () => {
        try {
            parsePackage({ manifest: { tag: 'bad tag' }, treatments: [{ id: 't', name: 'T', kind: 'Magic' }] });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(PackageLoadError);
            if (error instanceof PackageLoadError) {
                expect(error.issues).toHaveLength(2);
                expect(error.packagePath).toBe('<memory>');
            }
        }
    });

    it('should reject duplicate ids inside one package', () => {
        expect(() =>
            parsePackage({
                manifest: { tag: 'cardio' },
                examinations: [
                    { id: 'ecg', name: 'ECG', facility: 'Lab' },
                    { id: 'ecg', name: 'Electrocardiogram', facility: 'Lab' },
                ],
            })
        ).toThrow('examinations: duplicate id "ecg"');
    });
});

describe('loadPackages', () => {
    let root: string;

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'medpack-test-'));
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('should load every package under a folder, sorted by tag', async () => {
        writePackage(path.join(root, 'one'), { tag: 'zeta', priority: 2 }, {
            'treatments.json': [{ id: 'rest', name: 'Rest', kind: 'NonSurgical' }],
        });
        writePackage(path.join(root, 'two'), { tag: 'alpha', version: '1.2.0' });

        const packages = await loadPackages([root]);

        expect(packages.map((p) => p.tag)).toEqual(['alpha', 'zeta']);
        expect(packages[1]?.treatments.map((t) => t.id)).toEqual(['rest']);
        expect(packages[1]?.sourcePath).toBe(path.join(root, 'one'));
    });

    it('should load a directory that is itself a package', async () => {
        writePackage(root, { tag: 'solo' });
        const packages = await loadPackages([root]);
        expect(packages.map((p) => p.tag)).toEqual(['solo']);
    });

    it('should report invalid JSON', async () => {
        writePackage(root, { tag: 'broken' }, { 'symptoms.json': '[{ not json' });
        await expect(loadPackages([root])).rejects.toBeInstanceOf(PackageLoadError);
    });

    it('should reject two packages with the same tag', async () => {
        writePackage(path.join(root, 'a'), { tag: 'dup' });
        writePackage(path.join(root, 'b'), { tag: 'dup' });
        await expect(loadPackages([root])).rejects.toThrow('package tag "dup" is already used');
    });

    it('should reject a folder without packages', async () => {
        await expect(loadPackages([root])).rejects.toThrow('no medpack.json found');
    });

    it('should read a directive file', async () => {
        const file = path.join(root, 'directives.json');
        fs.writeFileSync(
            file,
            JSON.stringify({
                directives: [{ op: 'moveToDepartment', entityId: 'angina', department: 'emergency' }],
            })
        );

        expect(await loadDirectives(file)).toEqual([
            { op: 'moveToDepartment', entityId: 'angina', department: 'emergency' },
        ]);
    });
});

describe('Directives', () => {
    it('should split merges from reassignments keeping order', () => {
        const directives = parseDirectives({
            directives: [
                { op: 'restrictToCategory', department: 'psychology', keep: { tagsAny: ['mental-health'] } },
                { op: 'merge', kind: 'examination', ids: ['blood_panel'], into: 'blood_test' },
                { op: 'moveToDepartment', entityId: 'migraine', department: 'neurology', kind: 'disease' },
            ],
        });

        const { merges, reassignments } = splitDirectives(directives);
        expect(merges).toEqual([
            { op: 'merge', kind: EntityKind.EXAMINATION, ids: ['blood_panel'], into: 'blood_test' },
        ]);
        expect(reassignments.map((d) => d.op)).toEqual(['restrictToCategory', 'moveToDepartment']);
    });

    it('should reject an empty keep rule and unknown operations', () => {
        expect(() =>
            parseDirectives({ directives: [{ op: 'restrictToCategory', department: 'psychology', keep: {} }] })
        ).toThrow(ConfigError);
        expect(() => parseDirectives({ directives: [{ op: 'delete', entityId: 'x' }] })).toThrow(ConfigError);
    });
});
