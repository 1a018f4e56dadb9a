import { parsePackage } from '../loader/package-loader.js';
import type { RawPackageInput } from '../loader/schema.js';
import { resolveIdentities } from '../resolver/identity-resolver.js';
import type { ContentGraph, ContentPackage } from '../types/index.js';

export type PackageContent = Omit<RawPackageInput, 'manifest'>;

// Helper: build a validated package in memory
export function makePackage(tag: string, content: PackageContent, priority = 0): ContentPackage {
    return parsePackage({ manifest: { tag, version: '1.0.0', priority }, ...content });
}

// Helper: a complete disease chain with single-token names
// (disease `id`, symptom `id_main`, examination `id_exam`, treatment `id_cure`)
export function condition(
    id: string,
    department: string,
    options: { frequency?: number; tags?: string[]; facility?: string } = {}
): PackageContent {
    return {
        diseases: [
            {
                id,
                name: id,
                department,
                tags: options.tags ?? [],
                mainSymptom: `${id}_main`,
                frequency: options.frequency,
            },
        ],
        symptoms: [
            {
                id: `${id}_main`,
                name: `${id}ache`,
                isMain: true,
                examinations: [`${id}_exam`],
                treatment: `${id}_cure`,
            },
        ],
        examinations: [{ id: `${id}_exam`, name: `${id}check`, facility: options.facility ?? 'DoctorOffice' }],
        treatments: [{ id: `${id}_cure`, name: `${id}cure`, kind: 'NonSurgical' }],
    };
}

// Helper: concatenate package contents
export function combine(...parts: PackageContent[]): PackageContent {
    return {
        diseases: parts.flatMap((p) => p.diseases ?? []),
        symptoms: parts.flatMap((p) => p.symptoms ?? []),
        examinations: parts.flatMap((p) => p.examinations ?? []),
        treatments: parts.flatMap((p) => p.treatments ?? []),
    };
}

// Helper: resolve packages with default settings and no directives
export function resolveGraph(...packages: ContentPackage[]): ContentGraph {
    return resolveIdentities(packages, [], { nearDuplicateThreshold: 0.5 }).graph;
}

// Helper: plain snapshot of a graph for equality checks
export function dump(graph: ContentGraph) {
    return {
        disease: [...graph.disease.values()],
        symptom: [...graph.symptom.values()],
        examination: [...graph.examination.values()],
        treatment: [...graph.treatment.values()],
    };
}
