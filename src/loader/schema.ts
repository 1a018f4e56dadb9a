import { z } from 'zod';
import { EntityKind } from '../types/index.js';

/**
 * Zod schemas for the files a content package and a curator supply.
 * Entity files are JSON arrays; missing optional lists default to empty.
 */

const Id = z.string().trim().min(1, 'id must not be empty');
const IdList = z.array(Id).default([]);
const Attribute = z.number().finite().nonnegative();

export const ManifestSchema = z.object({
    tag: z
        .string()
        .regex(/^[A-Za-z0-9_.-]+$/, 'tag may only contain letters, digits, ".", "_" and "-"'),
    version: z.string().min(1).default('0.0.0'),
    priority: z.number().int().default(0),
});
export type Manifest = z.infer<typeof ManifestSchema>;

export const DiseaseSchema = z.object({
    id: Id,
    name: z.string().min(1),
    department: z.string().min(1),
    tags: z.array(z.string()).default([]),
    mainSymptom: Id,
    secondarySymptoms: IdList,
    frequency: z.number().finite().positive().optional(),
    treatmentCost: Attribute.optional(),
});

export const SymptomSchema = z.object({
    id: Id,
    name: z.string().min(1),
    department: z.string().min(1).optional(),
    isMain: z.boolean().default(false),
    examinations: IdList,
    treatment: Id.nullable().default(null),
    severity: Attribute.optional(),
    discomfort: Attribute.optional(),
    complication: z.boolean().optional(),
    collapseSymptoms: IdList,
});

export const ExaminationSchema = z.object({
    id: Id,
    name: z.string().min(1),
    facility: z.string().min(1),
    duration: Attribute.optional(),
    discomfort: Attribute.optional(),
    labPeers: IdList,
});

export const TreatmentSchema = z.object({
    id: Id,
    name: z.string().min(1),
    kind: z.enum(['Surgical', 'NonSurgical']),
    hospitalization: z.boolean().default(false),
    discomfort: Attribute.optional(),
    complicationSymptoms: IdList,
});

/**
 * In-memory form of a whole package, before tagging.
 */
export const RawPackageSchema = z.object({
    manifest: ManifestSchema,
    diseases: z.array(DiseaseSchema).default([]),
    symptoms: z.array(SymptomSchema).default([]),
    examinations: z.array(ExaminationSchema).default([]),
    treatments: z.array(TreatmentSchema).default([]),
});
export type RawPackageInput = z.input<typeof RawPackageSchema>;

// ─── Directives ──────────────────────────────────────────

export const CategoryRuleSchema = z
    .object({
        tagsAny: z.array(z.string()).optional(),
        tagsAll: z.array(z.string()).optional(),
        ids: z.array(Id).optional(),
    })
    .refine(
        (rule) => rule.tagsAny !== undefined || rule.tagsAll !== undefined || rule.ids !== undefined,
        'keep must name at least one of tagsAny, tagsAll, ids'
    );

export const DirectiveSchema = z.discriminatedUnion('op', [
    z.object({
        op: z.literal('merge'),
        kind: z.nativeEnum(EntityKind),
        ids: z.array(Id).min(1),
        into: Id,
    }),
    z.object({
        op: z.literal('moveToDepartment'),
        entityId: Id,
        department: z.string().min(1),
        kind: z.enum([EntityKind.DISEASE, EntityKind.SYMPTOM]).optional(),
    }),
    z.object({
        op: z.literal('restrictToCategory'),
        department: z.string().min(1),
        keep: CategoryRuleSchema,
    }),
]);

export const DirectiveFileSchema = z.object({
    directives: z.array(DirectiveSchema),
});

// ─── Config file ─────────────────────────────────────────

export const ConfigFileSchema = z
    .object({
        packages: z.array(z.string()),
        directives: z.string(),
        out: z.string(),
        format: z.enum(['xml', 'json']),
        report: z.string(),
        db: z.string(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
        facilityKinds: z.array(z.string().min(1)).min(1),
        departments: z.array(z.string().min(1)).min(1),
        resolver: z
            .object({
                nearDuplicateThreshold: z.number().min(0).max(1),
            })
            .partial(),
        weights: z
            .object({
                baseline: z.number().positive(),
                scale: z.number().positive(),
                fallbackShare: z.number().positive(),
                departmentShares: z.record(z.number().nonnegative()),
            })
            .partial(),
    })
    .partial();
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Flatten zod issues into "path: message" lines.
 */
export function formatIssues(error: z.ZodError, prefix = ''): string[] {
    return error.issues.map((issue) => {
        const path = [prefix, ...issue.path.map(String)].filter(Boolean).join('.');
        return `${path || '(root)'}: ${issue.message}`;
    });
}
