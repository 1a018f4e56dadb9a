import type { ContentGraph, IntegrationReport, ValidationResult } from '../types/index.js';
import { ENTITY_KINDS } from '../types/index.js';
import { countByCode } from '../validator/conflict-validator.js';

/**
 * Diseases per department of a graph, sorted by department.
 */
export interface DepartmentSummary {
    department: string;
    diseases: number;
    totalWeight: number;
}

export function summarizeDepartments(graph: ContentGraph): DepartmentSummary[] {
    const rows = new Map<string, DepartmentSummary>();
    for (const disease of graph.disease.values()) {
        if (disease.removed) continue;
        const row = rows.get(disease.department) ?? { department: disease.department, diseases: 0, totalWeight: 0 };
        row.diseases += 1;
        row.totalWeight += disease.weight ?? 0;
        rows.set(disease.department, row);
    }
    return [...rows.values()].sort((a, b) => (a.department < b.department ? -1 : 1));
}

/**
 * Render an integration report as plain text for curator review.
 */
export function formatReport(report: IntegrationReport, graph?: ContentGraph): string {
    const lines: string[] = [];
    const section = (title: string) => lines.push('', `## ${title}`);

    lines.push('# medpack integration report');

    section('Packages');
    for (const p of report.packages) {
        const counts = ENTITY_KINDS.map((k) => `${p.counts[k]} ${k}`).join(', ');
        lines.push(`- ${p.tag}@${p.version} (priority ${p.priority}): ${counts}`);
    }

    section(`Merges (${report.resolution.merges.length})`);
    for (const m of report.resolution.merges) {
        lines.push(
            `- ${m.kind} ${m.supersededPackage}/${m.supersededId} -> ${m.canonicalPackage}/${m.canonicalId} [${m.reason}]`
        );
    }

    section(`Near-duplicates (${report.resolution.nearDuplicates.length})`);
    for (const n of report.resolution.nearDuplicates) {
        lines.push(
            `- ${n.kind} "${n.names[0]}" (${n.ids[0]}) ~ "${n.names[1]}" (${n.ids[1]}): ${n.similarity.toFixed(2)}`
        );
    }

    lines.push(...formatValidation('Validation', report.validation));

    section(`Reassignments (${report.reassignments.length})`);
    for (const c of report.reassignments) {
        if (c.type === 'moved') {
            lines.push(`- moved ${c.kind} ${c.entityId}: ${c.from ?? '(none)'} -> ${c.to}`);
        } else {
            lines.push(`- removed disease ${c.entityId} from ${c.department}`);
        }
    }

    const pruned = report.pruned;
    section('Pruned');
    lines.push(`- diseases: ${pruned.diseases.join(', ') || '(none)'}`);
    lines.push(`- symptoms: ${pruned.symptoms.join(', ') || '(none)'}`);
    lines.push(`- examinations: ${pruned.examinations.join(', ') || '(none)'}`);
    lines.push(`- treatments: ${pruned.treatments.join(', ') || '(none)'}`);

    if (report.weights) {
        section('Weights');
        for (const [department, share] of Object.entries(report.weights.shares)) {
            lines.push(`- ${department}: share ${share.toFixed(4)}`);
        }
        for (const c of report.weights.changes) {
            lines.push(`  - ${c.diseaseId}: ${c.raw} -> ${c.normalized.toFixed(4)}`);
        }
        for (const w of report.weights.warnings) {
            lines.push(`- warning ${w.code}: ${w.message}`);
        }
    }

    if (report.finalValidation) {
        lines.push(...formatValidation('Final validation', report.finalValidation));
    }

    if (graph) {
        section('Departments');
        for (const row of summarizeDepartments(graph)) {
            lines.push(`- ${row.department}: ${row.diseases} diseases, weight ${row.totalWeight.toFixed(2)}`);
        }
    }

    return lines.join('\n') + '\n';
}

/**
 * Render a validation result: a one-line verdict, counts per code, then
 * every violation and warning.
 */
export function formatValidation(title: string, result: ValidationResult): string[] {
    const lines = ['', `## ${title}: ${result.valid ? 'valid' : 'INVALID'}`];
    for (const [code, count] of Object.entries(countByCode(result.violations))) {
        lines.push(`- ${code}: ${count}`);
    }
    for (const v of result.violations) {
        lines.push(`  - [${v.code}] ${v.message}`);
    }
    for (const w of result.warnings) {
        lines.push(`  - warning [${w.code}] ${w.message}`);
    }
    return lines;
}
