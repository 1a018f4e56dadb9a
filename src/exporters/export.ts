import {
    EntityKind,
    type ContentGraph,
    type Disease,
    type Examination,
    type ExportFormat,
    type Symptom,
    type Treatment,
} from '../types/index.js';
import { UnsupportedEntityShapeError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { TREATMENT_TYPES, roomFor, type RoomSpec } from './engine-schema.js';
import { orderByRank, rankExaminations, type ExaminationRank } from './priority.js';

// ─── Main Export Function ────────────────────────────────

/**
 * Serialize a content graph for the engine.
 *
 * Pure: the same graph always yields the same text. Throws
 * `UnsupportedEntityShapeError` when an entity cannot be expressed in the
 * engine schema (unknown room, removed or unweighted disease, missing main
 * symptom); a validated, weighted graph never does.
 */
export function exportGraph(graph: ContentGraph, format: ExportFormat): string {
    checkShape(graph);

    let content: string;
    switch (format) {
        case 'json':
            content = exportJson(graph);
            break;
        case 'xml':
            content = exportXml(graph);
            break;
    }

    getLogger().info(
        { format, diseases: graph.disease.size, symptoms: graph.symptom.size, bytes: content.length },
        'Graph exported'
    );
    return content;
}

/**
 * Examination ids of a symptom: cheapest room first, then widest disease
 * coverage, then by id.
 */
export function sortExaminations(
    graph: ContentGraph,
    examinationIds: readonly string[],
    ranking: ReadonlyMap<string, ExaminationRank> = rankExaminations(graph)
): string[] {
    return orderByRank(examinationIds, ranking);
}

// ─── Shape checks ────────────────────────────────────────

function checkShape(graph: ContentGraph): void {
    for (const disease of graph.disease.values()) {
        if (disease.removed) {
            throw new UnsupportedEntityShapeError(EntityKind.DISEASE, disease.id, 'disease is marked removed');
        }
        if (disease.weight === undefined || !Number.isFinite(disease.weight)) {
            throw new UnsupportedEntityShapeError(
                EntityKind.DISEASE,
                disease.id,
                `weight ${String(disease.weight)} is not a finite number`
            );
        }
        if (!graph.symptom.has(disease.mainSymptom)) {
            throw new UnsupportedEntityShapeError(
                EntityKind.DISEASE,
                disease.id,
                `main symptom "${disease.mainSymptom}" does not exist`
            );
        }
    }
    for (const exam of graph.examination.values()) {
        roomOf(exam);
    }
}

function roomOf(exam: Examination): RoomSpec {
    const room = roomFor(exam.facility);
    if (!room) {
        throw new UnsupportedEntityShapeError(
            EntityKind.EXAMINATION,
            exam.id,
            `the engine has no room for facility "${exam.facility}"`
        );
    }
    return room;
}

// ─── Format Implementations ─────────────────────────────

function exportJson(graph: ContentGraph): string {
    const ranking = rankExaminations(graph);
    return JSON.stringify(
        {
            diseases: [...graph.disease.values()].map((d) => ({
                id: d.id,
                name: d.name,
                department: d.department,
                weight: d.weight,
                treatmentCost: d.treatmentCost,
                mainSymptom: d.mainSymptom,
                secondarySymptoms: d.secondarySymptoms,
                tags: d.tags,
            })),
            symptoms: [...graph.symptom.values()].map((s) => ({
                id: s.id,
                name: s.name,
                department: s.department,
                isMain: s.isMain,
                examinations: sortExaminations(graph, s.examinations, ranking),
                treatment: s.treatment,
                severity: s.severity,
                discomfort: s.discomfort,
                complication: s.complication,
                collapseSymptoms: s.collapseSymptoms,
            })),
            examinations: [...graph.examination.values()].map((e) => ({
                id: e.id,
                name: e.name,
                facility: e.facility,
                roomTag: roomOf(e).roomTag,
                duration: e.duration,
                priority: ranking.get(e.id)?.priority,
                discomfort: e.discomfort,
                labPeers: e.labPeers,
            })),
            treatments: [...graph.treatment.values()].map((t) => ({
                id: t.id,
                name: t.name,
                type: TREATMENT_TYPES[t.kind],
                hospitalization: t.hospitalization,
                discomfort: t.discomfort,
                complicationSymptoms: t.complicationSymptoms,
            })),
        },
        null,
        2
    );
}

const esc = (s: string) =>
    s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

/** `<Tag>value</Tag>` at the given indent, or nothing when the value is absent */
function field(indent: string, tag: string, value: string | number | boolean | undefined): string {
    return value === undefined ? '' : `${indent}<${tag}>${esc(String(value))}</${tag}>\n`;
}

function refList(indent: string, listTag: string, refTag: string, refs: readonly string[]): string {
    if (refs.length === 0) return '';
    let xml = `${indent}<${listTag}>\n`;
    for (const ref of refs) {
        xml += `${indent}  <${refTag}>${esc(ref)}</${refTag}>\n`;
    }
    return xml + `${indent}</${listTag}>\n`;
}

function exportXml(graph: ContentGraph): string {
    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<Database>
`;
    const ranking = rankExaminations(graph);
    for (const disease of graph.disease.values()) xml += diseaseXml(disease);
    for (const symptom of graph.symptom.values()) xml += symptomXml(symptom, ranking);
    for (const exam of graph.examination.values()) xml += examinationXml(exam, ranking.get(exam.id));
    for (const treatment of graph.treatment.values()) xml += treatmentXml(treatment);
    return xml + '</Database>\n';
}

function diseaseXml(d: Disease): string {
    const i = '    ';
    let xml = `  <GameDBMedicalCondition ID="${esc(d.id)}">\n`;
    xml += field(i, 'Name', d.name);
    xml += field(i, 'DepartmentRef', d.department);
    xml += field(i, 'Occurrence', d.weight);
    xml += field(i, 'TreatmentCost', d.treatmentCost);
    xml += `${i}<Symptoms>\n`;
    const rules = [
        { id: d.mainSymptom, main: true },
        ...d.secondarySymptoms.map((id) => ({ id, main: false })),
    ];
    for (const rule of rules) {
        xml += `${i}  <GameDBSymptomRules>\n`;
        xml += field(`${i}    `, 'GameDBSymptomRef', rule.id);
        xml += field(`${i}    `, 'IsMainSymptom', rule.main);
        xml += `${i}  </GameDBSymptomRules>\n`;
    }
    xml += `${i}</Symptoms>\n`;
    xml += refList(i, 'Tags', 'Tag', d.tags);
    return xml + '  </GameDBMedicalCondition>\n';
}

function symptomXml(s: Symptom, ranking: ReadonlyMap<string, ExaminationRank>): string {
    const i = '    ';
    let xml = `  <GameDBSymptom ID="${esc(s.id)}">\n`;
    xml += field(i, 'Name', s.name);
    xml += field(i, 'DepartmentRef', s.department);
    xml += field(i, 'IsMainSymptom', s.isMain);
    xml += field(i, 'Severity', s.severity);
    xml += field(i, 'Discomfort', s.discomfort);
    xml += field(i, 'Complication', s.complication);
    xml += refList(i, 'Examinations', 'ExaminationRef', orderByRank(s.examinations, ranking));
    xml += refList(i, 'Treatments', 'TreatmentRef', s.treatment === null ? [] : [s.treatment]);
    xml += refList(i, 'CollapseSymptoms', 'GameDBSymptomRef', s.collapseSymptoms);
    return xml + '  </GameDBSymptom>\n';
}

function examinationXml(e: Examination, rank: ExaminationRank | undefined): string {
    const i = '    ';
    let xml = `  <GameDBExamination ID="${esc(e.id)}">\n`;
    xml += field(i, 'Name', e.name);
    xml += `${i}<Procedure>\n`;
    xml += refList(`${i}  `, 'RequiredRoomTags', 'Tag', [roomOf(e).roomTag]);
    xml += field(`${i}  `, 'Duration', e.duration);
    xml += field(`${i}  `, 'Priority', rank?.priority);
    xml += `${i}</Procedure>\n`;
    xml += field(i, 'Discomfort', e.discomfort);
    for (const peer of e.labPeers) {
        xml += field(i, 'LabTestingExaminationRef', peer);
    }
    return xml + '  </GameDBExamination>\n';
}

function treatmentXml(t: Treatment): string {
    const i = '    ';
    let xml = `  <GameDBTreatment ID="${esc(t.id)}">\n`;
    xml += field(i, 'Name', t.name);
    xml += field(i, 'Type', TREATMENT_TYPES[t.kind]);
    xml += field(i, 'Hospitalization', t.hospitalization);
    xml += field(i, 'Discomfort', t.discomfort);
    xml += refList(i, 'ComplicationSymptoms', 'GameDBSymptomRef', t.complicationSymptoms);
    return xml + '  </GameDBTreatment>\n';
}
