import { readFile } from 'node:fs/promises';
import type { Directive, MergeDirective, ReassignmentDirective } from '../types/index.js';
import { DirectiveFileSchema, formatIssues } from './schema.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Parse a directive document: `{ "directives": [ ... ] }`.
 * Declaration order is preserved; it is the order directives apply in.
 */
export function parseDirectives(input: unknown, filePath = '<memory>'): Directive[] {
    const parsed = DirectiveFileSchema.safeParse(input);
    if (!parsed.success) {
        throw new ConfigError(filePath, formatIssues(parsed.error));
    }
    return parsed.data.directives;
}

/**
 * Read and parse a curator directive file.
 */
export async function loadDirectives(filePath: string): Promise<Directive[]> {
    let value: unknown;
    try {
        value = JSON.parse(await readFile(filePath, 'utf-8'));
    } catch (error) {
        throw new ConfigError(filePath, [error instanceof Error ? error.message : String(error)]);
    }
    return parseDirectives(value, filePath);
}

/**
 * Split directives into the ones the identity resolver applies and the
 * ones the reassignment engine applies, keeping relative order.
 */
export function splitDirectives(directives: Directive[]): {
    merges: MergeDirective[];
    reassignments: ReassignmentDirective[];
} {
    const merges: MergeDirective[] = [];
    const reassignments: ReassignmentDirective[] = [];
    for (const directive of directives) {
        if (directive.op === 'merge') {
            merges.push(directive);
        } else {
            reassignments.push(directive);
        }
    }
    return { merges, reassignments };
}
