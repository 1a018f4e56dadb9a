import { readFile, readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { ContentPackage } from '../types/index.js';
import { RawPackageSchema, formatIssues } from './schema.js';
import { PackageLoadError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/** Manifest file that marks a directory as a content package */
export const MANIFEST_FILE = 'medpack.json';

const ENTITY_FILES = [
    ['diseases', 'diseases.json'],
    ['symptoms', 'symptoms.json'],
    ['examinations', 'examinations.json'],
    ['treatments', 'treatments.json'],
] as const;

/**
 * Validate an in-memory package and tag every entity with its package.
 *
 * @param input - `{ manifest, diseases, symptoms, examinations, treatments }`
 * @param sourcePath - Where the package came from, for error messages
 */
export function parsePackage(input: unknown, sourcePath = '<memory>'): ContentPackage {
    const parsed = RawPackageSchema.safeParse(input);
    if (!parsed.success) {
        throw new PackageLoadError(sourcePath, formatIssues(parsed.error));
    }

    const { manifest, diseases, symptoms, examinations, treatments } = parsed.data;
    const issues = [
        ...findDuplicateIds('diseases', diseases),
        ...findDuplicateIds('symptoms', symptoms),
        ...findDuplicateIds('examinations', examinations),
        ...findDuplicateIds('treatments', treatments),
    ];
    if (issues.length > 0) {
        throw new PackageLoadError(sourcePath, issues);
    }

    const packageTag = manifest.tag;
    return {
        tag: packageTag,
        version: manifest.version,
        priority: manifest.priority,
        sourcePath: sourcePath === '<memory>' ? undefined : sourcePath,
        diseases: diseases.map((d) => ({ ...d, removed: false, packageTag })),
        symptoms: symptoms.map((s) => ({ ...s, packageTag })),
        examinations: examinations.map((e) => ({ ...e, packageTag })),
        treatments: treatments.map((t) => ({ ...t, packageTag })),
    };
}

/**
 * Load content packages from directories.
 *
 * Each directory is either a package (contains `medpack.json`) or a folder
 * whose immediate subdirectories are packages. Packages are read in parallel
 * and returned sorted by tag, so load completion order never matters.
 */
export async function loadPackages(dirs: string[]): Promise<ContentPackage[]> {
    const logger = getLogger();

    const packageDirs: string[] = [];
    for (const dir of dirs) {
        packageDirs.push(...(await discoverPackageDirs(resolve(dir))));
    }

    const packages = await Promise.all(packageDirs.map((dir) => readPackageDir(dir)));
    packages.sort((a, b) => compareTags(a.tag, b.tag));

    const seen = new Map<string, string>();
    for (const pkg of packages) {
        const path = pkg.sourcePath ?? '<memory>';
        const previous = seen.get(pkg.tag);
        if (previous !== undefined) {
            throw new PackageLoadError(path, [`package tag "${pkg.tag}" is already used by ${previous}`]);
        }
        seen.set(pkg.tag, path);
    }

    logger.info({ packages: packages.map((p) => p.tag) }, 'Packages loaded');
    return packages;
}

/**
 * Lexical tag order used everywhere packages are sorted.
 */
export function compareTags(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

// ─── Internal helpers ─────────────────────────────────

async function discoverPackageDirs(dir: string): Promise<string[]> {
    if (await isFile(join(dir, MANIFEST_FILE))) {
        return [dir];
    }

    let entries: string[];
    try {
        entries = await readdir(dir);
    } catch (error) {
        throw new PackageLoadError(dir, [`cannot read directory: ${errorMessage(error)}`]);
    }

    const found: string[] = [];
    for (const entry of entries.sort()) {
        const child = join(dir, entry);
        if (await isFile(join(child, MANIFEST_FILE))) {
            found.push(child);
        }
    }

    if (found.length === 0) {
        throw new PackageLoadError(dir, [`no ${MANIFEST_FILE} found in the directory or its subdirectories`]);
    }
    return found;
}

async function readPackageDir(dir: string): Promise<ContentPackage> {
    const logger = getLogger();
    const issues: string[] = [];

    const manifest = await readJson(join(dir, MANIFEST_FILE), issues);
    const raw: Record<string, unknown> = { manifest };

    const contents = await Promise.all(
        ENTITY_FILES.map(async ([key, fileName]) => {
            const file = join(dir, fileName);
            const value = (await isFile(file)) ? await readJson(file, issues) : [];
            return [key, value] as const;
        })
    );
    for (const [key, value] of contents) {
        raw[key] = value;
    }

    if (issues.length > 0) {
        throw new PackageLoadError(dir, issues);
    }

    const pkg = parsePackage(raw, dir);
    logger.debug(
        {
            tag: pkg.tag,
            diseases: pkg.diseases.length,
            symptoms: pkg.symptoms.length,
            examinations: pkg.examinations.length,
            treatments: pkg.treatments.length,
        },
        'Package read'
    );
    return pkg;
}

async function readJson(file: string, issues: string[]): Promise<unknown> {
    try {
        const text = await readFile(file, 'utf-8');
        const value: unknown = JSON.parse(text);
        return value;
    } catch (error) {
        issues.push(`${file}: ${errorMessage(error)}`);
        return null;
    }
}

async function isFile(path: string): Promise<boolean> {
    try {
        return (await stat(path)).isFile();
    } catch {
        return false;
    }
}

function findDuplicateIds(collection: string, entities: Array<{ id: string }>): string[] {
    const seen = new Set<string>();
    const issues: string[] = [];
    for (const { id } of entities) {
        if (seen.has(id)) {
            issues.push(`${collection}: duplicate id "${id}"`);
        }
        seen.add(id);
    }
    return issues;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
