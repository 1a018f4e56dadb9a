import { writeFile } from 'node:fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { ReassignmentAbortedError } from '../utils/errors.js';
import { loadPackages } from '../loader/package-loader.js';
import { loadDirectives, splitDirectives } from '../loader/directives.js';
import { runPipeline, resolveAndValidate, summarizePackages } from '../pipeline/pipeline.js';
import { formatReport, formatValidation } from '../report/format.js';
import { RunHistoryDatabase, type RunEntry } from '../storage/database.js';
import type { ContentPackage, Directive, ExportFormat, LogLevel, MedpackConfig } from '../types/index.js';
import { VERSION } from '../version.js';

interface CommonOptions {
    packages?: string[];
    directives?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface IntegrateOptions extends CommonOptions {
    out?: string;
    format?: ExportFormat;
    report?: string;
    db?: string;
}

interface HistoryOptions {
    input: string;
    limit: number;
    run?: number;
}

function parseFormat(value: string): ExportFormat {
    const format = value.toLowerCase();
    if (format === 'xml' || format === 'json') return format;
    throw new InvalidArgumentError('Valid formats: xml, json');
}

function parseLogLevel(value: string): LogLevel {
    switch (value) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
        case 'silent':
            return value;
        default:
            throw new InvalidArgumentError('Valid levels: debug, info, warn, error, silent');
    }
}

function parsePositiveInt(value: string): number {
    const n = parseInt(value, 10);
    if (!Number.isInteger(n) || n <= 0) {
        throw new InvalidArgumentError('Expected a positive integer');
    }
    return n;
}

async function setup(opts: IntegrateOptions): Promise<MedpackConfig> {
    const cliConfig: ConfigOverrides = {
        packages: opts.packages,
        directives: opts.directives,
        out: opts.out,
        format: opts.format,
        report: opts.report,
        db: opts.db,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
    };
    const config = await resolveConfig(cliConfig);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

async function loadInputs(config: MedpackConfig): Promise<{ packages: ContentPackage[]; directives: Directive[] }> {
    if (config.packages.length === 0) {
        throw new InvalidArgumentError('No package directories given (use --packages or the config file)');
    }
    const [packages, directives] = await Promise.all([
        loadPackages(config.packages),
        config.directives ? loadDirectives(config.directives) : Promise.resolve([]),
    ]);
    return { packages, directives };
}

function recordRun(dbPath: string | undefined, entry: RunEntry): void {
    if (!dbPath) return;
    const db = new RunHistoryDatabase(dbPath);
    try {
        const runId = db.recordRun(entry);
        getLogger().info({ runId, dbPath }, 'Run recorded');
    } finally {
        db.close();
    }
}

/**
 * Build the `medpack` command-line program.
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('medpack')
        .description('Integrate hospital content packages into one conflict-free engine dataset.')
        .version(VERSION);

    // ─── INTEGRATE command ────────────────────────────────────

    program
        .command('integrate')
        .description('Run the full pipeline and export the integrated dataset')
        .option('-p, --packages <dirs...>', 'Package directories (or folders of packages)')
        .option('-d, --directives <file>', 'Curator directive file (JSON)')
        .option('-o, --out <path>', 'Output file (stdout when omitted)')
        .option('-f, --format <format>', 'Export format: xml | json', parseFormat)
        .option('-r, --report <path>', 'Write a text report to this file')
        .option('--db <path>', 'Record the run in this SQLite history database')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLogLevel)
        .option('--json-logs', 'Output JSON logs')
        .action(async (opts: IntegrateOptions) => {
            const config = await setup(opts);
            const logger = getLogger();
            let packages: ContentPackage[] = [];

            try {
                const inputs = await loadInputs(config);
                packages = inputs.packages;
                logger.info({ packages: packages.length, directives: inputs.directives.length }, 'Starting integration');

                const result = runPipeline(packages, inputs.directives, config);

                if (config.report) {
                    await writeFile(config.report, formatReport(result.report, result.graph), 'utf-8');
                    logger.info({ path: config.report }, 'Report written');
                }

                if (result.output !== undefined) {
                    if (config.out) {
                        await writeFile(config.out, result.output, 'utf-8');
                        logger.info({ path: config.out, format: config.format }, 'Export written');
                    } else {
                        process.stdout.write(result.output);
                    }
                }

                recordRun(config.db, {
                    version: VERSION,
                    status: result.status,
                    config,
                    packages: result.report.packages,
                    report: result.report,
                });

                if (result.status !== 'ok') {
                    process.exitCode = 1;
                }
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                if (error instanceof ReassignmentAbortedError) {
                    logger.error({ appliedCount: error.appliedCount, error: message }, 'Integration aborted');
                } else {
                    logger.error({ error: message }, 'Integration failed');
                }
                recordRun(config.db, {
                    version: VERSION,
                    status: 'failed',
                    config,
                    packages: summarizePackages(packages),
                    report: null,
                    error: message,
                });
                process.exitCode = 1;
            }
        });

    // ─── VALIDATE command ─────────────────────────────────────

    program
        .command('validate')
        .description('Load, resolve and validate packages without exporting')
        .option('-p, --packages <dirs...>', 'Package directories (or folders of packages)')
        .option('-d, --directives <file>', 'Directive file; only merge directives are applied')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLogLevel)
        .option('--json-logs', 'Output JSON logs')
        .action(async (opts: CommonOptions) => {
            const config = await setup(opts);
            try {
                const { packages, directives } = await loadInputs(config);
                const { merges } = splitDirectives(directives);
                const { validation, resolution } = resolveAndValidate(packages, merges, config);

                console.log(`Packages: ${packages.length}, merges: ${resolution.merges.length}, near-duplicates: ${resolution.nearDuplicates.length}`);
                console.log(formatValidation('Validation', validation).join('\n'));

                if (!validation.valid) {
                    process.exitCode = 1;
                }
            } catch (error) {
                getLogger().error({ error: error instanceof Error ? error.message : String(error) }, 'Validation failed');
                process.exitCode = 1;
            }
        });

    // ─── HISTORY command ──────────────────────────────────────

    program
        .command('history')
        .description('Show recorded integration runs')
        .requiredOption('-i, --input <dbPath>', 'History database path')
        .option('-n, --limit <n>', 'Number of runs to list', parsePositiveInt, 20)
        .option('--run <id>', 'Show merges, violations and weights of one run', parsePositiveInt)
        .action((opts: HistoryOptions) => {
            let db: RunHistoryDatabase | undefined;
            try {
                db = new RunHistoryDatabase(opts.input, { fileMustExist: true });

                if (opts.run !== undefined) {
                    const details = db.getRun(opts.run);
                    if (!details) {
                        console.error(`No run ${opts.run} in ${opts.input}`);
                        process.exitCode = 1;
                        return;
                    }
                    const { run, merges, violations, weights } = details;
                    console.log(`Run ${run.run_id} (${run.created_at}) status=${run.status} version=${run.medpack_version}`);
                    console.log(`  Merges: ${merges.length}`);
                    for (const m of merges) {
                        console.log(`    ${m.kind} ${m.superseded_package}/${m.superseded_id} -> ${m.canonical_package}/${m.canonical_id} [${m.reason}]`);
                    }
                    console.log(`  Violations: ${violations.length}`);
                    for (const v of violations) {
                        console.log(`    [${v.stage}] ${v.code}: ${v.message}`);
                    }
                    console.log(`  Weights: ${weights.length}`);
                    for (const w of weights) {
                        console.log(`    ${w.department} ${w.disease_id}: ${w.normalized.toFixed(4)}`);
                    }
                    return;
                }

                const stats = db.getStats();
                console.log(`Runs: ${stats.runs}`);
                for (const [status, count] of Object.entries(stats.runsByStatus)) {
                    console.log(`  ${status}: ${count}`);
                }
                for (const run of db.listRuns(opts.limit)) {
                    console.log(`${run.run_id}\t${run.created_at}\t${run.status}\t${run.stats_json}`);
                }
            } catch (error) {
                console.error('History failed:', error instanceof Error ? error.message : String(error));
                process.exitCode = 1;
            } finally {
                db?.close();
            }
        });

    return program;
}
