import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type MedpackConfig } from '../types/index.js';
import { ConfigFileSchema, formatIssues, type ConfigFile } from '../loader/schema.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * CLI flags that may override configuration; nested sections are partial.
 */
export type ConfigOverrides = Omit<Partial<MedpackConfig>, 'resolver' | 'weights'> & {
    resolver?: Partial<MedpackConfig['resolver']>;
    weights?: Partial<MedpackConfig['weights']>;
};

/**
 * Load configuration from medpack.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used); a file
 * that cannot be parsed or fails validation throws `ConfigError`.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigFile | null> {
    const explorer = cosmiconfig('medpack', {
        searchPlaces: ['medpack.config.json'],
    });

    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = await explorer.search(searchFrom);
    } catch (error) {
        throw new ConfigError(searchFrom ?? process.cwd(), [error instanceof Error ? error.message : String(error)]);
    }

    if (!result || result.isEmpty) {
        return null;
    }

    const parsed = ConfigFileSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigError(result.filepath, formatIssues(parsed.error));
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};
    if (process.env['MEDPACK_JSON_LOGS'] === '1') {
        env.jsonLogs = true;
    }
    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    searchFrom?: string
): Promise<MedpackConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    return mergeConfig(fileConfig ?? {}, loadEnvVars(), cliFlags);
}

/**
 * Layer partial configurations over the defaults, later layers winning.
 * Undefined values never override. The result is frozen: configuration is
 * read-only for the whole run.
 */
export function mergeConfig(...layers: ConfigOverrides[]): MedpackConfig {
    let merged: MedpackConfig = DEFAULT_CONFIG;

    for (const layer of layers) {
        merged = {
            packages: layer.packages ?? merged.packages,
            directives: layer.directives ?? merged.directives,
            out: layer.out ?? merged.out,
            format: layer.format ?? merged.format,
            report: layer.report ?? merged.report,
            db: layer.db ?? merged.db,
            logLevel: layer.logLevel ?? merged.logLevel,
            jsonLogs: layer.jsonLogs ?? merged.jsonLogs,
            facilityKinds: layer.facilityKinds ?? merged.facilityKinds,
            departments: layer.departments ?? merged.departments,
            resolver: {
                nearDuplicateThreshold:
                    layer.resolver?.nearDuplicateThreshold ?? merged.resolver.nearDuplicateThreshold,
            },
            weights: {
                baseline: layer.weights?.baseline ?? merged.weights.baseline,
                scale: layer.weights?.scale ?? merged.weights.scale,
                fallbackShare: layer.weights?.fallbackShare ?? merged.weights.fallbackShare,
                departmentShares: {
                    ...merged.weights.departmentShares,
                    ...layer.weights?.departmentShares,
                },
            },
        };
    }

    return Object.freeze({
        ...merged,
        packages: [...merged.packages],
        facilityKinds: [...merged.facilityKinds],
        departments: [...merged.departments],
    });
}
