/**
 * Facility (room) kinds the engine knows how to build.
 */
export const FACILITY_KINDS = [
    'DoctorOffice',
    'Lab',
    'Radiology',
    'Observation',
    'Ward',
    'IntensiveCare',
    'OperatingRoom',
    'SpecialistUnit',
] as const;

export type FacilityKind = (typeof FACILITY_KINDS)[number];

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Output formats of the exporter.
 */
export type ExportFormat = 'xml' | 'json';

/**
 * Identity resolution settings.
 */
export interface ResolverConfig {
    /** Minimum name similarity (Dice over name tokens) to flag a near-duplicate */
    nearDuplicateThreshold: number;
}

/**
 * Patient-generation weight settings.
 */
export interface WeightConfig {
    /** Raw weight of a disease that declares no frequency */
    baseline: number;

    /** Sum of all normalized weights */
    scale: number;

    /** Relative share of a department missing from `departmentShares` */
    fallbackShare: number;

    /** Relative share of total patient generation, per department */
    departmentShares: Record<string, number>;
}

/**
 * Full configuration merged from CLI flags, config file and defaults.
 * Treated as an immutable value for the lifetime of a run.
 */
export interface MedpackConfig {
    // Input
    packages: string[];
    directives?: string;

    // Output
    out?: string;
    format: ExportFormat;
    report?: string;
    db?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // Closed sets the content is checked against
    facilityKinds: string[];
    departments: string[];

    resolver: ResolverConfig;
    weights: WeightConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MedpackConfig = {
    packages: [],
    format: 'xml',
    logLevel: 'info',
    jsonLogs: false,
    facilityKinds: [...FACILITY_KINDS],
    departments: [
        'emergency',
        'general_surgery',
        'internal_medicine',
        'orthopaedics',
        'cardiology',
        'neurology',
        'psychology',
        'infectious_diseases',
        'dermatology',
        'urology',
    ],
    resolver: {
        nearDuplicateThreshold: 0.5,
    },
    weights: {
        baseline: 1,
        scale: 1000,
        fallbackShare: 1,
        departmentShares: {},
    },
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    medpack_version: string;
    config_json: string;
    packages_json: string;
    status: 'ok' | 'invalid' | 'failed';
    stats_json: string;
}
