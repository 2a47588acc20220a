import { DEFAULT_BOUNDS, type DepthSize } from './generate';

export interface OracleConfig {
    /** Generated cases per property. */
    readonly numRuns: number;
    /** Fixed seed for reproducible runs; random when undefined. */
    readonly seed: number | undefined;
    readonly maxDepth: number;
    readonly depthSize: DepthSize;
}

export const DEFAULT_CONFIG: OracleConfig = {
    numRuns: 100,
    seed: undefined,
    maxDepth: DEFAULT_BOUNDS.maxDepth,
    depthSize: DEFAULT_BOUNDS.depthSize,
};

const DEPTH_SIZES: readonly DepthSize[] = ['xsmall', 'small', 'medium', 'large', 'xlarge'];

function isDepthSize(value: string): value is DepthSize {
    return DEPTH_SIZES.some((d) => d === value);
}

function parseInteger(key: string, raw: string, min?: number): number {
    const n = Number(raw);
    if (!Number.isInteger(n) || (min !== undefined && n < min)) {
        const bound = min === undefined ? '' : ` >= ${min}`;
        throw new Error(`InvalidConfiguration: ${key} must be an integer${bound}, got '${raw}'.`);
    }
    return n;
}

function validate(config: OracleConfig): OracleConfig {
    if (!Number.isInteger(config.numRuns) || config.numRuns < 1) {
        throw new Error(`InvalidConfiguration: numRuns must be a positive integer, got ${config.numRuns}.`);
    }
    if (!Number.isInteger(config.maxDepth) || config.maxDepth < 0) {
        throw new Error(`InvalidConfiguration: maxDepth must be a non-negative integer, got ${config.maxDepth}.`);
    }
    if (config.seed !== undefined && !Number.isInteger(config.seed)) {
        throw new Error(`InvalidConfiguration: seed must be an integer, got ${config.seed}.`);
    }
    return config;
}

export function resolveConfig(overrides: Partial<OracleConfig> = {}): OracleConfig {
    return validate({
        numRuns: overrides.numRuns ?? DEFAULT_CONFIG.numRuns,
        seed: overrides.seed ?? DEFAULT_CONFIG.seed,
        maxDepth: overrides.maxDepth ?? DEFAULT_CONFIG.maxDepth,
        depthSize: overrides.depthSize ?? DEFAULT_CONFIG.depthSize,
    });
}

/**
 * Reads ORACLE_NUM_RUNS, ORACLE_SEED, ORACLE_MAX_DEPTH and ORACLE_DEPTH_SIZE.
 * Unset or blank variables fall back to the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): OracleConfig {
    const read = (key: string): string | undefined => {
        const raw = env[key]?.trim();
        return raw ? raw : undefined;
    };
    const numRuns = read('ORACLE_NUM_RUNS');
    const seed = read('ORACLE_SEED');
    const maxDepth = read('ORACLE_MAX_DEPTH');
    const depthSize = read('ORACLE_DEPTH_SIZE');
    if (depthSize !== undefined && !isDepthSize(depthSize)) {
        throw new Error(`InvalidConfiguration: ORACLE_DEPTH_SIZE must be one of ${DEPTH_SIZES.join(', ')}, got '${depthSize}'.`);
    }
    return resolveConfig({
        numRuns: numRuns === undefined ? undefined : parseInteger('ORACLE_NUM_RUNS', numRuns, 1),
        seed: seed === undefined ? undefined : parseInteger('ORACLE_SEED', seed),
        maxDepth: maxDepth === undefined ? undefined : parseInteger('ORACLE_MAX_DEPTH', maxDepth, 0),
        depthSize,
    });
}
