import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, resolveConfig } from '../src/config';

describe('resolveConfig', () => {
    it('falls back to the defaults', () => {
        expect(resolveConfig()).toEqual({ numRuns: 100, seed: undefined, maxDepth: 8, depthSize: 'small' });
        expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('merges overrides', () => {
        expect(resolveConfig({ seed: 9, maxDepth: 2 })).toEqual({ numRuns: 100, seed: 9, maxDepth: 2, depthSize: 'small' });
    });

    it('rejects out-of-range values', () => {
        expect(() => resolveConfig({ numRuns: 0 })).toThrow('InvalidConfiguration: numRuns must be a positive integer, got 0.');
        expect(() => resolveConfig({ maxDepth: -1 })).toThrow('InvalidConfiguration: maxDepth must be a non-negative integer, got -1.');
        expect(() => resolveConfig({ seed: 0.5 })).toThrow('InvalidConfiguration: seed must be an integer, got 0.5.');
    });
});

describe('loadConfig', () => {
    it('reads the ORACLE_ variables', () => {
        const config = loadConfig({
            ORACLE_NUM_RUNS: '25',
            ORACLE_SEED: '-3',
            ORACLE_MAX_DEPTH: '4',
            ORACLE_DEPTH_SIZE: 'medium',
        });
        expect(config).toEqual({ numRuns: 25, seed: -3, maxDepth: 4, depthSize: 'medium' });
    });

    it('treats unset and blank variables as defaults', () => {
        expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
        expect(loadConfig({ ORACLE_NUM_RUNS: '  ', ORACLE_SEED: '' })).toEqual(DEFAULT_CONFIG);
    });

    it('trims surrounding whitespace', () => {
        expect(loadConfig({ ORACLE_NUM_RUNS: ' 10 ' }).numRuns).toBe(10);
    });

    it('rejects malformed numbers', () => {
        expect(() => loadConfig({ ORACLE_NUM_RUNS: '0' })).toThrow("InvalidConfiguration: ORACLE_NUM_RUNS must be an integer >= 1, got '0'.");
        expect(() => loadConfig({ ORACLE_MAX_DEPTH: 'deep' })).toThrow("InvalidConfiguration: ORACLE_MAX_DEPTH must be an integer >= 0, got 'deep'.");
        expect(() => loadConfig({ ORACLE_SEED: '1.5' })).toThrow("InvalidConfiguration: ORACLE_SEED must be an integer, got '1.5'.");
    });

    it('rejects an unknown depth size', () => {
        expect(() => loadConfig({ ORACLE_DEPTH_SIZE: 'huge' })).toThrow(
            "InvalidConfiguration: ORACLE_DEPTH_SIZE must be one of xsmall, small, medium, large, xlarge, got 'huge'.",
        );
    });
});
