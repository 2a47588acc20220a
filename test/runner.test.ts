import { afterEach, describe, expect, it, vi } from 'vitest';
import type { OracleConfig } from '../src/config';
import type { TreeNode } from '../src/node';
import { runOracle, selectTraversals } from '../src/runner';
import { traverseStack } from '../src/traverse';

const config: OracleConfig = { numRuns: 20, seed: 42, maxDepth: 4, depthSize: 'small' };

function* dropLast<T>(root: TreeNode<T> | null): Generator<TreeNode<T>, void, undefined> {
    yield* [...traverseStack(root)].slice(0, -1);
}

const registry = { stack: traverseStack, 'drop-last': dropLast };

describe('selectTraversals', () => {
    it('selects every registered traversal by default', () => {
        expect(selectTraversals([])).toEqual(['recursive', 'stack', 'tagged', 'spine']);
    });

    it('keeps the requested names in order', () => {
        expect(selectTraversals(['spine', 'stack'])).toEqual(['spine', 'stack']);
    });

    it('rejects unknown names', () => {
        expect(() => selectTraversals(['stack', 'preorder', 'toString'])).toThrow(
            'InvalidArgument: Unknown traversal preorder, toString. Known: recursive, stack, tagged, spine.',
        );
    });
});

describe('runOracle', () => {
    const silence = () => ({
        log: vi.spyOn(console, 'log').mockImplementation(() => undefined),
        error: vi.spyOn(console, 'error').mockImplementation(() => undefined),
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('returns 0 when every registered traversal passes', () => {
        const { log, error } = silence();
        expect(runOracle([], config)).toBe(0);
        expect(log).toHaveBeenCalledWith('✅ PASS: tagged / equivalence (20 runs)');
        expect(error).not.toHaveBeenCalled();
    });

    it('returns 1 when a traversal fails', () => {
        const { log, error } = silence();
        expect(runOracle([], config, registry)).toBe(1);
        expect(log).toHaveBeenCalledWith('✅ PASS: stack / completeness (20 runs)');
        expect(error).toHaveBeenCalledWith(expect.stringMatching(/^❌ FAIL: drop-last \/ completeness after /));
        expect(error).toHaveBeenCalledWith('    counterexample: (0)');
    });

    it('only runs the selected traversals', () => {
        const { error } = silence();
        expect(runOracle(['stack'], config, registry)).toBe(0);
        expect(error).not.toHaveBeenCalled();
    });

    it('prints a timing line per traversal', () => {
        const { log } = silence();
        runOracle(['stack'], config, registry);
        expect(log).toHaveBeenCalledWith(expect.stringMatching(/^\[PERF\] stack: \d+\.\d{2}ms$/));
    });

    it('throws on an unknown name before running anything', () => {
        const { log } = silence();
        expect(() => runOracle(['preorder'], config, registry)).toThrow(
            'InvalidArgument: Unknown traversal preorder. Known: stack, drop-last.',
        );
        expect(log).toHaveBeenCalledTimes(1);
    });
});
