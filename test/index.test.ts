import { describe, expect, it } from 'vitest';
import { assertTraversal, generate, node, size, traverse, traverseRecursive } from '../src/index';

describe('public surface', () => {
    it('walks the documented example in order', () => {
        const tree = node(1, node(2, node(3), node(4, node(6), null)), node(5));
        expect([...traverse(tree)].map((n) => n.value)).toEqual([3, 2, 6, 4, 1, 5]);
        expect(size(tree)).toBe(6);
    });

    it('agrees with the reference on a generated tree', () => {
        const tree = generate({ maxDepth: 5 }, 99);
        expect([...traverse(tree)]).toEqual([...traverseRecursive(tree)]);
        expect([...traverse(tree)]).toHaveLength(size(tree));
    });

    it('verifies the default traversal', () => {
        expect(assertTraversal('stack', traverse, { seed: 99, numRuns: 50 }).passed).toBe(true);
    });
});
