/**
 * @module generate
 * @description
 * Generation strategies for arbitrary finite binary trees, driven by fast-check.
 *
 * A tree is first drawn as a plain shape `{ value, left, right }` and then
 * mapped to `TreeNode`s, so shrinking operates on the shape (dropping
 * subtrees, simplifying values) and the nodes are rebuilt after every step.
 */

import * as fc from 'fast-check';
import { TreeNode } from './node';

export type DepthSize = 'xsmall' | 'small' | 'medium' | 'large' | 'xlarge';

export interface GeneratorBounds {
    /** Children deeper than this are always absent. */
    readonly maxDepth?: number;
    /** Bias towards absent children as the depth grows. */
    readonly depthSize?: DepthSize;
}

export const DEFAULT_BOUNDS = { maxDepth: 8, depthSize: 'small' } as const satisfies Required<GeneratorBounds>;

export interface Shape<V> {
    readonly value: V;
    readonly left: Shape<V> | null;
    readonly right: Shape<V> | null;
}

/** Recursive strategy: a node with a value and two independently optional smaller children. */
export function shapes<V>(value: fc.Arbitrary<V>, bounds: GeneratorBounds = {}): fc.Arbitrary<Shape<V>> {
    const maxDepth = bounds.maxDepth ?? DEFAULT_BOUNDS.maxDepth;
    const depthSize = bounds.depthSize ?? DEFAULT_BOUNDS.depthSize;
    if (!Number.isInteger(maxDepth) || maxDepth < 0) {
        throw new Error(`InvalidArgument: maxDepth must be a non-negative integer, got ${maxDepth}.`);
    }
    // shape(n) is at most n levels tall
    const shape: fc.Memo<Shape<V>> = fc.memo((n) => fc.record({ value, left: child(n), right: child(n) }));
    const child = (n: number): fc.Arbitrary<Shape<V> | null> =>
        n <= 1 ? fc.constant(null) : fc.option(shape(n - 1), { nil: null, depthSize, depthIdentifier: 'tree' });
    return shape(maxDepth + 1);
}

export function fromShape<V>(shape: Shape<V>): TreeNode<V> {
    const left = shape.left ? fromShape(shape.left) : null;
    const right = shape.right ? fromShape(shape.right) : null;
    return new TreeNode(shape.value, left, right);
}

/** Numbers the nodes 0..n-1 in pre-order, ignoring the shape's own values. */
export function numberShape<V>(shape: Shape<V>): TreeNode<number> {
    let next = 0;
    function build(s: Shape<V>): TreeNode<number> {
        const value = next++;
        const left = s.left ? build(s.left) : null;
        const right = s.right ? build(s.right) : null;
        return new TreeNode(value, left, right);
    }
    return build(shape);
}

/** Trees whose values come from `value`. Values may collide. */
export function trees<V>(value: fc.Arbitrary<V>, bounds: GeneratorBounds = {}): fc.Arbitrary<TreeNode<V>> {
    return shapes(value, bounds).map(fromShape);
}

/** Trees whose values are unique across the whole instance. */
export function uniqueTrees(bounds: GeneratorBounds = {}): fc.Arbitrary<TreeNode<number>> {
    return shapes(fc.constant(0), bounds).map(numberShape);
}

/**
 * Draws one tree. Draws are independent unless a seed is given,
 * in which case the same seed yields the same tree.
 */
export function generate(bounds: GeneratorBounds = {}, seed?: number): TreeNode<number> {
    const [tree] = fc.sample(uniqueTrees(bounds), seed === undefined ? { numRuns: 1 } : { numRuns: 1, seed });
    return tree;
}
