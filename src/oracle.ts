/**
 * @module oracle
 * @description
 * Property oracle for in-order traversals.
 *
 * * Properties (each quantified over every generated tree):
 * 1. completeness - every node emitted exactly once, nothing invented.
 * 2. ordering     - left subtree < pivot < right subtree in the emitted order.
 * 3. equivalence  - identical sequence to the recursive reference.
 *
 * The check functions are pure and throw `PropertyViolation`. fast-check
 * drives them, shrinks a failing tree, and the shrunk tree is replayed
 * through the check to recover the violation for the report.
 */

import * as fc from 'fast-check';
import { TreeNode, size, subtrees } from './node';
import { type Traversal, traverseRecursive } from './traverse';
import { uniqueTrees } from './generate';
import { type OracleConfig, resolveConfig } from './config';

export type PropertyName = 'completeness' | 'ordering' | 'equivalence';

export type ViolationDetails = Readonly<Record<string, string | number | null>>;

export class PropertyViolation extends Error {
    readonly property: PropertyName;
    readonly tree: TreeNode<unknown>;
    readonly details: ViolationDetails;

    constructor(property: PropertyName, tree: TreeNode<unknown>, summary: string, details: ViolationDetails = {}) {
        const facts = Object.entries(details).map(([k, v]) => `${k}=${String(v)}`).join(', ');
        super(`PropertyViolation: ${property}: ${summary}${facts ? ` (${facts})` : ''} in ${tree.toString()}`);
        this.name = 'PropertyViolation';
        this.property = property;
        this.tree = tree;
        this.details = details;
    }
}

// ============================================================================
// 1. CHECKS
// ============================================================================

export function checkCompleteness<T>(tree: TreeNode<T>, traverse: Traversal): void {
    const emitted = [...traverse(tree)];
    const distinct = new Set(emitted.map((n) => n.value)).size;
    const expected = size(tree);
    if (emitted.length !== distinct || emitted.length !== expected) {
        throw new PropertyViolation('completeness', tree, 'emitted count does not match distinct values and size', {
            emitted: emitted.length,
            distinct,
            size: expected,
        });
    }
    const members = new Set<TreeNode<T>>(subtrees(tree));
    const foreign = emitted.find((n) => !members.has(n));
    if (foreign) {
        throw new PropertyViolation('completeness', tree, 'emitted a node that is not part of the tree', {
            value: String(foreign.value),
        });
    }
}

/** Natural numbers drawn by the harness, reduced modulo the candidates available. */
export interface OrderingDraw {
    readonly pivot: number;
    readonly left: number;
    readonly right: number;
}

export interface OrderingSample<T> {
    readonly pivot: TreeNode<T>;
    readonly left: TreeNode<T> | null;
    readonly right: TreeNode<T> | null;
}

function pick<T>(root: TreeNode<T> | null, index: number): TreeNode<T> | null {
    if (!root) return null;
    const target = index % root.size;
    let i = 0;
    for (const n of subtrees(root)) {
        if (i++ === target) return n;
    }
    return null;
}

/**
 * Picks a pivot rooting a subtree of size > 1 and one node from each side.
 * Sampling a pivot and a descendant per side stands in for sampling two nodes
 * and computing their least common ancestor.
 * Returns null when the tree has no such pivot.
 */
export function sampleOrdering<T>(tree: TreeNode<T>, draw: OrderingDraw): OrderingSample<T> | null {
    const candidates = [...subtrees(tree)].filter((n) => n.size > 1);
    if (candidates.length === 0) return null;
    const pivot = candidates[draw.pivot % candidates.length];
    return { pivot, left: pick(pivot.left, draw.left), right: pick(pivot.right, draw.right) };
}

/** Returns false when the tree offers no pivot (nothing to check). */
export function checkOrdering<T>(tree: TreeNode<T>, draw: OrderingDraw, traverse: Traversal): boolean {
    const sample = sampleOrdering(tree, draw);
    if (!sample) return false;
    const sequence = [...traverse(tree)];
    const at = (n: TreeNode<T> | null): number | null => (n ? sequence.indexOf(n) : null);
    const pivotAt = sequence.indexOf(sample.pivot);
    const leftAt = at(sample.left);
    const rightAt = at(sample.right);
    const details: ViolationDetails = {
        pivot: String(sample.pivot.value),
        pivotIndex: pivotAt,
        left: sample.left ? String(sample.left.value) : null,
        leftIndex: leftAt,
        right: sample.right ? String(sample.right.value) : null,
        rightIndex: rightAt,
    };
    if (pivotAt < 0) {
        throw new PropertyViolation('ordering', tree, 'pivot was not emitted', details);
    }
    if (leftAt !== null && (leftAt < 0 || leftAt >= pivotAt)) {
        throw new PropertyViolation('ordering', tree, 'left sample does not precede its pivot', details);
    }
    if (rightAt !== null && rightAt <= pivotAt) {
        throw new PropertyViolation('ordering', tree, 'right sample does not follow its pivot', details);
    }
    return true;
}

/**
 * Compares `candidate` node for node with `reference`.
 * The default reference recurses once per level; for trees taller than the
 * host stack allows, pass a non-recursive reference such as `traverseTagged`.
 */
export function checkEquivalence<T>(tree: TreeNode<T>, candidate: Traversal, reference: Traversal = traverseRecursive): void {
    const actual = [...candidate(tree)];
    const expected = [...reference(tree)];
    const len = Math.max(actual.length, expected.length);
    for (let i = 0; i < len; i++) {
        if (actual[i] !== expected[i]) {
            throw new PropertyViolation('equivalence', tree, 'sequences differ', {
                index: i,
                actual: i < actual.length ? String(actual[i].value) : null,
                expected: i < expected.length ? String(expected[i].value) : null,
                actualLength: actual.length,
                expectedLength: expected.length,
            });
        }
    }
}

// ============================================================================
// 2. PROPERTIES
// ============================================================================

export interface OracleProperty<A> {
    readonly name: PropertyName;
    readonly arbitrary: fc.Arbitrary<A>;
    readonly check: (input: A) => void;
}

export interface OracleProperties {
    readonly completeness: OracleProperty<TreeNode<number>>;
    readonly ordering: OracleProperty<[TreeNode<number>, OrderingDraw]>;
    readonly equivalence: OracleProperty<TreeNode<number>>;
}

export function oracleProperties(traverse: Traversal, config: Partial<OracleConfig> = {}): OracleProperties {
    const { maxDepth, depthSize } = resolveConfig(config);
    const tree = uniqueTrees({ maxDepth, depthSize });
    const draw = fc.record({ pivot: fc.nat(), left: fc.nat(), right: fc.nat() });
    return {
        completeness: {
            name: 'completeness',
            arbitrary: tree,
            check: (t) => checkCompleteness(t, traverse),
        },
        ordering: {
            name: 'ordering',
            // single nodes have no pivot; retry instead of passing vacuously
            arbitrary: fc.tuple(maxDepth > 0 ? tree.filter((t) => t.size > 1) : tree, draw),
            check: ([t, d]) => { checkOrdering(t, d, traverse); },
        },
        equivalence: {
            name: 'equivalence',
            arbitrary: tree,
            check: (t) => checkEquivalence(t, traverse),
        },
    };
}

// ============================================================================
// 3. RUNNER
// ============================================================================

export interface PropertyResult {
    readonly property: PropertyName;
    readonly passed: boolean;
    readonly numRuns: number;
    readonly numShrinks: number;
    readonly seed: number;
    /** Shrunk failing tree. */
    readonly counterexample: TreeNode<number> | null;
    readonly violation: PropertyViolation | null;
}

export interface OracleReport {
    readonly traversal: string;
    readonly passed: boolean;
    readonly results: readonly PropertyResult[];
}

export class OracleFailure extends Error {
    readonly report: OracleReport;

    constructor(report: OracleReport) {
        const failed = report.results.filter((r) => !r.passed).map((r) => r.property);
        super(`OracleFailure: ${report.traversal} violates ${failed.join(', ')}`);
        this.name = 'OracleFailure';
        this.report = report;
    }
}

function treeOf(input: TreeNode<number> | [TreeNode<number>, OrderingDraw]): TreeNode<number> {
    return input instanceof TreeNode ? input : input[0];
}

function runProperty<A extends TreeNode<number> | [TreeNode<number>, OrderingDraw]>(
    property: OracleProperty<A>,
    config: OracleConfig,
): PropertyResult {
    const details = fc.check(
        fc.property(property.arbitrary, (input) => { property.check(input); }),
        { numRuns: config.numRuns, seed: config.seed },
    );
    const base = {
        property: property.name,
        numRuns: details.numRuns,
        numShrinks: details.numShrinks,
        seed: details.seed,
    };
    if (!details.failed) return { ...base, passed: true, counterexample: null, violation: null };
    if (details.counterexample === null) {
        // gave up (too many rejected draws) or interrupted
        return { ...base, passed: false, counterexample: null, violation: null };
    }
    const [input] = details.counterexample;
    let violation: PropertyViolation | null = null;
    try {
        property.check(input);
    } catch (err) {
        if (!(err instanceof PropertyViolation)) throw err;
        violation = err;
    }
    return { ...base, passed: false, counterexample: treeOf(input), violation };
}

export function verifyTraversal(name: string, traverse: Traversal, config: Partial<OracleConfig> = {}): OracleReport {
    const resolved = resolveConfig(config);
    const properties = oracleProperties(traverse, resolved);
    const results = [
        runProperty(properties.completeness, resolved),
        runProperty(properties.ordering, resolved),
        runProperty(properties.equivalence, resolved),
    ];
    return { traversal: name, passed: results.every((r) => r.passed), results };
}

export function assertTraversal(name: string, traverse: Traversal, config: Partial<OracleConfig> = {}): OracleReport {
    const report = verifyTraversal(name, traverse, config);
    if (!report.passed) throw new OracleFailure(report);
    return report;
}
