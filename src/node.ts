/**
 * @module node
 * @description
 * Immutable binary tree nodes.
 *
 * * Contracts:
 * - Exclusive Ownership: a node owns its children, no node is shared.
 * - No cycles: a cyclic structure is undefined behavior (no defensive checks).
 * - Values are opaque. Uniqueness is only guaranteed for generated trees.
 */

export type Side = 'left' | 'right';

export class TreeNode<T> {
    readonly value: T;
    readonly left: TreeNode<T> | null;
    readonly right: TreeNode<T> | null;
    readonly size: number;
    readonly height: number;

    constructor(value: T, left: TreeNode<T> | null = null, right: TreeNode<T> | null = null) {
        this.value = value;
        this.left = left;
        this.right = right;
        const lh = left ? left.height : 0;
        const rh = right ? right.height : 0;
        this.height = (lh > rh ? lh : rh) + 1;
        const ls = left ? left.size : 0;
        const rs = right ? right.size : 0;
        this.size = 1 + ls + rs;
        Object.freeze(this);
    }

    get isLeaf(): boolean { return this.left === null && this.right === null; }

    /**
     * S-expression form: `(v)` for a leaf, `(v L R)` otherwise, `_` for an absent child.
     * Rendered with an explicit stack, so tall trees print too.
     */
    toString(): string {
        const out: string[] = [];
        const stack: (TreeNode<T> | string)[] = [this];
        let item = stack.pop();
        while (item !== undefined) {
            if (typeof item === 'string') {
                out.push(item);
            } else if (item.isLeaf) {
                out.push(`(${String(item.value)})`);
            } else {
                stack.push(')', item.right ?? '_', ' ', item.left ?? '_', ' ', `(${String(item.value)}`);
            }
            item = stack.pop();
        }
        return out.join('');
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

// ============================================================================
// CONSTRUCTION
// ============================================================================

export function node<T>(value: T, left: TreeNode<T> | null = null, right: TreeNode<T> | null = null): TreeNode<T> {
    return new TreeNode(value, left, right);
}

/**
 * Degenerate chain: `values[0]` is the root, every following value hangs on `side`.
 * Built bottom-up, so the depth is not limited by the call stack.
 */
export function spine<T>(values: readonly T[], side: Side): TreeNode<T> {
    if (values.length === 0) throw new Error('InvalidArgument: Cannot build a spine from an empty list.');
    let curr = new TreeNode(values[values.length - 1]);
    for (let i = values.length - 2; i >= 0; i--) {
        curr = side === 'left' ? new TreeNode(values[i], curr, null) : new TreeNode(values[i], null, curr);
    }
    return curr;
}

// ============================================================================
// STRUCTURE
// ============================================================================

/** Number of nodes. Complexity: O(1), cached at construction. */
export function size<T>(root: TreeNode<T> | null): number {
    return root ? root.size : 0;
}

export function height<T>(root: TreeNode<T> | null): number {
    return root ? root.height : 0;
}

/**
 * Every node of the tree in pre-order. Each yielded node roots a subtree.
 * Independent of the in-order traversals, so it can be used to sample them.
 */
export function* subtrees<T>(root: TreeNode<T> | null): Generator<TreeNode<T>, void, undefined> {
    if (!root) return;
    const stack: TreeNode<T>[] = [root];
    let curr = stack.pop();
    while (curr) {
        yield curr;
        if (curr.right) stack.push(curr.right);
        if (curr.left) stack.push(curr.left);
        curr = stack.pop();
    }
}
