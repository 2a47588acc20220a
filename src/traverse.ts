/**
 * @module traverse
 * @description
 * In-order ("in-place") traversals: left subtree, node, right subtree.
 *
 * Every traversal is a lazy generator over nodes. A generator object is
 * consumed once; call the traversal again to walk the tree a second time.
 */

import type { TreeNode } from './node';

export type Traversal = <T>(root: TreeNode<T> | null) => Generator<TreeNode<T>, void, undefined>;

/**
 * Reference definition of the order.
 * Complexity: O(N) time, O(H) host call-stack depth. Very tall trees overflow the stack.
 */
export function* traverseRecursive<T>(root: TreeNode<T> | null): Generator<TreeNode<T>, void, undefined> {
    if (!root) return;
    yield* traverseRecursive(root.left);
    yield root;
    yield* traverseRecursive(root.right);
}

/**
 * Explicit stack + set of "opened" nodes.
 * A popped node that is already opened is emitted; otherwise it is opened and
 * re-pushed between its children (right, self, left), so the left subtree is
 * drained before it re-surfaces.
 *
 * The opened set is keyed by node identity. Keying it by value would conflate
 * distinct nodes that share a value.
 *
 * Complexity: O(N) time, O(H) explicit stack.
 */
export function* traverseStack<T>(root: TreeNode<T> | null): Generator<TreeNode<T>, void, undefined> {
    if (!root) return;
    const stack: TreeNode<T>[] = [root];
    const opened = new Set<TreeNode<T>>();
    let curr = stack.pop();
    while (curr) {
        if (opened.has(curr)) {
            opened.delete(curr);
            yield curr;
        } else {
            opened.add(curr);
            if (curr.right) stack.push(curr.right);
            stack.push(curr);
            if (curr.left) stack.push(curr.left);
        }
        curr = stack.pop();
    }
}

interface WorkItem<T> {
    readonly node: TreeNode<T>;
    readonly emit: boolean;
}

/**
 * The call stack simulated as data: each work item carries its own state
 * ("open" or "emit"), so no membership test is needed at all.
 */
export function* traverseTagged<T>(root: TreeNode<T> | null): Generator<TreeNode<T>, void, undefined> {
    if (!root) return;
    const stack: WorkItem<T>[] = [{ node: root, emit: false }];
    let item = stack.pop();
    while (item) {
        const curr = item.node;
        if (item.emit) {
            yield curr;
        } else {
            if (curr.right) stack.push({ node: curr.right, emit: false });
            stack.push({ node: curr, emit: true });
            if (curr.left) stack.push({ node: curr.left, emit: false });
        }
        item = stack.pop();
    }
}

/** Push the left spine, pop one, continue with its right child. */
export function* traverseSpine<T>(root: TreeNode<T> | null): Generator<TreeNode<T>, void, undefined> {
    const stack: TreeNode<T>[] = [];
    let curr = root;
    while (curr || stack.length) {
        while (curr) { stack.push(curr); curr = curr.left; }
        const top = stack.pop();
        if (!top) break;
        yield top;
        curr = top.right;
    }
}

/** Default traversal. */
export const traverse: Traversal = traverseStack;

export type TraversalName = 'recursive' | 'stack' | 'tagged' | 'spine';

export const TRAVERSALS: Readonly<Record<TraversalName, Traversal>> = {
    recursive: traverseRecursive,
    stack: traverseStack,
    tagged: traverseTagged,
    spine: traverseSpine,
};

export function isTraversalName(name: string): name is TraversalName {
    return Object.prototype.hasOwnProperty.call(TRAVERSALS, name);
}
