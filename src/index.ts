/**
 * @module inorder-oracle
 * In-order traversal of immutable binary trees, with a property oracle
 * that checks any traversal strategy against generated trees.
 */

export { TreeNode, node, spine, size, height, subtrees } from './node';
export type { Side } from './node';

export {
    traverse,
    traverseRecursive,
    traverseStack,
    traverseTagged,
    traverseSpine,
    TRAVERSALS,
    isTraversalName,
} from './traverse';
export type { Traversal, TraversalName } from './traverse';

export { DEFAULT_BOUNDS, shapes, fromShape, numberShape, trees, uniqueTrees, generate } from './generate';
export type { DepthSize, GeneratorBounds, Shape } from './generate';

export {
    PropertyViolation,
    OracleFailure,
    checkCompleteness,
    checkOrdering,
    checkEquivalence,
    sampleOrdering,
    oracleProperties,
    verifyTraversal,
    assertTraversal,
} from './oracle';
export type {
    PropertyName,
    ViolationDetails,
    OrderingDraw,
    OrderingSample,
    OracleProperty,
    OracleProperties,
    PropertyResult,
    OracleReport,
} from './oracle';

export { DEFAULT_CONFIG, loadConfig, resolveConfig } from './config';
export type { OracleConfig } from './config';

export { formatReport } from './report';

export { measure, selectTraversals, runOracle } from './runner';
export type { TraversalRegistry } from './runner';
