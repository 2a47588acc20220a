import type { OracleConfig } from './config';
import { verifyTraversal } from './oracle';
import { formatReport } from './report';
import { TRAVERSALS, type Traversal } from './traverse';

export type TraversalRegistry = Readonly<Record<string, Traversal>>;

export function measure<T>(label: string, fn: () => T): T {
    const start = performance.now();
    const result = fn();
    const end = performance.now();
    console.log(`[PERF] ${label}: ${(end - start).toFixed(2)}ms`);
    return result;
}

/** Every registered name when `args` is empty; otherwise `args`, all of which must be registered. */
export function selectTraversals(args: readonly string[], registry: TraversalRegistry = TRAVERSALS): string[] {
    const all = Object.keys(registry);
    if (args.length === 0) return all;
    const unknown = args.filter((a) => !Object.prototype.hasOwnProperty.call(registry, a));
    if (unknown.length > 0) {
        throw new Error(`InvalidArgument: Unknown traversal ${unknown.join(', ')}. Known: ${all.join(', ')}.`);
    }
    return [...args];
}

/** Verifies the selected traversals and prints their reports. Returns the process exit code. */
export function runOracle(args: readonly string[], config: OracleConfig, registry: TraversalRegistry = TRAVERSALS): number {
    console.log(`=== Traversal Oracle (${config.numRuns} runs, max depth ${config.maxDepth}${config.seed === undefined ? '' : `, seed ${config.seed}`}) ===\n`);
    let failures = 0;
    for (const name of selectTraversals(args, registry)) {
        const report = measure(name, () => verifyTraversal(name, registry[name], config));
        for (const line of formatReport(report)) {
            if (report.passed) console.log(line);
            else console.error(line);
        }
        if (!report.passed) failures++;
        console.log();
    }
    return failures === 0 ? 0 : 1;
}
