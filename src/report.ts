import type { OracleReport, PropertyResult } from './oracle';

function describeResult(traversal: string, r: PropertyResult): string[] {
    const label = `${traversal} / ${r.property}`;
    if (r.passed) return [`✅ PASS: ${label} (${r.numRuns} runs)`];
    const lines = [`❌ FAIL: ${label} after ${r.numRuns} runs, ${r.numShrinks} shrinks (seed ${r.seed})`];
    if (r.counterexample) lines.push(`    counterexample: ${r.counterexample.toString()}`);
    else lines.push('    no counterexample (run gave up or was interrupted)');
    if (r.violation) lines.push(`    ${r.violation.message}`);
    return lines;
}

/** One line per property; a failure adds the shrunk tree and the violation, indented. */
export function formatReport(report: OracleReport): string[] {
    return report.results.flatMap((r) => describeResult(report.traversal, r));
}
