import { statsConfig } from '../config/statsConfig.js';
import { nonZeroCounts } from '../counters/counters.js';
import { getStatus } from '../stats/executionStats.js';
import type { ExecutionStats } from '../stats/executionStats.js';
import { formatScientific, formatValue, formatVector } from './numberFormat.js';
import type { VectorFormatter } from './numberFormat.js';
import type { TextSink } from './textSink.js';

export interface ReportOptions {
    /** Renders the solution and any vector-valued diagnostics. */
    showVector?: VectorFormatter;
    /** Lists every non-zero evaluation counter. */
    showCounters?: boolean;
    /** Repeats the primal feasibility line after dual feasibility, as older reports did. */
    repeatPrimalFeasibility?: boolean;
}

/**
 * Multi-line human-readable report of a solver run.
 */
export function formatStats(stats: ExecutionStats, options: ReportOptions = {}): string {
    const showVector: VectorFormatter = options.showVector ?? (x => formatVector(x));
    const showCounters = options.showCounters ?? statsConfig.showCounters;
    const repeatPrimalFeasibility = options.repeatPrimalFeasibility ?? statsConfig.repeatPrimalFeasibility;

    const primalLine = `  primal feasibility: ${formatScientific(stats.primal_feas)}`;
    const lines = [
        'Generic Execution stats',
        `  status: ${getStatus(stats)}`,
        `  objective value: ${formatScientific(stats.objective)}`,
        primalLine,
        `  dual feasibility: ${formatScientific(stats.dual_feas)}`,
    ];
    if (repeatPrimalFeasibility) {
        lines.push(primalLine);
    }
    lines.push(
        `  solution: ${showVector(stats.solution)}`,
        `  iterations: ${stats.iter}`,
        `  elapsed time: ${formatScientific(stats.elapsed_time)}`,
    );

    if (showCounters) {
        lines.push('  counters:');
        for (const [name, count] of nonZeroCounts(stats.counters)) {
            lines.push(`    ${name}: ${count}`);
        }
    }

    if (stats.solver_specific.size > 0) {
        lines.push('  solver specific:');
        for (const [key, value] of stats.solver_specific) {
            lines.push(`    ${key}: ${formatValue(value, showVector)}`);
        }
    }

    return lines.join('\n');
}

export function printStats(stats: ExecutionStats, sink: TextSink = process.stdout, options: ReportOptions = {}): void {
    sink.write(formatStats(stats, options) + '\n');
}

/**
 * One-line form: label and status description.
 */
export function summarizeStats(stats: ExecutionStats): string {
    return `Execution stats: ${getStatus(stats)}`;
}
