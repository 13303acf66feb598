import { describe, it } from 'node:test';
import assert from 'node:assert';
import { GenericExecutionStats } from '../../libs/stats/executionStats.js';
import { formatStats, printStats, summarizeStats } from '../../libs/display/report.js';
import { BufferSink, makeModel } from '../helpers/models.js';

const PLAIN = { showCounters: false, repeatPrimalFeasibility: false } as const;

function firstOrderStats(options: ConstructorParameters<typeof GenericExecutionStats>[2] = {}) {
    const { model } = makeModel({ unconstrained: true, counts: { neval_obj: 3, neval_grad: 2 } });
    return new GenericExecutionStats('first_order', model, { objective: 1.5, iter: 10, ...options });
}

describe('Execution Report', () => {
    it('should render every field in order', () => {
        assert.strictEqual(formatStats(firstOrderStats(), PLAIN), [
            'Generic Execution stats',
            '  status: first-order stationary',
            '  objective value: 1.50000000e+00',
            '  primal feasibility: 0.00000000e+00',
            '  dual feasibility: Inf',
            '  solution: ∅',
            '  iterations: 10',
            '  elapsed time: Inf'
        ].join('\n'));
    });

    it('should repeat primal feasibility when asked', () => {
        const lines = formatStats(firstOrderStats(), { ...PLAIN, repeatPrimalFeasibility: true }).split('\n');

        assert.strictEqual(lines.length, 9);
        assert.strictEqual(lines[4], '  dual feasibility: Inf');
        assert.strictEqual(lines[5], '  primal feasibility: 0.00000000e+00');
        assert.strictEqual(lines[6], '  solution: ∅');
    });

    it('should elide long solutions', () => {
        const lines = formatStats(firstOrderStats({ solution: [1, 2, 3, 4, 5, 6, 7] }), PLAIN).split('\n');

        assert.strictEqual(lines[5], '  solution: [1 2 3 4 ⋯ 7]');
    });

    it('should use a custom vector formatter', () => {
        const report = formatStats(
            firstOrderStats({ solution: [1, 2, 3], solver_specific: { multipliers: [4, 5] } }),
            { ...PLAIN, showVector: x => `<${x.length} values>` }
        );
        const lines = report.split('\n');

        assert.strictEqual(lines[5], '  solution: <3 values>');
        assert.strictEqual(lines[9], '    multipliers: <2 values>');
    });

    it('should list evaluated counters when asked', () => {
        const lines = formatStats(firstOrderStats(), { ...PLAIN, showCounters: true }).split('\n');

        assert.deepStrictEqual(lines.slice(8), [
            '  counters:',
            '    neval_obj: 3',
            '    neval_grad: 2'
        ]);
    });

    it('should list solver-specific entries in insertion order', () => {
        const stats = firstOrderStats({
            solver_specific: { radius: 0.01, inner: [1, 2, 3, 4, 5, 6], method: 'tr', restarts: 4 }
        });

        assert.deepStrictEqual(formatStats(stats, PLAIN).split('\n').slice(8), [
            '  solver specific:',
            '    radius: 1.00000000e-02',
            '    inner: [1 2 3 4 ⋯ 6]',
            '    method: tr',
            '    restarts: 4'
        ]);
    });

    it('should omit the solver-specific block when empty', () => {
        assert.ok(!formatStats(firstOrderStats(), PLAIN).includes('solver specific'));
    });

    it('should write the report and a newline to a sink', () => {
        const stats = firstOrderStats();
        const sink = new BufferSink();

        printStats(stats, sink, PLAIN);

        assert.strictEqual(sink.text, formatStats(stats, PLAIN) + '\n');
    });

    it('should summarize a run in one line', () => {
        assert.strictEqual(summarizeStats(firstOrderStats()), 'Execution stats: first-order stationary');
    });
});
