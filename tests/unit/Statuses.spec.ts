import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
    STATUSES,
    STATUS_KEYS,
    describeStatus,
    formatStatusList,
    isStatus,
    listStatuses,
    showStatuses
} from '../../libs/status/statuses.js';
import { InvalidStatusError } from '../../libs/errors/statsErrors.js';
import { BufferSink } from '../helpers/models.js';

describe('Status Vocabulary', () => {
    it('should describe every status with a non-empty string', () => {
        for (const key of STATUS_KEYS) {
            assert.ok(describeStatus(key).length > 0, `${key} should have a description`);
        }
    });

    it('should hold exactly the fifteen known statuses', () => {
        assert.strictEqual(STATUS_KEYS.length, 15);
        assert.deepStrictEqual(Object.keys(STATUSES).sort(), [...STATUS_KEYS].sort());
    });

    it('should describe known statuses verbatim', () => {
        assert.strictEqual(describeStatus('first_order'), 'first-order stationary');
        assert.strictEqual(describeStatus('max_eval'), 'maximum number of function evaluations');
        assert.strictEqual(describeStatus('unbounded'), 'objective function may be unbounded from below');
        assert.strictEqual(describeStatus('user'), 'user-requested stop');
    });

    it('should list every status sorted by key', () => {
        const keys = listStatuses().map(([key]) => key);
        assert.deepStrictEqual(keys, [
            'acceptable',
            'exception',
            'first_order',
            'infeasible',
            'max_eval',
            'max_iter',
            'max_time',
            'neg_pred',
            'not_desc',
            'small_residual',
            'small_step',
            'stalled',
            'unbounded',
            'unknown',
            'user'
        ]);
        assert.deepStrictEqual(listStatuses()[0], ['acceptable', 'solved to within acceptable tolerances']);
    });

    it('should reject statuses outside the vocabulary', () => {
        for (const bad of ['', 'converged', 'FIRST_ORDER', 'toString', 'first_order ']) {
            assert.strictEqual(isStatus(bad), false, `${JSON.stringify(bad)} should not be a status`);
            assert.throws(
                () => describeStatus(bad),
                (err: unknown) => err instanceof InvalidStatusError && err.status === bad && err.validStatuses.length === 15
            );
        }
    });

    it('should not accept non-string values', () => {
        assert.strictEqual(isStatus(42), false);
        assert.strictEqual(isStatus(undefined), false);
    });

    it('should render the listing with aligned keys', () => {
        const lines = formatStatusList().split('\n');

        assert.strictEqual(lines.length, 16);
        assert.strictEqual(lines[0], 'STATUSES:');
        assert.strictEqual(lines[1], '  acceptable     => solved to within acceptable tolerances');
        assert.strictEqual(lines[10], '  small_residual => small residual');
        assert.strictEqual(lines[15], '  user           => user-requested stop');
    });

    it('should write the listing to a sink', () => {
        const sink = new BufferSink();
        showStatuses(sink);

        assert.strictEqual(sink.text, formatStatusList() + '\n');
    });
});
