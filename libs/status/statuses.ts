import { z } from 'zod';
import { InvalidStatusError } from '../errors/statsErrors.js';
import type { TextSink } from '../display/textSink.js';

/**
 * Solver Status Vocabulary
 * Closed set of termination reasons shared by every solver report.
 */

export const STATUS_KEYS = [
    'exception',
    'first_order',
    'acceptable',
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
    'user',
] as const;

export type SolverStatus = typeof STATUS_KEYS[number];

export const STATUSES: Readonly<Record<SolverStatus, string>> = Object.freeze({
    exception: 'unhandled exception',
    first_order: 'first-order stationary',
    acceptable: 'solved to within acceptable tolerances',
    infeasible: 'problem may be infeasible',
    max_eval: 'maximum number of function evaluations',
    max_iter: 'maximum iteration',
    max_time: 'maximum elapsed time',
    neg_pred: 'negative predicted reduction',
    not_desc: 'not a descent direction',
    small_residual: 'small residual',
    small_step: 'step too small',
    stalled: 'stalled',
    unbounded: 'objective function may be unbounded from below',
    unknown: 'unknown',
    user: 'user-requested stop',
});

export const StatusSchema = z.enum(STATUS_KEYS);

export const SORTED_STATUS_KEYS: readonly SolverStatus[] = Object.freeze([...STATUS_KEYS].sort());

export function isStatus(value: unknown): value is SolverStatus {
    return StatusSchema.safeParse(value).success;
}

export function describeStatus(status: string): string {
    if (!isStatus(status)) {
        throw new InvalidStatusError(status, SORTED_STATUS_KEYS);
    }
    return STATUSES[status];
}

/**
 * All statuses with their descriptions, sorted by key.
 */
export function listStatuses(): Array<[SolverStatus, string]> {
    return SORTED_STATUS_KEYS.map(key => [key, STATUSES[key]]);
}

export function formatStatusList(): string {
    const lines = listStatuses().map(([key, description]) => `  ${key.padEnd(14)} => ${description}`);
    return ['STATUSES:', ...lines].join('\n');
}

export function showStatuses(sink: TextSink = process.stdout): void {
    sink.write(formatStatusList() + '\n');
}
