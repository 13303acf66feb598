import { z } from 'zod';
import { logger } from '../logging/logger.js';
import { InvalidOptionError, InvalidStatusError } from '../errors/statsErrors.js';
import { STATUSES, SORTED_STATUS_KEYS, isStatus } from '../status/statuses.js';
import type { SolverStatus } from '../status/statuses.js';
import { emptyVectorLike, isNumericVector, precisionOf, snapshotCounters } from '../counters/model.js';
import type { EvaluationModel, NumericVector, Precision } from '../counters/model.js';
import type { NlsCounters } from '../counters/counters.js';

export type SolverSpecific = ReadonlyMap<string, unknown>;

/**
 * Outcome of a solve. Implementations only store values, they never compute them.
 */
export interface ExecutionStats {
    readonly status: SolverStatus;
    /** Final approximation returned by the solver. */
    readonly solution: NumericVector;
    /** Objective value at `solution`. */
    readonly objective: number;
    /** Stationarity measure at `solution`, e.g. ‖∇f(x)‖ for unconstrained problems. */
    readonly dual_feas: number;
    /** Constraint violation at `solution`. */
    readonly primal_feas: number;
    readonly iter: number;
    readonly counters: NlsCounters;
    /** Seconds. */
    readonly elapsed_time: number;
    readonly solver_specific: SolverSpecific;
}

export interface ExecutionStatsOptions {
    solution?: NumericVector;
    objective?: number;
    dual_feas?: number;
    primal_feas?: number;
    iter?: number;
    elapsed_time?: number;
    solver_specific?: SolverSpecific | Readonly<Record<string, unknown>>;
}

const RealSchema = z.union([z.number(), z.nan()]);

/**
 * Reals may be infinite or NaN; `iter` is a safe integer, -1 meaning "not recorded".
 */
export const ExecutionStatsOptionsSchema = z.object({
    solution: z.custom<NumericVector>(isNumericVector, { message: 'Expected a numeric vector' }).optional(),
    objective: RealSchema.optional(),
    dual_feas: RealSchema.optional(),
    primal_feas: RealSchema.optional(),
    iter: z.number().int().safe().min(-1).optional(),
    elapsed_time: RealSchema.optional(),
    solver_specific: z.custom<SolverSpecific | Readonly<Record<string, unknown>>>(
        value => typeof value === 'object' && value !== null,
        { message: 'Expected a map or an object' }
    ).optional(),
});

function parseOptions(options: ExecutionStatsOptions): z.infer<typeof ExecutionStatsOptionsSchema> {
    const result = ExecutionStatsOptionsSchema.safeParse(options);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new InvalidOptionError(
            issue ? issue.path.join('.') : 'options',
            issue ? issue.message : 'unreadable options'
        );
    }
    return result.data;
}

function copyVector(x: NumericVector): NumericVector {
    if (x instanceof Float32Array) return new Float32Array(x);
    if (x instanceof Float64Array) return new Float64Array(x);
    return Object.freeze([...x]);
}

function toSolverSpecific(entries: SolverSpecific | Readonly<Record<string, unknown>>): SolverSpecific {
    return entries instanceof Map ? new Map(entries) : new Map(Object.entries(entries));
}

/**
 * Record of a solver run.
 *
 * `status` is mandatory and must belong to the status vocabulary. The model's
 * evaluation counters are copied at construction; later evaluations on the
 * model do not show up here. Every other field defaults as follows:
 * - `solution`: empty, in the container type of `model.meta.x0`
 * - `objective`, `dual_feas`, `elapsed_time`: Infinity
 * - `primal_feas`: 0 when the model is unconstrained, Infinity otherwise
 * - `iter`: -1
 * - `solver_specific`: empty
 */
export class GenericExecutionStats implements ExecutionStats {
    readonly status: SolverStatus;
    readonly solution: NumericVector;
    readonly objective: number;
    readonly dual_feas: number;
    readonly primal_feas: number;
    readonly iter: number;
    readonly counters: NlsCounters;
    readonly elapsed_time: number;
    readonly solver_specific: SolverSpecific;
    /** Precision of the model's initial point. */
    readonly precision: Precision;

    constructor(status: string, model: EvaluationModel, options: ExecutionStatsOptions = {}) {
        if (!isStatus(status)) {
            logger.error(
                { status, validStatuses: SORTED_STATUS_KEYS },
                `status ${status} is not a valid status`
            );
            throw new InvalidStatusError(status, SORTED_STATUS_KEYS);
        }

        const parsed = parseOptions(options);
        const x0 = model.meta.x0;
        this.status = status;
        this.precision = precisionOf(x0);
        this.solution = copyVector(parsed.solution ?? emptyVectorLike(x0));
        this.objective = parsed.objective ?? Infinity;
        this.dual_feas = parsed.dual_feas ?? Infinity;
        this.primal_feas = parsed.primal_feas ?? (model.isUnconstrained() ? 0 : Infinity);
        this.iter = parsed.iter ?? -1;
        this.elapsed_time = parsed.elapsed_time ?? Infinity;
        this.solver_specific = toSolverSpecific(parsed.solver_specific ?? {});
        this.counters = snapshotCounters(model);

        logger.debug({ status, iter: this.iter }, 'execution stats recorded');
    }

    toString(): string {
        return `Execution stats: ${getStatus(this)}`;
    }
}

export function getStatus(stats: ExecutionStats): string {
    return STATUSES[stats.status];
}
