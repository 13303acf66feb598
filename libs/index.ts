/**
 * Solver Stats
 *
 * Result records for numerical optimization solvers, with fixed-width
 * tabular rendering and a human-readable report.
 */

// Status Vocabulary
export type { SolverStatus } from './status/statuses.js';
export {
    STATUSES,
    STATUS_KEYS,
    StatusSchema,
    isStatus,
    describeStatus,
    listStatuses,
    formatStatusList,
    showStatuses
} from './status/statuses.js';

// Evaluation Counters
export type {
    Counters,
    NlsCounters,
    CounterName,
    BaseCounterName,
    NlsCounterName
} from './counters/counters.js';
export {
    BASE_COUNTER_NAMES,
    NLS_COUNTER_NAMES,
    COUNTER_NAMES,
    getCount,
    nonZeroCounts,
    zeroCounters,
    zeroNlsCounters
} from './counters/counters.js';
export type { EvaluationModel, LeastSquaresModel, NumericVector, Precision } from './counters/model.js';
export { isLeastSquaresModel, snapshotCounters, precisionOf } from './counters/model.js';

// Execution Stats
export type { ExecutionStats, ExecutionStatsOptions, SolverSpecific } from './stats/executionStats.js';
export { ExecutionStatsOptionsSchema, GenericExecutionStats, getStatus } from './stats/executionStats.js';
export type { StatsField, DeclaredField } from './stats/fields.js';
export { HEADER_LABELS, isStatsField, statsGetField, statsHead, statsLine } from './stats/fields.js';

// Display
export type { TextSink } from './display/textSink.js';
export type { VectorDisplayOptions, VectorFormatter } from './display/numberFormat.js';
export { formatInt, formatReal, formatScientific, formatText, formatVector } from './display/numberFormat.js';
export type { ReportOptions } from './display/report.js';
export { formatStats, printStats, summarizeStats } from './display/report.js';

// Errors
export type { StatsErrorCode } from './errors/statsErrors.js';
export {
    StatsError,
    InvalidStatusError,
    UnknownFieldError,
    MissingHeaderLabelError,
    InvalidCounterError,
    InvalidOptionError,
    ConfigurationError
} from './errors/statsErrors.js';

// Configuration
export type { StatsConfig } from './config/statsConfig.js';
export { loadStatsConfig, statsConfig } from './config/statsConfig.js';
