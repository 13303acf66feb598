import { z } from 'zod';
import { ConfigurationError } from '../errors/statsErrors.js';

/**
 * Stats Configuration
 * Environment-driven settings for logging and report rendering.
 * Parsed once; any invalid value fails the whole load.
 */

const BooleanFlagSchema = z.enum(['true', 'false']).transform(value => value === 'true');

export const StatsEnvSchema = z.object({
    STATS_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    STATS_VECTOR_MAX_SHOWN: z.coerce.number().int().min(2).default(5),
    STATS_REPEAT_PRIMAL_FEAS: BooleanFlagSchema.default('false'),
    STATS_SHOW_COUNTERS: BooleanFlagSchema.default('false'),
});

export interface StatsConfig {
    readonly logLevel: z.infer<typeof StatsEnvSchema>['STATS_LOG_LEVEL'];
    /** Longest vector printed in full; longer ones are elided. */
    readonly vectorMaxShown: number;
    readonly repeatPrimalFeasibility: boolean;
    readonly showCounters: boolean;
}

export function loadStatsConfig(env: NodeJS.ProcessEnv): StatsConfig {
    const result = StatsEnvSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigurationError(
            result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    return Object.freeze({
        logLevel: result.data.STATS_LOG_LEVEL,
        vectorMaxShown: result.data.STATS_VECTOR_MAX_SHOWN,
        repeatPrimalFeasibility: result.data.STATS_REPEAT_PRIMAL_FEAS,
        showCounters: result.data.STATS_SHOW_COUNTERS,
    });
}

export const statsConfig: StatsConfig = loadStatsConfig(process.env);
