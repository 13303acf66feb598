import { MissingHeaderLabelError, UnknownFieldError } from '../errors/statsErrors.js';
import { COUNTER_NAMES, getCount, nonZeroCounts } from '../counters/counters.js';
import type { CounterName } from '../counters/counters.js';
import { formatInt, formatReal, formatText, formatValue, formatVector } from '../display/numberFormat.js';
import { getStatus } from './executionStats.js';
import type { ExecutionStats } from './executionStats.js';

export type DeclaredField = keyof ExecutionStats;

export type StatsField = DeclaredField | CounterName;

type FieldSpec =
    | { readonly kind: 'int'; readonly read: (stats: ExecutionStats) => number }
    | { readonly kind: 'real'; readonly read: (stats: ExecutionStats) => number }
    | { readonly kind: 'text'; readonly read: (stats: ExecutionStats) => string };

const DECLARED_FIELDS: { readonly [K in DeclaredField]: FieldSpec } = {
    status: { kind: 'text', read: getStatus },
    solution: { kind: 'text', read: stats => formatVector(stats.solution) },
    objective: { kind: 'real', read: stats => stats.objective },
    dual_feas: { kind: 'real', read: stats => stats.dual_feas },
    primal_feas: { kind: 'real', read: stats => stats.primal_feas },
    iter: { kind: 'int', read: stats => stats.iter },
    counters: {
        kind: 'text',
        read: stats => `{${nonZeroCounts(stats.counters).map(([name, count]) => `${name}: ${count}`).join(', ')}}`,
    },
    elapsed_time: { kind: 'real', read: stats => stats.elapsed_time },
    solver_specific: {
        kind: 'text',
        read: stats => `{${[...stats.solver_specific].map(([key, value]) => `${key}: ${formatValue(value)}`).join(', ')}}`,
    },
};

const FIELD_TABLE: ReadonlyMap<string, FieldSpec> = new Map<string, FieldSpec>([
    ...COUNTER_NAMES.map((name): [string, FieldSpec] => [
        name,
        { kind: 'int', read: stats => getCount(stats.counters, name) },
    ]),
    ...Object.entries(DECLARED_FIELDS),
]);

/**
 * Column headers for tabular logs. Widths match the formatted field widths.
 */
export const HEADER_LABELS = {
    status: '  Status',
    iter: '   Iter',
    neval_obj: '   #obj',
    neval_grad: '  #grad',
    neval_cons: '  #cons',
    neval_jcon: '  #jcon',
    neval_jgrad: ' #jgrad',
    neval_jac: '   #jac',
    neval_jprod: ' #jprod',
    neval_jtprod: '#jtprod',
    neval_hess: '  #hess',
    neval_hprod: ' #hprod',
    neval_jhprod: '#jhprod',
    objective: '              f',
    dual_feas: '           ‖∇f‖',
    primal_feas: '            ‖c‖',
    elapsed_time: '   Elapsed time',
} as const satisfies Partial<Record<StatsField, string>>;

const HEADER_TABLE: ReadonlyMap<string, string> = new Map(Object.entries(HEADER_LABELS));

export const COLUMN_SEPARATOR = '  ';

export function isStatsField(name: string): name is StatsField {
    return FIELD_TABLE.has(name);
}

/**
 * Fixed-width rendering of one field: integers `%7d`, reals `%15.8e`, everything else `%8s`.
 * `status` renders as its description.
 */
export function statsGetField(stats: ExecutionStats, name: string): string {
    const entry = FIELD_TABLE.get(name);
    if (!entry) {
        throw new UnknownFieldError(name);
    }

    switch (entry.kind) {
        case 'int':
            return formatInt(entry.read(stats));
        case 'real':
            return formatReal(entry.read(stats));
        case 'text':
            return formatText(entry.read(stats));
    }
}

export function statsHead(fields: readonly string[]): string {
    return fields
        .map(name => {
            const label = HEADER_TABLE.get(name);
            if (label === undefined) {
                throw new MissingHeaderLabelError(name);
            }
            return label;
        })
        .join(COLUMN_SEPARATOR);
}

export function statsLine(stats: ExecutionStats, fields: readonly string[]): string {
    return fields.map(name => statsGetField(stats, name)).join(COLUMN_SEPARATOR);
}
