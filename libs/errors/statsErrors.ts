/**
 * Stats Error Taxonomy
 * Canonical errors for report construction and rendering, with machine-readable codes.
 * All of them are programmer errors: they propagate to the caller untouched.
 */

export type StatsErrorCode =
    | 'INVALID_STATUS'
    | 'UNKNOWN_FIELD'
    | 'MISSING_HEADER_LABEL'
    | 'INVALID_COUNTER'
    | 'INVALID_OPTION'
    | 'INVALID_CONFIG';

export class StatsError extends Error {
    readonly code: StatsErrorCode;

    constructor(code: StatsErrorCode, message: string) {
        super(message);
        this.name = 'StatsError';
        this.code = code;
        Object.setPrototypeOf(this, StatsError.prototype);
    }
}

export class InvalidStatusError extends StatsError {
    readonly status: unknown;
    readonly validStatuses: readonly string[];

    constructor(status: unknown, validStatuses: readonly string[]) {
        super(
            'INVALID_STATUS',
            `status ${String(status)} is not a valid status. Use one of the following: ${validStatuses.join(', ')}`
        );
        this.name = 'InvalidStatusError';
        this.status = status;
        this.validStatuses = validStatuses;
        Object.setPrototypeOf(this, InvalidStatusError.prototype);
    }
}

export class UnknownFieldError extends StatsError {
    readonly field: string;

    constructor(field: string) {
        super('UNKNOWN_FIELD', `Unknown field ${field}`);
        this.name = 'UnknownFieldError';
        this.field = field;
        Object.setPrototypeOf(this, UnknownFieldError.prototype);
    }
}

export class MissingHeaderLabelError extends StatsError {
    readonly field: string;

    constructor(field: string) {
        super('MISSING_HEADER_LABEL', `No header label for field ${field}`);
        this.name = 'MissingHeaderLabelError';
        this.field = field;
        Object.setPrototypeOf(this, MissingHeaderLabelError.prototype);
    }
}

export class InvalidCounterError extends StatsError {
    readonly counter: string;
    readonly reason: string;

    constructor(counter: string, reason: string) {
        super('INVALID_COUNTER', `Counter ${counter} is invalid: ${reason}`);
        this.name = 'InvalidCounterError';
        this.counter = counter;
        this.reason = reason;
        Object.setPrototypeOf(this, InvalidCounterError.prototype);
    }
}

export class InvalidOptionError extends StatsError {
    readonly option: string;
    readonly reason: string;

    constructor(option: string, reason: string) {
        super('INVALID_OPTION', `Option ${option} is invalid: ${reason}`);
        this.name = 'InvalidOptionError';
        this.option = option;
        this.reason = reason;
        Object.setPrototypeOf(this, InvalidOptionError.prototype);
    }
}

export class ConfigurationError extends StatsError {
    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super('INVALID_CONFIG', `Invalid stats configuration: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
        this.issues = issues;
        Object.setPrototypeOf(this, ConfigurationError.prototype);
    }
}
