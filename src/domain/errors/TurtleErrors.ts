import { PositionStatus } from '../enums/PositionStatus';

export type TurtleErrorCode =
    | 'DATA_ORDERING'
    | 'INDICATOR_PARAMETER'
    | 'INVALID_TRANSITION'
    | 'UNIT_LIMIT'
    | 'CONFIG_VALIDATION'
    | 'INPUT_FORMAT';

export abstract class TurtleError extends Error {
    abstract readonly code: TurtleErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * Raised when an instrument's bars are not strictly increasing in time.
 * Fatal for that instrument only.
 */
export class DataOrderingError extends TurtleError {
    readonly code = 'DATA_ORDERING';

    constructor(
        public readonly symbol: string,
        public readonly index: number,
        public readonly timestamp: number,
        public readonly previousTimestamp: number
    ) {
        super(
            timestamp === previousTimestamp
                ? `${symbol}: duplicate timestamp ${timestamp} at bar ${index}`
                : `${symbol}: timestamp ${timestamp} at bar ${index} is earlier than ${previousTimestamp}`
        );
    }
}

export class IndicatorParameterError extends TurtleError {
    readonly code = 'INDICATOR_PARAMETER';

    constructor(public readonly parameter: string, public readonly value: number) {
        super(`${parameter} must be a positive integer, got ${value}`);
    }
}

export class InvalidTransitionError extends TurtleError {
    readonly code = 'INVALID_TRANSITION';

    constructor(public readonly from: PositionStatus, public readonly to: PositionStatus) {
        super(`Invalid position transition from ${from} to ${to}`);
    }
}

export class UnitLimitError extends TurtleError {
    readonly code = 'UNIT_LIMIT';

    constructor(public readonly maxUnits: number) {
        super(`Position already holds the maximum of ${maxUnits} units`);
    }
}

export class ConfigValidationError extends TurtleError {
    readonly code = 'CONFIG_VALIDATION';

    constructor(public readonly source: string, public readonly issues: string[]) {
        super(`Invalid configuration in ${source}: ${issues.join('; ')}`);
    }
}

export class InputFormatError extends TurtleError {
    readonly code = 'INPUT_FORMAT';

    constructor(public readonly source: string, public readonly issues: string[]) {
        super(`Unreadable bar data in ${source}: ${issues.join('; ')}`);
    }
}
