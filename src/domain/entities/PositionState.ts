import { PositionStatus } from '../enums/PositionStatus';
import { SystemId } from '../enums/SystemId';

export interface Unit {
    readonly entryPrice: number;
    readonly entryTimestamp: number;
}

/**
 * Position of one trading system on one instrument.
 * Values are never mutated; every transition yields a new state.
 */
export interface PositionState {
    readonly instrument: string;
    readonly systemId: SystemId;
    readonly status: PositionStatus;
    readonly units: readonly Unit[];
    /** `null` while FLAT. */
    readonly stopPrice: number | null;
    /** Bars elapsed since the first unit was opened. */
    readonly barsHeld: number;
}

export function lastUnit(state: PositionState): Unit | null {
    return state.units.length > 0 ? state.units[state.units.length - 1] : null;
}
