import { Bar } from '../entities/Bar';
import { PositionState } from '../entities/PositionState';
import { Signal } from '../value-objects/Signal';
import { SystemId } from '../enums/SystemId';

export { SystemId };

export interface SystemParams {
    systemId: SystemId;
    entryLength: number;
    exitLength: number;
}

export interface BarWarning {
    symbol: string;
    index: number;
    timestamp: number;
    reason: string;
}

export interface ValidatedBars {
    bars: Bar[];
    warnings: BarWarning[];
}

export interface StepResult {
    state: PositionState;
    signal: Signal | null;
}

export interface InstrumentSignals {
    instrument: string;
    signals: Signal[];
    positions: PositionState[];
    warnings: BarWarning[];
}
