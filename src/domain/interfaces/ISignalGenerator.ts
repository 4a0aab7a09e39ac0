import { Bar } from '../entities/Bar';
import { PositionState } from '../entities/PositionState';
import { IndicatorRow } from '../value-objects/IndicatorRow';
import { InstrumentSignals, StepResult, SystemParams } from '../types/SignalTypes';

export interface ISignalGenerator {
    step(state: PositionState, bar: Bar, row: IndicatorRow, params: SystemParams): StepResult;
    generate(instrument: string, bars: Bar[]): InstrumentSignals;
}
