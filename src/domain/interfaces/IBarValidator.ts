import { Bar } from '../entities/Bar';
import { ValidatedBars } from '../types/SignalTypes';

export interface IBarValidator {
    /** @throws DataOrderingError when timestamps are not strictly increasing */
    validate(symbol: string, bars: Bar[]): ValidatedBars;
}
