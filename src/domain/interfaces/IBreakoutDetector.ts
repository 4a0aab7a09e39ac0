import { Bar } from '../entities/Bar';

export interface IBreakoutDetector {
    isEntryBreakout(bar: Bar, donchianHigh: number): boolean;
    isExitBreakout(bar: Bar, donchianLow: number): boolean;
}
