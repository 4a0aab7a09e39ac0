import { injectable } from 'inversify';
import { IBreakoutDetector } from '../../../domain/interfaces/IBreakoutDetector';
import { Bar } from '../../../domain/entities/Bar';

@injectable()
export class BreakoutDetector implements IBreakoutDetector {
    // LONG entry: close strictly above the prior N-bar high
    isEntryBreakout(bar: Bar, donchianHigh: number): boolean {
        return bar.close > donchianHigh;
    }

    // Exit: close strictly below the prior N-bar low
    isExitBreakout(bar: Bar, donchianLow: number): boolean {
        return bar.close < donchianLow;
    }
}
