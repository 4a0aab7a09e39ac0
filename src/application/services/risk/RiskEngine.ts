import { injectable, inject } from 'inversify';
import { IRiskEngine } from '../../../domain/interfaces/IRiskEngine';
import { TurtleConfig } from '../../../config/turtle.config';
import { TYPES } from '../../../config/types';

/**
 * ATR-scaled stop and pyramid levels for long positions.
 */
@injectable()
export class RiskEngine implements IRiskEngine {
    constructor(
        @inject(TYPES.TurtleConfig) private readonly config: TurtleConfig
    ) {}

    initialStop(entryPrice: number, atr: number): number {
        return entryPrice - this.config.stopAtrMultiple * atr;
    }

    // Stops only move up.
    tightenStop(currentStop: number, entryPrice: number, atr: number): number {
        return Math.max(currentStop, this.initialStop(entryPrice, atr));
    }

    pyramidThreshold(lastEntryPrice: number, atr: number): number {
        return lastEntryPrice + this.config.pyramidIncrement * atr;
    }

    isStopHit(close: number, stopPrice: number): boolean {
        return close <= stopPrice;
    }
}
