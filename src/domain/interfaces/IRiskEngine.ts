export interface IRiskEngine {
    initialStop(entryPrice: number, atr: number): number;
    tightenStop(currentStop: number, entryPrice: number, atr: number): number;
    pyramidThreshold(lastEntryPrice: number, atr: number): number;
    isStopHit(close: number, stopPrice: number): boolean;
}
