// src/config/types.ts
export const TYPES = {
    TurtleConfig: Symbol.for('TurtleConfig'),
    BarsPath: Symbol.for('BarsPath'),
    IBarSource: Symbol.for('IBarSource'),
    IBarValidator: Symbol.for('IBarValidator'),
    IIndicatorEngine: Symbol.for('IIndicatorEngine'),
    IIndicators: Symbol.for('IIndicators'),
    IBreakoutDetector: Symbol.for('IBreakoutDetector'),
    IRiskEngine: Symbol.for('IRiskEngine'),
    IPositionTracker: Symbol.for('IPositionTracker'),
    ISignalGenerator: Symbol.for('ISignalGenerator')
};
