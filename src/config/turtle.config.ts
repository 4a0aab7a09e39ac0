/**
 * Turtle breakout system defaults.
 *
 * Lengths and periods are counted in bars. `maxPositionTime` is the number of
 * bars a position may be held before it is closed regardless of price.
 */

export interface TurtleConfig {
    // Entry channels
    system1Length: number;
    system2Length: number;
    useSystem2: boolean;

    // Volatility and stops
    atrPeriod: number;
    stopAtrMultiple: number;

    // Exit channels
    exitLengthS1: number;
    exitLengthS2: number;

    // Pyramiding
    maxUnitsPerPosition: number;
    pyramidIncrement: number;

    // Limits
    maxPositionTime: number;

    // Trend filter reported alongside each row, not used for decisions
    smaWindow: number;
}

export const DefaultTurtleConfig: Readonly<TurtleConfig> = {
    system1Length: 20,
    system2Length: 55,
    useSystem2: true,

    atrPeriod: 20,
    stopAtrMultiple: 2.0,

    exitLengthS1: 10,
    exitLengthS2: 20,

    maxUnitsPerPosition: 5,
    pyramidIncrement: 0.5,

    maxPositionTime: 252,

    smaWindow: 50
};

/**
 * Stable key for every parameter that affects indicator output.
 */
export function configFingerprint(config: TurtleConfig): string {
    return [
        config.system1Length,
        config.system2Length,
        config.useSystem2 ? 1 : 0,
        config.exitLengthS1,
        config.exitLengthS2,
        config.atrPeriod,
        config.smaWindow
    ].join('-');
}
