import { Bar } from '../../src/domain/entities/Bar';
import { DefaultTurtleConfig, TurtleConfig } from '../../src/config/turtle.config';
import { IndicatorEngine } from '../../src/application/services/indicators/IndicatorEngine';
import { IndicatorsProvider } from '../../src/application/services/indicators/IndicatorsProvider';
import { BarValidator } from '../../src/application/services/validation/BarValidator';
import { BreakoutDetector } from '../../src/application/services/detection/BreakoutDetector';
import { RiskEngine } from '../../src/application/services/risk/RiskEngine';
import { PositionTracker } from '../../src/application/services/state/PositionTracker';
import { TurtleStrategy } from '../../src/application/strategies/TurtleStrategy';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const START_MS = Date.UTC(2024, 0, 1);

export function timestampAt(index: number): number {
    return START_MS + index * DAY_MS;
}

export function makeBar(
    index: number,
    close: number,
    opts: { high?: number; low?: number; open?: number; volume?: number; symbol?: string } = {}
): Bar {
    return new Bar(
        timestampAt(index),
        opts.open ?? close,
        opts.high ?? close,
        opts.low ?? close - 1,
        close,
        opts.volume ?? 1000,
        opts.symbol ?? 'TEST'
    );
}

/**
 * Bars 1-20 close at 100..119 (high = close), bar 21 jumps to 121,
 * then closes keep rising by 1 until `count` bars exist.
 */
export function risingSeries(count: number = 25, symbol: string = 'TEST'): Bar[] {
    const bars: Bar[] = [];
    for (let i = 0; i < count; i++) {
        const close = i < 20 ? 100 + i : 101 + i;
        bars.push(makeBar(i, close, { symbol }));
    }
    return bars;
}

export function flatSeries(count: number, price: number = 100, symbol: string = 'FLAT'): Bar[] {
    const bars: Bar[] = [];
    for (let i = 0; i < count; i++) {
        bars.push(makeBar(i, price, { high: price, low: price, symbol }));
    }
    return bars;
}

/** Deterministic random walk. */
export function randomWalk(count: number, seed: number = 42, symbol: string = 'WALK'): Bar[] {
    let state = seed;
    const next = (): number => {
        state = (state * 1664525 + 1013904223) % 4294967296;
        return state / 4294967296;
    };

    const bars: Bar[] = [];
    let close = 100;
    for (let i = 0; i < count; i++) {
        const open = close;
        close = Math.max(1, close + (next() - 0.48) * 4);
        const high = Math.max(open, close) + next() * 2;
        const low = Math.min(open, close) - next() * 2;
        bars.push(new Bar(timestampAt(i), open, high, low, close, 1000, symbol));
    }
    return bars;
}

export function buildStrategy(overrides: Partial<TurtleConfig> = {}) {
    const config: TurtleConfig = { ...DefaultTurtleConfig, ...overrides };
    const engine = new IndicatorEngine();
    const indicators = new IndicatorsProvider(engine);
    const tracker = new PositionTracker(config);
    const strategy = new TurtleStrategy(
        config,
        new BarValidator(),
        indicators,
        new BreakoutDetector(),
        new RiskEngine(config),
        tracker
    );
    return { config, engine, indicators, tracker, strategy };
}
