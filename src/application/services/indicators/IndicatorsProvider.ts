import { injectable, inject } from 'inversify';
import { IIndicators } from '../../../domain/interfaces/IIndicators';
import { IIndicatorEngine } from '../../../domain/interfaces/IIndicatorEngine';
import { Bar } from '../../../domain/entities/Bar';
import { DonchianChannel } from '../../../domain/value-objects/DonchianChannel';
import { IndicatorRow } from '../../../domain/value-objects/IndicatorRow';
import { TurtleConfig, configFingerprint } from '../../../config/turtle.config';
import { TYPES } from '../../../config/types';
import { Logger } from '../../../shared/logger/Logger';

interface CacheEntry<T> {
    bars: Bar[];
    length: number;
    value: T;
}

type Series = Array<number | null>;

/**
 * Builds per-bar indicator rows and caches the underlying series.
 *
 * A cache entry is keyed on instrument, indicator kind, window length and the
 * config fingerprint, and is only reused for the same bar array it was
 * computed from, at the same length. Handing in a config with a different
 * fingerprint drops the whole cache.
 */
@injectable()
export class IndicatorsProvider implements IIndicators {
    private logger = Logger.getInstance();
    private channelCache = new Map<string, CacheEntry<DonchianChannel>>();
    private seriesCache = new Map<string, CacheEntry<Series>>();
    private fingerprint: string | null = null;

    constructor(
        @inject(TYPES.IIndicatorEngine) private readonly engine: IIndicatorEngine
    ) { }

    rows(symbol: string, bars: Bar[], config: TurtleConfig): IndicatorRow[] {
        const fp = configFingerprint(config);
        if (this.fingerprint !== null && this.fingerprint !== fp) {
            this.logger.debug(`Indicator parameters changed (${this.fingerprint} → ${fp}), clearing cache`);
            this.clear();
        }
        this.fingerprint = fp;

        const channels = this.channelLengths(config).map(length =>
            this.cached(this.channelCache, `${symbol}|donchian|${length}|${fp}`, bars,
                () => this.engine.donchian(bars, length))
        );
        const atr = this.cached(this.seriesCache, `${symbol}|atr|${config.atrPeriod}|${fp}`, bars,
            () => this.engine.atr(bars, config.atrPeriod));
        const sma = this.cached(this.seriesCache, `${symbol}|sma|${config.smaWindow}|${fp}`, bars,
            () => this.engine.sma(bars.map(b => b.close), config.smaWindow));

        return bars.map((bar, i) => {
            const donchianHigh = new Map<number, number | null>();
            const donchianLow = new Map<number, number | null>();
            for (const channel of channels) {
                donchianHigh.set(channel.length, channel.upper[i]);
                donchianLow.set(channel.length, channel.lower[i]);
            }
            return {
                timestamp: bar.timestamp,
                donchianHigh,
                donchianLow,
                atr: atr[i],
                sma: sma[i]
            };
        });
    }

    clear(): void {
        this.channelCache.clear();
        this.seriesCache.clear();
    }

    get cacheSize(): number {
        return this.channelCache.size + this.seriesCache.size;
    }

    private channelLengths(config: TurtleConfig): number[] {
        const lengths = new Set<number>([config.system1Length, config.exitLengthS1]);
        if (config.useSystem2) {
            lengths.add(config.system2Length);
            lengths.add(config.exitLengthS2);
        }
        return [...lengths].sort((a, b) => a - b);
    }

    private cached<T>(cache: Map<string, CacheEntry<T>>, key: string, bars: Bar[], compute: () => T): T {
        const hit = cache.get(key);
        if (hit && hit.bars === bars && hit.length === bars.length) {
            this.logger.debug(`[CACHE] hit ${key}`);
            return hit.value;
        }
        const value = compute();
        cache.set(key, { bars, length: bars.length, value });
        return value;
    }
}
