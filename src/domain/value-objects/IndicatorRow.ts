/**
 * Indicator values aligned to a single bar. `null` means not enough history yet.
 * Donchian values are keyed by channel length.
 */
export interface IndicatorRow {
    readonly timestamp: number;
    readonly donchianHigh: ReadonlyMap<number, number | null>;
    readonly donchianLow: ReadonlyMap<number, number | null>;
    readonly atr: number | null;
    readonly sma: number | null;
}
