import { injectable } from 'inversify';
import { IIndicatorEngine } from '../../../domain/interfaces/IIndicatorEngine';
import { Bar } from '../../../domain/entities/Bar';
import { DonchianChannel } from '../../../domain/value-objects/DonchianChannel';
import { IndicatorParameterError } from '../../../domain/errors/TurtleErrors';

/**
 * Full-series indicator calculations. Every output array is aligned
 * index-for-index with its input and holds `null` where history is too short.
 */
@injectable()
export class IndicatorEngine implements IIndicatorEngine {

    trueRange(bars: Bar[]): Array<number | null> {
        return bars.map((bar, i) => (i === 0 ? null : bar.trueRange(bars[i - 1].close)));
    }

    /**
     * Channel over the `length` bars BEFORE index i, so a bar is never
     * compared against its own high or low.
     */
    donchian(bars: Bar[], length: number): DonchianChannel {
        this.assertLength('donchian length', length);

        const upper: Array<number | null> = [];
        const lower: Array<number | null> = [];

        for (let i = 0; i < bars.length; i++) {
            if (i < length) {
                upper.push(null);
                lower.push(null);
                continue;
            }
            let high = -Infinity;
            let low = Infinity;
            for (let j = i - length; j < i; j++) {
                high = Math.max(high, bars[j].high);
                low = Math.min(low, bars[j].low);
            }
            upper.push(high);
            lower.push(low);
        }

        return { length, upper, lower };
    }

    /**
     * Wilder ATR. Seeded with the mean of the first `period` True Range
     * samples (bars 1..period), then smoothed.
     */
    atr(bars: Bar[], period: number): Array<number | null> {
        this.assertLength('atr period', period);

        const results: Array<number | null> = bars.map(() => null);
        if (bars.length <= period) return results;

        const trs = this.trueRange(bars);

        let sumTR = 0;
        for (let i = 1; i <= period; i++) {
            sumTR += trs[i] ?? 0;
        }
        let currentATR = sumTR / period;
        results[period] = currentATR;

        for (let i = period + 1; i < bars.length; i++) {
            currentATR = (currentATR * (period - 1) + (trs[i] ?? 0)) / period;
            results[i] = currentATR;
        }

        return results;
    }

    sma(values: number[], window: number): Array<number | null> {
        this.assertLength('sma window', window);

        return values.map((_, i) => {
            if (i < window - 1) return null;
            const slice = values.slice(i - window + 1, i + 1);
            return slice.reduce((sum, val) => sum + val, 0) / window;
        });
    }

    private assertLength(name: string, value: number): void {
        if (!Number.isInteger(value) || value <= 0) {
            throw new IndicatorParameterError(name, value);
        }
    }
}
