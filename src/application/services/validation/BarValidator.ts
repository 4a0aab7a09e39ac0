import { injectable } from 'inversify';
import { IBarValidator } from '../../../domain/interfaces/IBarValidator';
import { Bar } from '../../../domain/entities/Bar';
import { BarWarning, ValidatedBars } from '../../../domain/types/SignalTypes';
import { DataOrderingError } from '../../../domain/errors/TurtleErrors';
import { Logger } from '../../../shared/logger/Logger';

@injectable()
export class BarValidator implements IBarValidator {
    private logger = Logger.getInstance();

    validate(symbol: string, bars: Bar[]): ValidatedBars {
        const accepted: Bar[] = [];
        const warnings: BarWarning[] = [];

        for (let i = 0; i < bars.length; i++) {
            const bar = bars[i];

            const problem = this.findProblem(bar);
            if (problem) {
                const warning = { symbol, index: i, timestamp: bar.timestamp, reason: problem };
                this.logger.forInstrument(symbol).warn(`skipping bar ${i} (${problem})`);
                warnings.push(warning);
                continue;
            }

            const previous = accepted[accepted.length - 1];
            if (previous && bar.timestamp <= previous.timestamp) {
                throw new DataOrderingError(symbol, i, bar.timestamp, previous.timestamp);
            }

            accepted.push(bar);
        }

        // Nothing skipped: return the caller's array itself
        return { bars: warnings.length === 0 ? bars : accepted, warnings };
    }

    private findProblem(bar: Bar): string | null {
        const fields: Array<[string, number]> = [
            ['timestamp', bar.timestamp],
            ['open', bar.open],
            ['high', bar.high],
            ['low', bar.low],
            ['close', bar.close],
            ['volume', bar.volume]
        ];
        for (const [name, value] of fields) {
            if (!Number.isFinite(value)) return `non-finite ${name}`;
        }
        if (bar.range < 0) return `high ${bar.high} below low ${bar.low}`;
        return null;
    }
}
