import { BarValidator } from '../src/application/services/validation/BarValidator';
import { Bar } from '../src/domain/entities/Bar';
import { DataOrderingError } from '../src/domain/errors/TurtleErrors';
import { Logger, LogLevel } from '../src/shared/logger/Logger';
import { makeBar, timestampAt } from './helpers/bars';

describe('BarValidator', () => {
    const validator = new BarValidator();

    beforeAll(() => {
        Logger.getInstance().setLogLevel(LogLevel.ERROR);
    });

    test('passes a clean series through unchanged', () => {
        const bars = [makeBar(0, 10), makeBar(1, 11), makeBar(2, 12)];
        const result = validator.validate('TEST', bars);

        expect(result.bars).toBe(bars);
        expect(result.warnings).toEqual([]);
    });

    test('skips a bar with a non-finite price and reports it', () => {
        const bad = new Bar(timestampAt(1), 10, 11, 9, NaN, 100, 'TEST');
        const result = validator.validate('TEST', [makeBar(0, 10), bad, makeBar(2, 12)]);

        expect(result.bars.map(b => b.close)).toEqual([10, 12]);
        expect(result.warnings[0].reason).toBe('non-finite close');
        expect(result.warnings).toEqual([
            { symbol: 'TEST', index: 1, timestamp: timestampAt(1), reason: 'non-finite close' }
        ]);
    });

    test('skips a bar whose high is below its low', () => {
        const inverted = new Bar(timestampAt(1), 10, 9, 10, 9.5, 100, 'TEST');
        const result = validator.validate('TEST', [makeBar(0, 10), inverted]);

        expect(result.bars).toHaveLength(1);
        expect(result.warnings[0].reason).toBe('high 9 below low 10');
    });

    test('fails on a duplicate timestamp', () => {
        const bars = [makeBar(0, 10), makeBar(1, 11), makeBar(1, 12)];

        expect(() => validator.validate('TEST', bars)).toThrow(DataOrderingError);
        try {
            validator.validate('TEST', bars);
        } catch (error) {
            expect(error).toBeInstanceOf(DataOrderingError);
            if (error instanceof DataOrderingError) {
                expect(error.symbol).toBe('TEST');
                expect(error.index).toBe(2);
                expect(error.code).toBe('DATA_ORDERING');
                expect(error.message).toBe(`TEST: duplicate timestamp ${timestampAt(1)} at bar 2`);
            }
        }
    });

    test('fails on a timestamp that goes backwards', () => {
        const bars = [makeBar(0, 10), makeBar(2, 11), makeBar(1, 12)];

        expect(() => validator.validate('TEST', bars)).toThrow(/earlier than/);
    });

    test('orders against the last accepted bar, not a skipped one', () => {
        const skipped = new Bar(timestampAt(5), NaN, 11, 9, 10, 100, 'TEST');
        const result = validator.validate('TEST', [makeBar(0, 10), skipped, makeBar(1, 11)]);

        expect(result.bars).toHaveLength(2);
        expect(result.warnings[0].reason).toBe('non-finite open');
    });
});
