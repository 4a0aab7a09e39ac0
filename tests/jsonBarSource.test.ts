import { join } from 'path';
import { JsonBarSource } from '../src/infrastructure/data/JsonBarSource';
import { JsonBarMapper } from '../src/infrastructure/data/JsonBarMapper';
import { InputFormatError } from '../src/domain/errors/TurtleErrors';

const FIXTURES = join(__dirname, 'fixtures');

describe('JsonBarSource', () => {
    test('lists the symbols in the file', async () => {
        const source = new JsonBarSource(join(FIXTURES, 'bars.json'));

        await expect(source.listSymbols()).resolves.toEqual(['AAA', 'BBB']);
    });

    test('maps records to bars, parsing ISO timestamps', async () => {
        const source = new JsonBarSource(join(FIXTURES, 'bars.json'));
        const bars = await source.getBars('AAA');

        expect(bars).toHaveLength(3);
        expect(bars[0].timestamp).toBe(Date.UTC(2024, 0, 1));
        expect(bars[0].symbol).toBe('AAA');
        expect(bars[0].close).toBe(10.5);
        expect(bars[1].timestamp).toBe(Date.UTC(2024, 0, 2));
        expect(bars[1].close).toBeNaN();
        expect(bars[2].volume).toBe(0);
    });

    test('marks an explicit null volume as missing but defaults an absent one to zero', () => {
        const base = { timestamp: 1704067200000, open: 10, high: 11, low: 9, close: 10.5 };

        expect(JsonBarMapper.toDomain({ ...base, volume: null }, 'AAA').volume).toBeNaN();
        expect(JsonBarMapper.toDomain(base, 'AAA').volume).toBe(0);
    });

    test('returns no bars for an unknown symbol', async () => {
        const source = new JsonBarSource(join(FIXTURES, 'bars.json'));

        await expect(source.getBars('ZZZ')).resolves.toEqual([]);
    });

    test('rejects records that do not match the bar shape', async () => {
        const source = new JsonBarSource(join(FIXTURES, 'invalid-bars.json'));

        await expect(source.getBars('AAA')).rejects.toThrow(InputFormatError);
    });
});

describe('JsonBarMapper', () => {
    test('turns an unparseable date into a non-finite timestamp', () => {
        const bar = JsonBarMapper.toDomain(
            { timestamp: 'not a date', open: 1, high: 2, low: 0.5, close: 1.5, volume: 10 },
            'XYZ'
        );

        expect(bar.timestamp).toBeNaN();
        expect(bar.range).toBe(1.5);
    });
});
