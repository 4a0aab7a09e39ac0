import { Logger, LogLevel } from '../src/shared/logger/Logger';

describe('Logger', () => {
    const logger = Logger.getInstance();

    afterEach(() => {
        logger.setLogLevel(LogLevel.INFO);
        jest.restoreAllMocks();
    });

    test('is a single shared instance', () => {
        expect(Logger.getInstance()).toBe(logger);
    });

    test('drops messages below the configured level', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        logger.setLogLevel(LogLevel.WARN);
        logger.info('hidden');
        logger.warn('shown', { symbol: 'TEST' });

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] \[WARN\] shown$/), { symbol: 'TEST' });
    });

    test('prefixes instrument messages with the instrument and system', () => {
        const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        logger.forInstrument('AAA', 'S2').info('entered');
        logger.forInstrument('BBB').warn('skipping bar 3');

        expect(log).toHaveBeenCalledWith(expect.stringMatching(/\[INFO\] \[AAA\/S2\] entered$/), '');
        expect(warn).toHaveBeenCalledWith(expect.stringMatching(/\[WARN\] \[BBB\] skipping bar 3$/), '');
    });

    test('routes errors to console.error', () => {
        const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

        logger.error('boom');

        expect(error).toHaveBeenCalledWith(expect.stringContaining('[ERROR] boom'), '');
        expect(logger.getLogLevel()).toBe(LogLevel.INFO);
    });
});
