import { createContainer, TYPES } from '../../config/inversify.config';
import { loadTurtleConfig } from '../../config/configLoader';
import { GenerateSignals, SignalReport } from '../../application/use-cases/GenerateSignals';
import { IBarSource } from '../../domain/interfaces/IBarSource';
import { Bar } from '../../domain/entities/Bar';
import { Logger } from '../../shared/logger/Logger';

export async function runSignalsCommand(args: {
    barsPath: string;
    configPath: string;
    symbols?: string[];
}): Promise<SignalReport> {
    const logger = Logger.getInstance();

    const loaded = loadTurtleConfig(args.configPath);
    logger.setLogLevel(loaded.logLevel);
    logger.debug('Loaded configuration', loaded.trading);

    const container = createContainer(loaded.trading, args.barsPath);
    const source = container.get<IBarSource>(TYPES.IBarSource);
    const useCase = container.get<GenerateSignals>(GenerateSignals);

    const symbols = args.symbols && args.symbols.length > 0 ? args.symbols : await source.listSymbols();
    const data = new Map<string, Bar[]>();
    for (const symbol of symbols) {
        const bars = await source.getBars(symbol);
        if (bars.length === 0) {
            logger.warn(`No bars found for ${symbol}. Skipping.`);
            continue;
        }
        logger.forInstrument(symbol).info(`loaded ${bars.length} bars`);
        data.set(symbol, bars);
    }

    const report = useCase.execute(data);
    const summary = useCase.getSignalSummary();

    logger.info('=== SIGNAL SUMMARY ===');
    logger.info(`Symbols with signals: ${summary.totalSymbols}`);
    for (const [type, count] of Object.entries(summary.signalsByType)) {
        logger.info(`  ${type}: ${count}`);
    }
    for (const [system, count] of Object.entries(summary.signalsBySystem)) {
        logger.info(`  ${system}: ${count}`);
    }
    for (const [symbol, error] of report.failures) {
        logger.error(`Failed: ${symbol}`, error.message);
    }

    return report;
}
