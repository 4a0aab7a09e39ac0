#!/usr/bin/env node
import 'reflect-metadata';
import { runSignalsCommand } from './presentation/cli/SignalsCommand';
import { Logger } from './shared/logger/Logger';

async function main() {
    const logger = Logger.getInstance();
    const args = process.argv.slice(2);
    const barsPath = args[0];
    const configPath = args[1] || 'config.yaml';

    if (!barsPath) {
        logger.error('Usage: turtle-signals <bars.json> [config.yaml] [SYMBOL,SYMBOL,...]');
        process.exit(1);
    }

    // Optional comma-separated symbol filter (e.g. AAPL,MSFT)
    const symbols = args[2] ? args[2].split(',').map(s => s.trim()).filter(s => s.length > 0) : undefined;

    try {
        await runSignalsCommand({ barsPath, configPath, symbols });
    } catch (error) {
        logger.error('Signal run failed', error);
        process.exit(1);
    }
}

main().catch(err => {
    console.error('Fatal error:', err);
    process.exit(1);
});
