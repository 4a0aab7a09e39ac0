import { injectable, inject } from 'inversify';
import { ISignalGenerator } from '../../domain/interfaces/ISignalGenerator';
import { Bar } from '../../domain/entities/Bar';
import { PositionState } from '../../domain/entities/PositionState';
import { Signal } from '../../domain/value-objects/Signal';
import { SignalType } from '../../domain/enums/SignalType';
import { SystemId } from '../../domain/enums/SystemId';
import { BarWarning } from '../../domain/types/SignalTypes';
import { DataOrderingError } from '../../domain/errors/TurtleErrors';
import { Logger } from '../../shared/logger/Logger';
import { TYPES } from '../../config/types';

export interface SignalReport {
    signals: Map<string, Signal[]>;
    positions: Map<string, PositionState[]>;
    warnings: BarWarning[];
    failures: Map<string, DataOrderingError>;
}

export interface SignalSummary {
    totalSymbols: number;
    signalsByType: Partial<Record<SignalType, number>>;
    signalsBySystem: Partial<Record<SystemId, number>>;
}

/**
 * Runs the strategy over every instrument independently. A DataOrderingError on
 * one instrument is recorded under `failures` and the rest keep going.
 */
@injectable()
export class GenerateSignals {
    private logger = Logger.getInstance();
    private lastSignals = new Map<string, Signal[]>();

    constructor(
        @inject(TYPES.ISignalGenerator) private readonly generator: ISignalGenerator
    ) {}

    execute(data: Map<string, Bar[]>): SignalReport {
        const report: SignalReport = {
            signals: new Map(),
            positions: new Map(),
            warnings: [],
            failures: new Map()
        };

        for (const [symbol, bars] of data) {
            try {
                const result = this.generator.generate(symbol, bars);
                report.positions.set(symbol, result.positions);
                report.warnings.push(...result.warnings);
                if (result.signals.length > 0) {
                    report.signals.set(symbol, result.signals);
                }
            } catch (error) {
                if (!(error instanceof DataOrderingError)) throw error;
                this.logger.forInstrument(symbol).error('signal generation failed', error.message);
                report.failures.set(symbol, error);
            }
        }

        this.lastSignals = new Map(report.signals);
        this.logger.info(
            `Processed ${data.size} instruments: ${report.signals.size} with signals, ` +
            `${report.failures.size} failed, ${report.warnings.length} bars skipped`
        );
        return report;
    }

    getSignalSummary(): SignalSummary {
        const summary: SignalSummary = {
            totalSymbols: this.lastSignals.size,
            signalsByType: {},
            signalsBySystem: {}
        };

        for (const signals of this.lastSignals.values()) {
            for (const signal of signals) {
                summary.signalsByType[signal.type] = (summary.signalsByType[signal.type] ?? 0) + 1;
                summary.signalsBySystem[signal.systemId] = (summary.signalsBySystem[signal.systemId] ?? 0) + 1;
            }
        }

        return summary;
    }
}
