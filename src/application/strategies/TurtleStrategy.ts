import { injectable, inject } from 'inversify';
import { ISignalGenerator } from '../../domain/interfaces/ISignalGenerator';
import { IBarValidator } from '../../domain/interfaces/IBarValidator';
import { IIndicators } from '../../domain/interfaces/IIndicators';
import { IBreakoutDetector } from '../../domain/interfaces/IBreakoutDetector';
import { IRiskEngine } from '../../domain/interfaces/IRiskEngine';
import { IPositionTracker } from '../../domain/interfaces/IPositionTracker';
import { Bar } from '../../domain/entities/Bar';
import { PositionState, lastUnit } from '../../domain/entities/PositionState';
import { IndicatorRow } from '../../domain/value-objects/IndicatorRow';
import { Signal } from '../../domain/value-objects/Signal';
import { PositionStatus } from '../../domain/enums/PositionStatus';
import { ExitReason } from '../../domain/enums/ExitReason';
import { InstrumentSignals, StepResult, SystemId, SystemParams } from '../../domain/types/SignalTypes';
import { TurtleConfig } from '../../config/turtle.config';
import { TYPES } from '../../config/types';
import { Logger } from '../../shared/logger/Logger';

/**
 * Donchian breakout system with ATR stops and pyramiding.
 *
 * Each (instrument, system) pair is driven bar by bar through {@link step},
 * which takes the current position state and returns the next one together
 * with at most one signal. While long, checks run in this order:
 * stop hit, holding time, exit-channel breakout, pyramid. A flat position
 * only looks for an entry breakout.
 */
@injectable()
export class TurtleStrategy implements ISignalGenerator {
    private logger = Logger.getInstance();

    constructor(
        @inject(TYPES.TurtleConfig) private readonly config: TurtleConfig,
        @inject(TYPES.IBarValidator) private readonly validator: IBarValidator,
        @inject(TYPES.IIndicators) private readonly indicators: IIndicators,
        @inject(TYPES.IBreakoutDetector) private readonly breakoutDetector: IBreakoutDetector,
        @inject(TYPES.IRiskEngine) private readonly riskEngine: IRiskEngine,
        @inject(TYPES.IPositionTracker) private readonly tracker: IPositionTracker
    ) {}

    systems(): SystemParams[] {
        const systems: SystemParams[] = [
            { systemId: SystemId.S1, entryLength: this.config.system1Length, exitLength: this.config.exitLengthS1 }
        ];
        if (this.config.useSystem2) {
            systems.push({ systemId: SystemId.S2, entryLength: this.config.system2Length, exitLength: this.config.exitLengthS2 });
        }
        return systems;
    }

    generate(instrument: string, bars: Bar[]): InstrumentSignals {
        const { bars: validBars, warnings } = this.validator.validate(instrument, bars);
        const rows = this.indicators.rows(instrument, validBars, this.config);
        const systems = this.systems();
        const states = systems.map(s => this.tracker.flat(instrument, s.systemId));
        const signals: Signal[] = [];

        for (let i = 0; i < validBars.length; i++) {
            for (let k = 0; k < systems.length; k++) {
                const result = this.step(states[k], validBars[i], rows[i], systems[k]);
                states[k] = result.state;
                if (result.signal) {
                    signals.push(result.signal);
                    this.logSignal(result.signal);
                }
            }
        }

        this.logger.forInstrument(instrument).debug(`${validBars.length} bars processed, ${signals.length} signals`);
        return { instrument, signals, positions: states, warnings };
    }

    step(state: PositionState, bar: Bar, row: IndicatorRow, params: SystemParams): StepResult {
        const entryHigh = row.donchianHigh.get(params.entryLength) ?? null;
        const exitLow = row.donchianLow.get(params.exitLength) ?? null;
        const atr = row.atr;

        // Not enough history for this system yet
        if (entryHigh === null || exitLow === null || atr === null) {
            return { state, signal: null };
        }

        if (state.status === PositionStatus.LONG) {
            return this.manageLong(this.tracker.tick(state), bar, exitLow, atr);
        }
        return this.checkEntry(state, bar, entryHigh, atr);
    }

    private manageLong(state: PositionState, bar: Bar, exitLow: number, atr: number): StepResult {
        const unit = lastUnit(state);
        if (!unit) {
            throw new Error(`${state.instrument} ${state.systemId}: LONG position without units`);
        }
        const stopPrice = state.stopPrice ?? this.riskEngine.initialStop(unit.entryPrice, atr);

        // 1. STOP
        if (this.riskEngine.isStopHit(bar.close, stopPrice)) {
            return this.exit(state, bar, atr, ExitReason.STOP_HIT);
        }

        // 2. TIME
        if (state.barsHeld >= this.config.maxPositionTime) {
            return this.exit(state, bar, atr, ExitReason.TIME_EXIT);
        }

        // 3. EXIT CHANNEL
        if (this.breakoutDetector.isExitBreakout(bar, exitLow)) {
            return this.exit(state, bar, atr, ExitReason.BREAKOUT);
        }

        // 4. PYRAMID
        if (
            state.units.length < this.config.maxUnitsPerPosition &&
            bar.close > this.riskEngine.pyramidThreshold(unit.entryPrice, atr)
        ) {
            const newStop = this.riskEngine.tightenStop(stopPrice, bar.close, atr);
            const next = this.tracker.addUnit(state, bar.close, bar.timestamp, newStop);
            return {
                state: next,
                signal: Signal.createPyramid(
                    state.instrument,
                    state.systemId,
                    bar.close,
                    bar.timestamp,
                    next.units.length,
                    newStop,
                    atr
                )
            };
        }

        return { state, signal: null };
    }

    private checkEntry(state: PositionState, bar: Bar, entryHigh: number, atr: number): StepResult {
        if (!this.breakoutDetector.isEntryBreakout(bar, entryHigh)) {
            return { state, signal: null };
        }

        const stopPrice = this.riskEngine.initialStop(bar.close, atr);
        return {
            state: this.tracker.open(state, bar.close, bar.timestamp, stopPrice),
            signal: Signal.createEntry(state.instrument, state.systemId, bar.close, bar.timestamp, stopPrice, atr)
        };
    }

    private exit(state: PositionState, bar: Bar, atr: number, reason: ExitReason): StepResult {
        return {
            state: this.tracker.close(state),
            signal: Signal.createExit(
                state.instrument,
                state.systemId,
                bar.close,
                bar.timestamp,
                state.units.length,
                atr,
                reason
            )
        };
    }

    private logSignal(signal: Signal): void {
        const dateStr = new Date(signal.timestamp).toISOString();
        this.logger
            .forInstrument(signal.instrument, signal.systemId)
            .info(`[${dateStr}] [${signal.type}] ${signal.toString()}`);
    }
}
