import 'reflect-metadata';
import { Container } from 'inversify';
import { TYPES } from './types';
import { TurtleConfig } from './turtle.config';

// Interfaces
import { IBarSource } from '../domain/interfaces/IBarSource';
import { IBarValidator } from '../domain/interfaces/IBarValidator';
import { IIndicatorEngine } from '../domain/interfaces/IIndicatorEngine';
import { IIndicators } from '../domain/interfaces/IIndicators';
import { IBreakoutDetector } from '../domain/interfaces/IBreakoutDetector';
import { IRiskEngine } from '../domain/interfaces/IRiskEngine';
import { IPositionTracker } from '../domain/interfaces/IPositionTracker';
import { ISignalGenerator } from '../domain/interfaces/ISignalGenerator';

// Implementations
import { JsonBarSource } from '../infrastructure/data/JsonBarSource';
import { BarValidator } from '../application/services/validation/BarValidator';
import { IndicatorEngine } from '../application/services/indicators/IndicatorEngine';
import { IndicatorsProvider } from '../application/services/indicators/IndicatorsProvider';
import { BreakoutDetector } from '../application/services/detection/BreakoutDetector';
import { RiskEngine } from '../application/services/risk/RiskEngine';
import { PositionTracker } from '../application/services/state/PositionTracker';
import { TurtleStrategy } from '../application/strategies/TurtleStrategy';
import { GenerateSignals } from '../application/use-cases/GenerateSignals';

export { TYPES };

export function createContainer(config: TurtleConfig, barsPath?: string): Container {
    const container = new Container();

    container.bind<TurtleConfig>(TYPES.TurtleConfig).toConstantValue(config);

    // --- Core Services ---
    container.bind<IBarValidator>(TYPES.IBarValidator).to(BarValidator);
    container.bind<IIndicatorEngine>(TYPES.IIndicatorEngine).to(IndicatorEngine).inSingletonScope();
    container.bind<IIndicators>(TYPES.IIndicators).to(IndicatorsProvider).inSingletonScope();
    container.bind<IBreakoutDetector>(TYPES.IBreakoutDetector).to(BreakoutDetector);
    container.bind<IRiskEngine>(TYPES.IRiskEngine).to(RiskEngine);
    container.bind<IPositionTracker>(TYPES.IPositionTracker).to(PositionTracker);
    container.bind<ISignalGenerator>(TYPES.ISignalGenerator).to(TurtleStrategy);

    // --- Use Cases ---
    container.bind<GenerateSignals>(GenerateSignals).toSelf();

    // --- Data ---
    if (barsPath) {
        container.bind<string>(TYPES.BarsPath).toConstantValue(barsPath);
        container.bind<IBarSource>(TYPES.IBarSource).to(JsonBarSource).inSingletonScope();
    }

    return container;
}
