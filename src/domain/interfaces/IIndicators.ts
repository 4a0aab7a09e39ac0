import { Bar } from '../entities/Bar';
import { IndicatorRow } from '../value-objects/IndicatorRow';
import { TurtleConfig } from '../../config/turtle.config';

export interface IIndicators {
    rows(symbol: string, bars: Bar[], config: TurtleConfig): IndicatorRow[];
    clear(): void;
    readonly cacheSize: number;
}
