import { Bar } from '../entities/Bar';

export interface IBarSource {
    getBars(symbol: string): Promise<Bar[]>;
    listSymbols(): Promise<string[]>;
}
