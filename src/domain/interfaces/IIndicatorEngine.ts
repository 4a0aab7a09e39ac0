import { Bar } from '../entities/Bar';
import { DonchianChannel } from '../value-objects/DonchianChannel';

export interface IIndicatorEngine {
    trueRange(bars: Bar[]): Array<number | null>;
    donchian(bars: Bar[], length: number): DonchianChannel;
    atr(bars: Bar[], period: number): Array<number | null>;
    sma(values: number[], window: number): Array<number | null>;
}
