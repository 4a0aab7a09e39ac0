import { SignalType } from '../enums/SignalType';
import { ExitReason } from '../enums/ExitReason';
import { SystemId } from '../enums/SystemId';

export class Signal {
    constructor(
        public readonly instrument: string,
        public readonly systemId: SystemId,
        public readonly type: SignalType,
        public readonly price: number,
        public readonly timestamp: number,
        public readonly unitIndex: number,
        public readonly stopPrice: number | null, // stop in force after the signal, null once flat
        public readonly atr: number,
        public readonly exitReason: ExitReason | null = null
    ) {}

    static createEntry(
        instrument: string,
        systemId: SystemId,
        price: number,
        timestamp: number,
        stopPrice: number,
        atr: number
    ): Signal {
        return new Signal(instrument, systemId, SignalType.ENTRY_LONG, price, timestamp, 1, stopPrice, atr);
    }

    static createPyramid(
        instrument: string,
        systemId: SystemId,
        price: number,
        timestamp: number,
        unitIndex: number,
        stopPrice: number,
        atr: number
    ): Signal {
        return new Signal(instrument, systemId, SignalType.PYRAMID, price, timestamp, unitIndex, stopPrice, atr);
    }

    static createExit(
        instrument: string,
        systemId: SystemId,
        price: number,
        timestamp: number,
        unitsClosed: number,
        atr: number,
        reason: ExitReason
    ): Signal {
        return new Signal(
            instrument,
            systemId,
            SignalType.EXIT,
            price,
            timestamp,
            unitsClosed,
            null,
            atr,
            reason
        );
    }

    toString(): string {
        const reason = this.exitReason ? ` (${this.exitReason})` : '';
        const stop = this.stopPrice !== null ? ` stop=${this.stopPrice.toFixed(4)}` : '';
        return `${this.instrument} ${this.systemId} ${this.type}${reason} @ ${this.price} unit=${this.unitIndex}${stop}`;
    }
}
