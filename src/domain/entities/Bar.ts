export class Bar {
    constructor(
        public readonly timestamp: number,
        public readonly open: number,
        public readonly high: number,
        public readonly low: number,
        public readonly close: number,
        public readonly volume: number,
        public readonly symbol: string
    ) {}

    get range(): number {
        return this.high - this.low;
    }

    /**
     * True Range against the previous bar's close.
     * Without a previous bar this is just the bar's own range.
     */
    trueRange(prevClose?: number): number {
        if (prevClose === undefined) return this.range;
        return Math.max(
            this.range,
            Math.abs(this.high - prevClose),
            Math.abs(this.low - prevClose)
        );
    }
}
