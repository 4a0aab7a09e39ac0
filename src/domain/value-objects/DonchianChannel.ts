export interface DonchianChannel {
    readonly length: number;
    readonly upper: ReadonlyArray<number | null>;
    readonly lower: ReadonlyArray<number | null>;
}
