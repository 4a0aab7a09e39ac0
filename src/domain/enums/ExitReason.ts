export enum ExitReason {
    BREAKOUT = 'BREAKOUT',
    STOP_HIT = 'STOP_HIT',
    TIME_EXIT = 'TIME_EXIT'
}
