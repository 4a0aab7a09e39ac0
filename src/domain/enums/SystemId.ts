// S1 - short breakout system, S2 - long breakout system
export enum SystemId {
    S1 = 'S1',
    S2 = 'S2'
}
