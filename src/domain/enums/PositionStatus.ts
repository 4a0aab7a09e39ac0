export enum PositionStatus {
    FLAT = 'FLAT',
    LONG = 'LONG'
}
