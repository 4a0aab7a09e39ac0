export enum SignalType {
    ENTRY_LONG = 'ENTRY_LONG',
    PYRAMID = 'PYRAMID',
    EXIT = 'EXIT'
}
