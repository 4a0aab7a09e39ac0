import { PositionState } from '../entities/PositionState';
import { PositionStatus } from '../enums/PositionStatus';
import { SystemId } from '../enums/SystemId';

export interface IPositionTracker {
    flat(instrument: string, systemId: SystemId): PositionState;
    open(state: PositionState, entryPrice: number, timestamp: number, stopPrice: number): PositionState;
    addUnit(state: PositionState, entryPrice: number, timestamp: number, stopPrice: number): PositionState;
    close(state: PositionState): PositionState;
    tick(state: PositionState): PositionState;
    canTransition(from: PositionStatus, to: PositionStatus): boolean;
}
