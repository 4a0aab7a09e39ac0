import { injectable, inject } from 'inversify';
import { IPositionTracker } from '../../../domain/interfaces/IPositionTracker';
import { PositionState } from '../../../domain/entities/PositionState';
import { PositionStatus } from '../../../domain/enums/PositionStatus';
import { SystemId } from '../../../domain/enums/SystemId';
import { InvalidTransitionError, UnitLimitError } from '../../../domain/errors/TurtleErrors';
import { TurtleConfig } from '../../../config/turtle.config';
import { TYPES } from '../../../config/types';

const VALID_TRANSITIONS: Record<PositionStatus, PositionStatus[]> = {
    [PositionStatus.FLAT]: [PositionStatus.LONG],
    [PositionStatus.LONG]: [PositionStatus.LONG, PositionStatus.FLAT]
};

/**
 * Transition functions over immutable {@link PositionState} values.
 * Holds no state of its own; callers thread the returned value forward.
 */
@injectable()
export class PositionTracker implements IPositionTracker {
    constructor(
        @inject(TYPES.TurtleConfig) private readonly config: TurtleConfig
    ) {}

    flat(instrument: string, systemId: SystemId): PositionState {
        return {
            instrument,
            systemId,
            status: PositionStatus.FLAT,
            units: [],
            stopPrice: null,
            barsHeld: 0
        };
    }

    open(state: PositionState, entryPrice: number, timestamp: number, stopPrice: number): PositionState {
        if (state.status !== PositionStatus.FLAT) {
            throw new InvalidTransitionError(state.status, PositionStatus.LONG);
        }
        return {
            ...state,
            status: PositionStatus.LONG,
            units: [{ entryPrice, entryTimestamp: timestamp }],
            stopPrice,
            barsHeld: 0
        };
    }

    addUnit(state: PositionState, entryPrice: number, timestamp: number, stopPrice: number): PositionState {
        if (state.status !== PositionStatus.LONG) {
            throw new InvalidTransitionError(state.status, PositionStatus.LONG);
        }
        if (state.units.length >= this.config.maxUnitsPerPosition) {
            throw new UnitLimitError(this.config.maxUnitsPerPosition);
        }
        return {
            ...state,
            units: [...state.units, { entryPrice, entryTimestamp: timestamp }],
            stopPrice: Math.max(state.stopPrice ?? stopPrice, stopPrice)
        };
    }

    close(state: PositionState): PositionState {
        this.assertTransition(state.status, PositionStatus.FLAT);
        return this.flat(state.instrument, state.systemId);
    }

    tick(state: PositionState): PositionState {
        if (state.status !== PositionStatus.LONG) return state;
        return { ...state, barsHeld: state.barsHeld + 1 };
    }

    canTransition(from: PositionStatus, to: PositionStatus): boolean {
        return VALID_TRANSITIONS[from]?.includes(to) ?? false;
    }

    private assertTransition(from: PositionStatus, to: PositionStatus): void {
        if (!this.canTransition(from, to)) {
            throw new InvalidTransitionError(from, to);
        }
    }
}
