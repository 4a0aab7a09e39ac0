import { PositionTracker } from '../src/application/services/state/PositionTracker';
import { PositionStatus } from '../src/domain/enums/PositionStatus';
import { SystemId } from '../src/domain/enums/SystemId';
import { InvalidTransitionError, UnitLimitError } from '../src/domain/errors/TurtleErrors';
import { DefaultTurtleConfig } from '../src/config/turtle.config';

describe('PositionTracker', () => {
    const tracker = new PositionTracker({ ...DefaultTurtleConfig, maxUnitsPerPosition: 2 });

    test('starts flat with no units and no stop', () => {
        const state = tracker.flat('TEST', SystemId.S1);

        expect(state).toEqual({
            instrument: 'TEST',
            systemId: SystemId.S1,
            status: PositionStatus.FLAT,
            units: [],
            stopPrice: null,
            barsHeld: 0
        });
    });

    test('open, add and close return new values without touching the old ones', () => {
        const flat = tracker.flat('TEST', SystemId.S1);
        const long = tracker.open(flat, 100, 1, 96);
        const added = tracker.addUnit(long, 102, 2, 98);
        const closed = tracker.close(added);

        expect(flat.status).toBe(PositionStatus.FLAT);
        expect(long.units).toEqual([{ entryPrice: 100, entryTimestamp: 1 }]);
        expect(long.stopPrice).toBe(96);
        expect(added.units).toHaveLength(2);
        expect(added.stopPrice).toBe(98);
        expect(closed).toEqual(flat);
    });

    test('never lowers the stop when a unit is added', () => {
        const long = tracker.open(tracker.flat('TEST', SystemId.S1), 100, 1, 96);

        expect(tracker.addUnit(long, 101, 2, 95).stopPrice).toBe(96);
    });

    test('refuses units beyond the configured maximum', () => {
        const long = tracker.open(tracker.flat('TEST', SystemId.S1), 100, 1, 96);
        const full = tracker.addUnit(long, 102, 2, 98);

        expect(() => tracker.addUnit(full, 104, 3, 100)).toThrow(UnitLimitError);
    });

    test('rejects transitions that are not in the table', () => {
        const flat = tracker.flat('TEST', SystemId.S2);
        const long = tracker.open(flat, 100, 1, 96);

        expect(() => tracker.close(flat)).toThrow(InvalidTransitionError);
        expect(() => tracker.open(long, 101, 2, 97)).toThrow(InvalidTransitionError);
        expect(() => tracker.addUnit(flat, 101, 2, 97)).toThrow(InvalidTransitionError);
        expect(tracker.canTransition(PositionStatus.FLAT, PositionStatus.FLAT)).toBe(false);
        expect(tracker.canTransition(PositionStatus.LONG, PositionStatus.FLAT)).toBe(true);
    });

    test('tick counts bars only while long', () => {
        const flat = tracker.flat('TEST', SystemId.S1);
        const long = tracker.open(flat, 100, 1, 96);

        expect(tracker.tick(flat)).toBe(flat);
        expect(tracker.tick(tracker.tick(long)).barsHeld).toBe(2);
    });
});
