import { describe, it, expect } from 'vitest';
import type { Action, GameState, Point, Unit } from '../src/types';
import { act, CONTACT, makeManager, makeState, makeUnit, type UnitOptions } from './fixtures';

function move(type: 'NORMAL_MOVE' | 'ADVANCE' | 'FALL_BACK' | 'ARRIVE_FROM_RESERVES', to: Point, unitId = 'alpha'): Action {
  return { type, actor_unit_id: unitId, payload: { positions: [to] } };
}

function unitAction(type: 'BEGIN_ADVANCE' | 'REMAIN_STATIONARY' | 'SKIP_UNIT', unitId = 'alpha'): Action {
  return { type, actor_unit_id: unitId, payload: {} };
}

function movementState(alpha: UnitOptions = {}, enemies: Unit[] = [], round = 1): GameState {
  return makeState([
    makeUnit('alpha', { name: 'Alpha', at: [{ x: 10, y: 10 }], ...alpha }),
    ...enemies
  ], { phase: 'movement', round });
}

function bravoAt(at: Point): Unit {
  return makeUnit('bravo', { owner: 2, name: 'Bravo', at: [at] });
}

describe('Normal moves', () => {
  it('should move a unit within its Move characteristic', () => {
    const manager = makeManager();
    const { result, state } = act(manager, movementState(), move('NORMAL_MOVE', { x: 10, y: 15 }));

    expect(result.log).toEqual(['Alpha moves']);
    expect(state.units.alpha.models[0].position).toEqual({ x: 10, y: 15 });
    expect(state.units.alpha.flags.moved).toBe(true);
    expect(state.phase_data.done).toEqual(['alpha']);

    expect(manager.validateAction(state, move('NORMAL_MOVE', { x: 10, y: 16 })).errors)
      .toEqual(['Alpha has already moved this phase']);
  });

  it('should reject moves longer than the Move characteristic', () => {
    expect(makeManager().validateAction(movementState(), move('NORMAL_MOVE', { x: 10, y: 17 })).errors)
      .toEqual(['Model alpha-m1 needs 7.0" of movement, more than 6"']);
  });

  it('should not end a normal move within Engagement Range', () => {
    const state = movementState({ at: [{ x: 10, y: 14 }] }, [bravoAt({ x: 10, y: 20 })]);
    expect(makeManager().validateAction(state, move('NORMAL_MOVE', { x: 10, y: 18.5 })).errors)
      .toEqual(['Alpha cannot end within Engagement Range of Bravo']);
  });

  it('should only move units of the active player', () => {
    const state = movementState({}, [bravoAt({ x: 10, y: 30 })]);
    expect(makeManager().validateAction(state, move('NORMAL_MOVE', { x: 10, y: 32 }, 'bravo')).errors)
      .toEqual(['Bravo belongs to player 2, not the active player']);
  });

  it('should let a unit remain stationary', () => {
    const { result, state } = act(makeManager(), movementState(), unitAction('REMAIN_STATIONARY'));
    expect(result.log).toEqual(['Alpha remains stationary']);
    expect(state.units.alpha.flags.remained_stationary).toBe(true);
  });
});

describe('Advancing', () => {
  it('should roll first and then move up to Move plus the roll', () => {
    const manager = makeManager([4]);
    const rolled = act(manager, movementState(), unitAction('BEGIN_ADVANCE'));

    expect(rolled.result.log).toEqual(['Alpha rolls 4 to advance (10")']);
    expect(rolled.state.units.alpha.flags.advance_roll).toBe(4);
    expect(rolled.result.phase_complete).toBeUndefined();

    expect(manager.validateAction(rolled.state, move('NORMAL_MOVE', { x: 10, y: 12 })).errors)
      .toEqual(['Alpha is advancing and must use ADVANCE']);
    expect(manager.validateAction(rolled.state, unitAction('REMAIN_STATIONARY')).errors)
      .toEqual(['Alpha has rolled to advance and must move']);

    const { result, state } = act(manager, rolled.state, move('ADVANCE', { x: 10, y: 19 }));
    expect(result.log).toEqual(['Alpha advances']);
    expect(state.units.alpha.flags.advanced).toBe(true);
    expect(state.units.alpha.flags.moved).toBe(true);
  });

  it('should count a unit skipped after rolling as having advanced', () => {
    const manager = makeManager([3]);
    const rolled = act(manager, movementState(), unitAction('BEGIN_ADVANCE'));
    const { result, state } = act(manager, rolled.state, unitAction('SKIP_UNIT'));

    expect(result.log).toEqual(['Alpha skipped']);
    expect(state.units.alpha.flags).toEqual({ advance_roll: 3, advanced: true });
    expect(state.units.alpha.models[0].position).toEqual({ x: 10, y: 10 });
  });

  it('should not mark a unit skipped without rolling as advanced', () => {
    const { state } = act(makeManager(), movementState(), unitAction('SKIP_UNIT'));
    expect(state.units.alpha.flags.advanced).toBeUndefined();
  });

  it('should require the advance roll before an advance move', () => {
    expect(makeManager().validateAction(movementState(), move('ADVANCE', { x: 10, y: 12 })).errors)
      .toEqual(['Roll to advance with BEGIN_ADVANCE before moving Alpha']);
  });

  it('should offer only the advance move after rolling', () => {
    const manager = makeManager([2]);
    const { state } = act(manager, movementState(), unitAction('BEGIN_ADVANCE'));
    expect(manager.getAvailableActions(state).map(a => a.type)).toEqual(['ADVANCE', 'SKIP_UNIT']);
  });
});

describe('Falling back', () => {
  it('should need an enemy within Engagement Range', () => {
    expect(makeManager().validateAction(movementState(), move('FALL_BACK', { x: 10, y: 5 })).errors)
      .toEqual(['Alpha is not within Engagement Range and cannot fall back']);
  });

  it('should let an engaged unit fall back but not move normally', () => {
    const manager = makeManager();
    const state = movementState({}, [bravoAt({ x: 10, y: 10 + CONTACT })]);

    expect(manager.validateAction(state, move('NORMAL_MOVE', { x: 10, y: 5 })).errors)
      .toEqual(['Alpha is within Engagement Range and can only fall back or remain stationary']);
    expect(manager.getAvailableActions(state).map(a => a.type))
      .toEqual(['FALL_BACK', 'REMAIN_STATIONARY', 'SKIP_UNIT']);

    const { result, state: next } = act(manager, state, move('FALL_BACK', { x: 10, y: 5 }));
    expect(result.log).toEqual(['Alpha falls back']);
    expect(next.units.alpha.flags.fell_back).toBe(true);
  });
});

describe('Reserves', () => {
  const reserve: UnitOptions = { status: 'IN_RESERVES', at: undefined, count: 1 };

  it('should not arrive before the first reserve round', () => {
    const state = movementState(reserve, [bravoAt({ x: 10, y: 20 })]);
    expect(makeManager().validateAction(state, move('ARRIVE_FROM_RESERVES', { x: 40, y: 40 })).errors)
      .toEqual(['Reserves cannot arrive before battle round 2']);
  });

  it('should not be pending before the first reserve round', () => {
    const state = movementState(reserve, [bravoAt({ x: 10, y: 20 })]);
    expect(makeManager().getAvailableActions(state).map(a => a.type)).toEqual(['END_MOVEMENT']);
  });

  it('should arrive far enough from the enemy', () => {
    const manager = makeManager();
    const state = movementState(reserve, [bravoAt({ x: 10, y: 20 })], 2);

    expect(manager.validateAction(state, move('ARRIVE_FROM_RESERVES', { x: 10, y: 25 })).errors)
      .toEqual(['Alpha must arrive more than 9" from Bravo']);

    const { result, state: next } = act(manager, state, move('ARRIVE_FROM_RESERVES', { x: 40, y: 40 }));
    expect(result.log).toEqual(['Alpha arrives from reserves']);
    expect(next.units.alpha.status).toBe('DEPLOYED');
    expect(next.units.alpha.models[0].position).toEqual({ x: 40, y: 40 });
  });
});

describe('Ending the movement phase', () => {
  it('should wait for every unit to move or be skipped', () => {
    const manager = makeManager();
    const state = movementState();
    expect(manager.validateAction(state, { type: 'END_MOVEMENT', payload: {} }).errors)
      .toEqual(['Units still to act or be skipped: Alpha']);

    const skipped = act(manager, state, unitAction('SKIP_UNIT'));
    expect(skipped.result.log).toEqual(['Alpha skipped']);

    const { result } = act(manager, skipped.state, { type: 'END_MOVEMENT', payload: {} });
    expect(result.log).toEqual(['End of movement phase']);
    expect(result.phase_complete).toBe(true);
  });
});
