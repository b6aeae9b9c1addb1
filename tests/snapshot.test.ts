import { describe, it, expect } from 'vitest';
import { IntegrityError } from '../src/simulation/errors';
import {
  deserializeSnapshot,
  parseAction,
  serializeSnapshot,
  validateSnapshot
} from '../src/simulation/snapshot';
import { makeBoard, makeState, makeUnit, rangedWeapon } from './fixtures';

function sampleState() {
  return makeState([
    makeUnit('alpha', { name: 'Alpha', at: [{ x: 10, y: 10 }], weapons: [rangedWeapon('bolter', { ap: -1 })] }),
    makeUnit('bravo', { owner: 2, name: 'Bravo', at: [{ x: 10, y: 30 }], flags: { battle_shocked: true } })
  ], { phase: 'shooting', cp: [2, 1], objectives: [{ id: 'home', name: 'Home', x: 30, y: 6 }] });
}

describe('Snapshots', () => {
  it('should survive serialization unchanged', () => {
    const state = sampleState();
    expect(deserializeSnapshot(serializeSnapshot(state))).toEqual(state);
  });

  it('should fill defaults for optional sections', () => {
    const state = validateSnapshot({
      meta: { game_id: 'minimal', phase: 'command', turn_number: 1, battle_round: 1, active_player: 2 },
      units: {},
      board: { width: 60, height: 44, deployment_zones: makeBoard().deployment_zones }
    });

    expect(state.meta.first_player).toBe(1);
    expect(state.meta.version).toBe(1);
    expect(state.meta.rng).toEqual({ seed: 0, index: 0 });
    expect(state.players).toEqual({
      '1': { cp: 0, vp: 0, stratagem_usage: [] },
      '2': { cp: 0, vp: 0, stratagem_usage: [] }
    });
    expect(state.board.terrain).toEqual([]);
    expect(state.board.objectives).toEqual([]);
    expect(state.active_effects).toEqual({});
    expect(state.phase_data).toEqual({});
    expect(state.history).toEqual([]);
  });

  it('should name the missing section', () => {
    expect(() => validateSnapshot({ units: {}, board: makeBoard() }))
      .toThrow('Malformed snapshot: meta: Required');
  });

  it('should reject invalid JSON', () => {
    expect(() => deserializeSnapshot('{ not json')).toThrow(IntegrityError);
    expect(() => deserializeSnapshot('{ not json')).toThrow(/^Snapshot is not valid JSON/);
  });

  it('should reject out-of-range characteristics', () => {
    const state = sampleState();
    state.units.alpha.meta.stats.save = 1;
    expect(() => validateSnapshot(state)).toThrow(/^Malformed snapshot: units\.alpha\.meta\.stats\.save/);
  });
});

describe('parseAction', () => {
  it('should default an empty payload', () => {
    expect(parseAction({ type: 'END_COMMAND' })).toEqual({ type: 'END_COMMAND', payload: {} });
  });

  it('should keep unit actions intact', () => {
    const input = { type: 'NORMAL_MOVE', actor_unit_id: 'alpha', payload: { positions: [{ x: 1, y: 2 }] } };
    expect(parseAction(input)).toEqual(input);
  });

  it('should reject unknown action types', () => {
    expect(() => parseAction({ type: 'TELEPORT', payload: {} })).toThrow(/^Malformed action/);
  });

  it('should reject extra keys on an empty payload', () => {
    expect(() => parseAction({ type: 'END_SCORING', payload: { vp: 99 } })).toThrow(/^Malformed action/);
  });

  it('should require the acting unit', () => {
    expect(() => parseAction({ type: 'SKIP_UNIT', payload: {} }))
      .toThrow('Malformed action: actor_unit_id: Required');
  });
});
