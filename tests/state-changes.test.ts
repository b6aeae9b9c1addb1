import { describe, it, expect } from 'vitest';
import {
  applyChanges,
  flagChange,
  getAtPath,
  removeChange,
  setChange,
  StateDraft
} from '../src/simulation/state-changes';
import { IntegrityError } from '../src/simulation/errors';
import { makeState, makeUnit } from './fixtures';

describe('State changes', () => {
  it('should apply changes without touching the input', () => {
    const state = makeState([makeUnit('alpha', { at: [{ x: 10, y: 10 }] })]);
    const next = applyChanges(state, [
      setChange('units.alpha.models.0.current_wounds', 0),
      setChange('players.1.cp', 3)
    ]);

    expect(next.units.alpha.models[0].current_wounds).toBe(0);
    expect(next.players['1'].cp).toBe(3);
    expect(state.units.alpha.models[0].current_wounds).toBe(1);
    expect(state.players['1'].cp).toBe(0);
  });

  it('should create intermediate objects on set', () => {
    const state = makeState([]);
    const next = applyChanges(state, [setChange('phase_data.charge.declared.alpha', ['bravo'])]);
    expect(next.phase_data).toEqual({ charge: { declared: { alpha: ['bravo'] } } });
  });

  it('should remove keys', () => {
    const state = makeState([makeUnit('alpha', { flags: { has_moved: true, effect_cover: true } })]);
    const next = applyChanges(state, [removeChange('units.alpha.flags.has_moved')]);
    expect(next.units.alpha.flags).toEqual({ effect_cover: true });
  });

  it('should ignore removal of a missing path', () => {
    const state = makeState([]);
    expect(applyChanges(state, [removeChange('units.ghost.flags.x')])).toEqual(state);
  });

  it('should append to arrays by index', () => {
    const state = makeState([]);
    const next = applyChanges(state, [
      setChange('history.0', { seq: 1, action: { type: 'END_COMMAND', payload: {} }, player: 1, dice: [] })
    ]);
    expect(next.history).toHaveLength(1);
    expect(next.history[0].seq).toBe(1);
  });

  it('should reject indexes past the end of an array', () => {
    const state = makeState([]);
    expect(() => applyChanges(state, [setChange('history.5', {})])).toThrow(IntegrityError);
  });

  it('should reject malformed paths', () => {
    const state = makeState([]);
    expect(() => applyChanges(state, [setChange('units..x', 1)])).toThrow(IntegrityError);
  });

  it('should build flag changes', () => {
    expect(flagChange('alpha', 'has_shot', true)).toEqual({
      op: 'set',
      path: 'units.alpha.flags.has_shot',
      value: true
    });
  });
});

describe('getAtPath', () => {
  it('should read nested values and array elements', () => {
    const state = makeState([makeUnit('alpha', { at: [{ x: 4, y: 5 }] })]);
    expect(getAtPath(state, 'units.alpha.models.0.position.y')).toBe(5);
    expect(getAtPath(state, 'meta.phase')).toBe('command');
  });

  it('should return undefined for missing paths', () => {
    const state = makeState([]);
    expect(getAtPath(state, 'units.ghost.flags')).toBeUndefined();
  });
});

describe('StateDraft', () => {
  it('should record changes and leave the source untouched', () => {
    const state = makeState([makeUnit('alpha', { flags: { has_moved: true } })]);
    const draft = new StateDraft(state);

    draft.setFlag('alpha', 'has_shot', true);
    draft.remove('units.alpha.flags.has_moved');

    expect(draft.state.units.alpha.flags).toEqual({ has_shot: true });
    expect(state.units.alpha.flags).toEqual({ has_moved: true });
    expect(draft.changes).toEqual([
      { op: 'set', path: 'units.alpha.flags.has_shot', value: true },
      { op: 'remove', path: 'units.alpha.flags.has_moved' }
    ]);
  });

  it('should produce the same state when its changes are replayed', () => {
    const state = makeState([makeUnit('alpha')], { cp: [2, 0] });
    const draft = new StateDraft(state);
    draft.set('players.1.cp', 1);
    draft.apply([setChange('units.alpha.flags.has_advanced', true)]);

    expect(applyChanges(state, draft.changes)).toEqual(draft.state);
  });
});
