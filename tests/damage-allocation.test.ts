import { describe, it, expect } from 'vitest';
import {
  applyAttackDamage,
  applyDirectDamage,
  selectAllocationTarget
} from '../src/simulation/damage-allocation';
import { IntegrityError } from '../src/simulation/errors';
import { StateDraft } from '../src/simulation/state-changes';
import { makeState, makeUnit, row, scriptedDice } from './fixtures';

function squad(count: number, wounds: number, feelNoPain?: number) {
  return makeUnit('squad', {
    name: 'Squad',
    owner: 2,
    at: row(10, 20, count),
    stats: { wounds, feel_no_pain: feelNoPain }
  });
}

describe('Damage allocation', () => {
  describe('selectAllocationTarget', () => {
    it('should pick the most damaged alive model', () => {
      const unit = squad(3, 2);
      unit.models[1].current_wounds = 1;
      expect(selectAllocationTarget(unit)).toBe(1);
    });

    it('should skip dead models', () => {
      const unit = squad(2, 2);
      unit.models[0].current_wounds = 0;
      unit.models[0].alive = false;
      expect(selectAllocationTarget(unit)).toBe(1);
    });

    it('should return -1 when every model is dead', () => {
      const unit = squad(1, 1);
      unit.models[0].current_wounds = 0;
      unit.models[0].alive = false;
      expect(selectAllocationTarget(unit)).toBe(-1);
    });

    it('should reject models whose wounds break invariants', () => {
      const unit = squad(1, 2);
      unit.models[0].current_wounds = 3;
      expect(() => selectAllocationTarget(unit)).toThrow(IntegrityError);
    });
  });

  describe('applyAttackDamage', () => {
    it('should lose damage beyond the model\'s remaining wounds', () => {
      const unit = squad(2, 2);
      unit.models[0].current_wounds = 1;
      const draft = new StateDraft(makeState([unit]));

      const result = applyAttackDamage(draft, scriptedDice(), 'squad', 3, 'Bolter');

      expect(result.woundsLost).toBe(1);
      expect(result.destroyedModels).toEqual(['squad-m1']);
      expect(result.log).toEqual(['Squad model squad-m1 destroyed (Bolter)']);
      expect(draft.state.units.squad.models.map(m => m.current_wounds)).toEqual([0, 2]);
      expect(draft.state.units.squad.status).toBe('DEPLOYED');
    });

    it('should roll feel no pain for each point of damage', () => {
      const draft = new StateDraft(makeState([squad(1, 3, 5)]));
      const dice = scriptedDice([6, 2]);

      const result = applyAttackDamage(draft, dice, 'squad', 2, 'Bolter');

      expect(result.woundsLost).toBe(1);
      expect(result.ignored).toBe(1);
      expect(result.log).toEqual(['Squad ignored 1 damage (feel no pain)']);
      expect(dice.records).toEqual([
        { context: 'Bolter: feel no pain 5+', rolls_raw: [6, 2], successes: 1, modifiers_applied: [] }
      ]);
    });
  });

  describe('applyDirectDamage', () => {
    it('should spill mortal wounds over to the next model', () => {
      const draft = new StateDraft(makeState([squad(3, 2)]));

      const result = applyDirectDamage(draft, scriptedDice(), 'squad', 3, 'Grenade');

      expect(result.log).toEqual([
        'Squad suffers 3 mortal wounds (Grenade): 3 lost',
        'Squad model squad-m1 destroyed (Grenade)'
      ]);
      expect(draft.state.units.squad.models.map(m => m.current_wounds)).toEqual([0, 1, 2]);
    });

    it('should roll feel no pain once per mortal wound', () => {
      const draft = new StateDraft(makeState([squad(3, 2, 5)]));
      const dice = scriptedDice([5, 2, 6]);

      const result = applyDirectDamage(draft, dice, 'squad', 3, 'Grenade');

      expect(result.log).toEqual(['Squad suffers 3 mortal wounds (Grenade): 1 lost, 2 ignored']);
      expect(dice.records).toEqual([
        { context: 'Grenade: feel no pain 5+', rolls_raw: [5, 2, 6], successes: 2, modifiers_applied: [] }
      ]);
    });

    it('should destroy the unit and discard the excess', () => {
      const lone = makeUnit('lone', { name: 'Lone', at: [{ x: 5, y: 5 }] });
      const draft = new StateDraft(makeState([lone]));

      const result = applyDirectDamage(draft, scriptedDice(), 'lone', 2, 'Test');

      expect(result.unitDestroyed).toBe(true);
      expect(result.log).toEqual([
        'Lone suffers 2 mortal wounds (Test): 1 lost',
        'Lone model lone-m1 destroyed (Test)',
        'Lone destroyed'
      ]);
      expect(draft.state.units.lone.status).toBe('DESTROYED');
    });

    it('should trigger Deadly Demise on nearby units', () => {
      const tank = makeUnit('tank', {
        name: 'Tank',
        owner: 2,
        at: [{ x: 10, y: 10 }],
        keywords: ['VEHICLE'],
        abilities: ['deadly-demise-d3']
      });
      const victims = makeUnit('squad', { name: 'Squad', at: row(10, 13, 5) });
      const draft = new StateDraft(makeState([tank, victims]));
      const dice = scriptedDice([6, 5]);

      const result = applyDirectDamage(draft, dice, 'tank', 1, 'Lascannon');

      expect(result.log).toEqual([
        'Tank suffers 1 mortal wound (Lascannon): 1 lost',
        'Tank model tank-m1 destroyed (Lascannon)',
        'Tank destroyed',
        'Tank explodes (Deadly Demise D3)',
        'Squad suffers 3 mortal wounds (Deadly Demise D3): 3 lost',
        'Squad model squad-m1 destroyed (Deadly Demise D3)',
        'Squad model squad-m2 destroyed (Deadly Demise D3)',
        'Squad model squad-m3 destroyed (Deadly Demise D3)'
      ]);
      expect(dice.records).toEqual([
        { context: 'Deadly Demise D3 (Tank)', rolls_raw: [6], successes: 1, modifiers_applied: [] },
        { context: 'Deadly Demise D3 mortal wounds on Squad', rolls_raw: [3], successes: 3, modifiers_applied: [] }
      ]);
      expect(draft.state.units.squad.models.filter(m => m.alive)).toHaveLength(2);
    });

    it('should not explode on a failed roll', () => {
      const tank = makeUnit('tank', { name: 'Tank', owner: 2, at: [{ x: 10, y: 10 }], abilities: ['deadly-demise-d3'] });
      const victims = makeUnit('squad', { name: 'Squad', at: row(10, 13, 5) });
      const draft = new StateDraft(makeState([tank, victims]));

      const result = applyDirectDamage(draft, scriptedDice([5]), 'tank', 1, 'Lascannon');

      expect(result.log).toEqual([
        'Tank suffers 1 mortal wound (Lascannon): 1 lost',
        'Tank model tank-m1 destroyed (Lascannon)',
        'Tank destroyed'
      ]);
    });
  });
});
