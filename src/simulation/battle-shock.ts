import type { Unit } from '../types';
import type { Dice } from './dice';

export interface BattleShockResult {
  roll: number;
  leadership: number;
  passed: boolean;
}

/**
 * Determines if a unit is Below Half-strength
 * - Single model unit: Below Half if remaining wounds < half max wounds
 * - Multi-model unit: Below Half if remaining models < half starting strength
 */
export function isBelowHalfStrength(unit: Unit): boolean {
  if (unit.models.length === 1) {
    const [model] = unit.models;
    return model.current_wounds < model.wounds / 2;
  }

  const remaining = unit.models.filter(m => m.alive).length;
  return remaining < unit.models.length / 2;
}

/**
 * Perform a Battle-shock test: 2D6, passed if the total is at least the
 * unit's Leadership
 */
export function testBattleShock(dice: Dice, unit: Unit): BattleShockResult {
  const leadership = unit.meta.stats.leadership;
  const rolls = [dice.d6(), dice.d6()];
  const roll = rolls[0] + rolls[1];
  const passed = roll >= leadership;
  dice.record(`${unit.meta.name}: battle-shock test ${leadership}+`, rolls, passed ? 1 : 0);
  return { roll, leadership, passed };
}

/**
 * Get human-readable Battle Shock test result summary
 */
export function formatBattleShockResult(unit: Unit, result: BattleShockResult): string {
  const testResult = result.passed ? 'PASSED' : 'FAILED';
  return `${unit.meta.name}: rolled ${result.roll} vs Ld${result.leadership} - ${testResult}`;
}
