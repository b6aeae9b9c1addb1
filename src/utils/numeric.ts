/**
 * Parsing helpers for characteristics written in dice notation
 */

import { IntegrityError } from '../simulation/errors';

/**
 * "2D6+1" → { count: 2, sides: 6, bonus: 1 }; a plain number has sides 0
 */
export interface DiceExpression {
  count: number;
  sides: 0 | 3 | 6;
  bonus: number;
}

/**
 * Parse attack/damage characteristics such as "4", "D3", "D6+2" or "2D6"
 */
export function parseDiceExpression(value: string | number): DiceExpression {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0) {
      throw new IntegrityError(`Invalid characteristic value: ${value}`);
    }
    return { count: 0, sides: 0, bonus: value };
  }

  const normalized = value.trim().toUpperCase().replace(/\s+/g, '');

  if (/^\d+$/.test(normalized)) {
    return { count: 0, sides: 0, bonus: parseInt(normalized, 10) };
  }

  const match = normalized.match(/^(\d*)D([36])(?:\+(\d+))?$/);
  if (!match) {
    throw new IntegrityError(`Unable to parse dice expression "${value}"`);
  }

  return {
    count: match[1] ? parseInt(match[1], 10) : 1,
    sides: match[2] === '3' ? 3 : 6,
    bonus: match[3] ? parseInt(match[3], 10) : 0
  };
}
