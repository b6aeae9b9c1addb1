/**
 * Dice rolling for the rules engine.
 *
 * Randomness comes from a counter-based seeded generator whose state
 * ({ seed, index }) lives in the game snapshot, so any process holding the same
 * snapshot reproduces the same rolls. Every roll made while resolving an action
 * is recorded as a DiceRecord for replay and verification.
 */

import type { DiceRecord, RngState } from '../types';
import { parseDiceExpression } from '../utils/numeric';
import { IntegrityError } from './errors';

export interface Rng {
  /** Uniform float in [0, 1) */
  next(): number;
  readonly state: RngState;
}

export type RngFactory = (state: RngState) => Rng;

function hash32(seed: number, index: number): number {
  let h = (seed ^ Math.imul(index + 1, 0x9e3779b9)) >>> 0;
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b) >>> 0;
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35) >>> 0;
  return (h ^ (h >>> 16)) >>> 0;
}

/**
 * Seeded generator: the nth value depends only on (seed, n)
 */
export function createRng(initial: RngState): Rng {
  let index = initial.index;
  const seed = initial.seed >>> 0;

  return {
    next(): number {
      const value = hash32(seed, index) / 0x100000000;
      index++;
      return value;
    },
    get state(): RngState {
      return { seed: initial.seed, index };
    }
  };
}

/**
 * Factory that replays a fixed list of D6 faces, in order, across actions.
 * D3 rolls consume one face each (1-2 → 1, 3-4 → 2, 5-6 → 3).
 */
export function createScriptedRng(faces: number[]): RngFactory {
  const queue = [...faces];

  return (initial: RngState): Rng => {
    let index = initial.index;
    return {
      next(): number {
        const face = queue.shift();
        if (face === undefined) {
          throw new IntegrityError('Scripted dice exhausted');
        }
        if (!Number.isInteger(face) || face < 1 || face > 6) {
          throw new IntegrityError(`Scripted die face out of range: ${face}`);
        }
        index++;
        return (face - 0.5) / 6;
      },
      get state(): RngState {
        return { seed: initial.seed, index };
      }
    };
  };
}

// ============================================================================
// DICE WITH AUDIT TRAIL
// ============================================================================

export interface RollOptions {
  /** Success target, e.g. 3 for "3+" */
  target?: number;
  modifiers?: string[];
  /** Count successes with this instead of comparing to target */
  isSuccess?: (roll: number) => boolean;
}

/**
 * Wraps an Rng for the duration of one action and records every roll
 */
export class Dice {
  readonly records: DiceRecord[] = [];
  private readonly startIndex: number;

  constructor(private readonly rng: Rng) {
    this.startIndex = rng.state.index;
  }

  /**
   * Roll a single D6 without recording it
   */
  d6(): number {
    return Math.floor(this.rng.next() * 6) + 1;
  }

  d3(): number {
    return Math.floor(this.rng.next() * 3) + 1;
  }

  /**
   * Roll `count` D6 and record them under `context`
   */
  roll(context: string, count: number, options: RollOptions = {}): number[] {
    const rolls: number[] = [];
    for (let i = 0; i < count; i++) {
      rolls.push(this.d6());
    }
    const { target, isSuccess } = options;
    const successes = isSuccess
      ? rolls.filter(isSuccess).length
      : target !== undefined
        ? rolls.filter(r => r >= target).length
        : rolls.length;
    this.record(context, rolls, successes, options.modifiers ?? []);
    return rolls;
  }

  /**
   * Record rolls that were made die-by-die (e.g. with re-rolls mixed in)
   */
  record(context: string, rolls: number[], successes: number, modifiers: string[] = []): void {
    this.records.push({
      context,
      rolls_raw: [...rolls],
      successes,
      modifiers_applied: [...modifiers]
    });
  }

  /**
   * Roll a characteristic such as "D6+2"; fixed values roll nothing
   */
  rollExpression(value: string | number, context: string): number {
    const expr = parseDiceExpression(value);
    if (expr.count === 0 || expr.sides === 0) {
      return expr.bonus;
    }

    const rolls: number[] = [];
    for (let i = 0; i < expr.count; i++) {
      rolls.push(expr.sides === 3 ? this.d3() : this.d6());
    }
    const total = rolls.reduce((sum, r) => sum + r, 0) + expr.bonus;
    this.record(context, rolls, total, expr.bonus ? [`+${expr.bonus}`] : []);
    return total;
  }

  get rngState(): RngState {
    return this.rng.state;
  }

  /** True when at least one random value was consumed */
  get used(): boolean {
    return this.rng.state.index !== this.startIndex;
  }
}
