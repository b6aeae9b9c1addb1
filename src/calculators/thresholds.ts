/**
 * Roll targets and modifier limits for hit, wound and save rolls.
 */

import { assertIntegrity } from '../simulation/errors';

export interface ModifierSource {
  source: string;
  value: number;
}

export interface NetModifier {
  net: number;
  applied: string[];
}

/**
 * Sum every modifier source and clamp the result to -1..+1. However many
 * sources stack, the roll moves by at most one.
 */
export function netRollModifier(sources: readonly ModifierSource[]): NetModifier {
  const applied = sources
    .filter(s => s.value !== 0)
    .map(s => `${s.source} ${s.value > 0 ? '+' : ''}${s.value}`);
  const raw = sources.reduce((sum, s) => sum + s.value, 0);
  const net = Math.max(-1, Math.min(1, raw));

  if (raw !== net) {
    applied.push(`capped at ${net > 0 ? '+' : ''}${net}`);
  }
  return { net, applied };
}

/**
 * Calculate wound target based on S vs T
 */
export function calculateWoundTarget(strength: number, toughness: number): number {
  if (strength >= toughness * 2) return 2; // S >= 2T: 2+
  if (strength > toughness) return 3;      // S > T: 3+
  if (strength === toughness) return 4;    // S = T: 4+
  if (strength * 2 <= toughness) return 6; // S <= T/2: 6+
  return 5;                                 // S < T: 5+
}

/**
 * Hit and wound rolls: an unmodified 1 always fails and an unmodified 6
 * always succeeds.
 */
export function rollSucceeds(unmodified: number, modifier: number, target: number): boolean {
  assertIntegrity(modifier >= -1 && modifier <= 1, `Roll modifier ${modifier} outside -1..+1`);
  if (unmodified === 1) return false;
  if (unmodified === 6) return true;
  return unmodified + modifier >= target;
}

export interface SaveInputs {
  save: number;
  ap: number;
  invulnerableSave?: number;
  cover: boolean;
  saveModifier: number;
  apReduction: number;
}

export interface SaveTarget {
  /** 7 means no save is possible */
  target: number;
  invulnerable: boolean;
  modifiers: string[];
}

/**
 * Work out the number a saving throw needs. AP worsens the armour save,
 * cover improves it by 1 (not for 3+ or better saves against AP 0), and
 * improvements never exceed +1 in total. An invulnerable save ignores AP and
 * cover and is used when it is better than the modified armour save.
 */
export function resolveSaveTarget(inputs: SaveInputs): SaveTarget {
  const modifiers: string[] = [];
  const apValue = Math.max(0, Math.abs(inputs.ap) - inputs.apReduction);
  if (apValue !== Math.abs(inputs.ap)) {
    modifiers.push(`AP reduced by ${inputs.apReduction}`);
  }
  if (apValue > 0) {
    modifiers.push(`AP -${apValue}`);
  }

  let improvement = 0;
  const coverApplies = inputs.cover && !(inputs.save <= 3 && apValue === 0);
  if (coverApplies) {
    improvement += 1;
    modifiers.push('cover +1');
  }
  if (inputs.saveModifier !== 0) {
    improvement += inputs.saveModifier;
    modifiers.push(`save ${inputs.saveModifier > 0 ? '+' : ''}${inputs.saveModifier}`);
  }
  if (improvement > 1) {
    improvement = 1;
    modifiers.push('save improvement capped at +1');
  }

  const armour = Math.max(2, Math.min(7, inputs.save + apValue - improvement));
  const invulnerable = inputs.invulnerableSave;

  if (invulnerable !== undefined && invulnerable < armour) {
    return { target: invulnerable, invulnerable: true, modifiers: [`invulnerable ${invulnerable}+`] };
  }
  return { target: armour, invulnerable: false, modifiers };
}
