/**
 * Damage allocation, feel-no-pain and direct (mortal wound) damage.
 *
 * Damage always goes to the most damaged alive model first. Damage from a
 * normal attack that exceeds the model's remaining wounds is lost; mortal
 * wounds spill over to the next model.
 */

import type { AttackKind, Model, Unit } from '../types';
import type { Dice } from './dice';
import { unitAbilities } from './ability-registry';
import { baseRadius, edgeDistance, placedModels, type PlacedModel } from './distance';
import { getUnitEffectProfile } from './effects';
import { assertIntegrity, IntegrityError } from './errors';
import type { StateDraft } from './state-changes';

export interface DamageResult {
  woundsLost: number;
  ignored: number;
  destroyedModels: string[];
  unitDestroyed: boolean;
  log: string[];
}

function emptyResult(): DamageResult {
  return { woundsLost: 0, ignored: 0, destroyedModels: [], unitDestroyed: false, log: [] };
}

function mergeInto(target: DamageResult, other: DamageResult): void {
  target.woundsLost += other.woundsLost;
  target.ignored += other.ignored;
  target.destroyedModels.push(...other.destroyedModels);
  target.unitDestroyed = target.unitDestroyed || other.unitDestroyed;
  target.log.push(...other.log);
}

export function checkModelIntegrity(unit: Unit, model: Model): void {
  assertIntegrity(model.current_wounds >= 0, `Model ${unit.id}/${model.id} has negative wounds`);
  assertIntegrity(
    model.current_wounds <= model.wounds,
    `Model ${unit.id}/${model.id} has more wounds than its characteristic`
  );
  assertIntegrity(
    model.alive === model.current_wounds > 0,
    `Model ${unit.id}/${model.id} alive flag disagrees with its wounds`
  );
}

/**
 * Index of the model that must take the next damage: the alive model that has
 * lost the most wounds, or the first alive model when none is damaged
 */
export function selectAllocationTarget(unit: Unit): number {
  let best = -1;
  let bestLost = -1;
  unit.models.forEach((model, idx) => {
    checkModelIntegrity(unit, model);
    if (!model.alive) return;
    const lost = model.wounds - model.current_wounds;
    if (lost > bestLost) {
      best = idx;
      bestLost = lost;
    }
  });
  return best;
}

function requireUnit(draft: StateDraft, unitId: string): Unit {
  const unit = draft.state.units[unitId];
  if (!unit) {
    throw new IntegrityError(`Unknown unit ${unitId}`);
  }
  return unit;
}

/**
 * Roll feel-no-pain for each point of damage; returns the points that get through
 */
function rollFeelNoPain(dice: Dice, points: number, fnp: number | undefined, context: string): number {
  if (fnp === undefined || points <= 0) return points;
  const rolls = dice.roll(`${context}: feel no pain ${fnp}+`, points, { target: fnp });
  return rolls.filter(r => r < fnp).length;
}

/**
 * Take wounds off one model and handle its removal
 */
function woundModel(
  draft: StateDraft,
  dice: Dice,
  unitId: string,
  modelIdx: number,
  wounds: number,
  source: string
): DamageResult {
  const result = emptyResult();
  const unit = requireUnit(draft, unitId);
  const model = unit.models[modelIdx];
  const lost = Math.min(wounds, model.current_wounds);
  const remaining = model.current_wounds - lost;

  draft.set(`units.${unitId}.models.${modelIdx}.current_wounds`, remaining);
  result.woundsLost = lost;

  if (remaining === 0) {
    draft.set(`units.${unitId}.models.${modelIdx}.alive`, false);
    result.destroyedModels.push(model.id);
    result.log.push(`${unit.meta.name} model ${model.id} destroyed (${source})`);

    const after = requireUnit(draft, unitId);
    if (after.models.every(m => !m.alive)) {
      draft.set(`units.${unitId}.status`, 'DESTROYED');
      result.unitDestroyed = true;
      result.log.push(`${unit.meta.name} destroyed`);
    }

    if (model.position) {
      const placed: PlacedModel = { id: model.id, position: model.position, radius: baseRadius(model) };
      result.log.push(...triggerOnDestroyed(draft, dice, unit, placed));
    }
  }

  return result;
}

/**
 * Apply one unsaved attack. Damage beyond the chosen model's remaining wounds
 * is lost.
 */
export function applyAttackDamage(
  draft: StateDraft,
  dice: Dice,
  unitId: string,
  damage: number,
  source: string,
  attack?: AttackKind
): DamageResult {
  const unit = requireUnit(draft, unitId);
  const modelIdx = selectAllocationTarget(unit);
  if (modelIdx < 0 || damage <= 0) return emptyResult();

  const profile = getUnitEffectProfile(draft.state, unit, attack);
  const through = rollFeelNoPain(dice, damage, profile.feelNoPain, source);
  const result = woundModel(draft, dice, unitId, modelIdx, through, source);
  result.ignored = damage - through;
  if (result.ignored > 0) {
    result.log.unshift(`${unit.meta.name} ignored ${result.ignored} damage (feel no pain)`);
  }
  return result;
}

/**
 * Mortal wounds: no hit, wound or save roll. Each point is allocated in turn
 * and spills over to the next model; feel-no-pain applies per point.
 */
export function applyDirectDamage(
  draft: StateDraft,
  dice: Dice,
  unitId: string,
  amount: number,
  source: string
): DamageResult {
  assertIntegrity(Number.isInteger(amount) && amount >= 0, `Invalid mortal wound amount ${amount}`);
  const result = emptyResult();
  const unit = requireUnit(draft, unitId);
  if (amount === 0 || unit.status === 'DESTROYED') return result;

  const fnp = getUnitEffectProfile(draft.state, unit).feelNoPain;
  const fnpRolls: number[] = [];

  for (let point = 0; point < amount; point++) {
    const modelIdx = selectAllocationTarget(requireUnit(draft, unitId));
    if (modelIdx < 0) break;

    if (fnp !== undefined) {
      const roll = dice.d6();
      fnpRolls.push(roll);
      if (roll >= fnp) {
        result.ignored++;
        continue;
      }
    }
    mergeInto(result, woundModel(draft, dice, unitId, modelIdx, 1, source));
  }

  if (fnp !== undefined && fnpRolls.length > 0) {
    dice.record(`${source}: feel no pain ${fnp}+`, fnpRolls, result.ignored);
  }

  result.log.unshift(
    `${unit.meta.name} suffers ${amount} mortal wound${amount === 1 ? '' : 's'} (${source}): ` +
    `${result.woundsLost} lost${result.ignored > 0 ? `, ${result.ignored} ignored` : ''}`
  );
  return result;
}

/**
 * Deadly Demise and similar: when a model of a unit with an on-destruction
 * ability dies, roll for it and hit every unit within range
 */
function triggerOnDestroyed(draft: StateDraft, dice: Dice, unit: Unit, model: PlacedModel): string[] {
  const log: string[] = [];

  for (const ability of unitAbilities(unit)) {
    const trigger = ability.onDestroyed;
    if (!trigger) continue;

    const [roll] = dice.roll(`${ability.name} (${unit.meta.name})`, 1, { target: trigger.rollOn });
    if (roll < trigger.rollOn) continue;

    log.push(`${unit.meta.name} explodes (${ability.name})`);
    const victims = Object.values(draft.state.units)
      .filter(other => other.id !== unit.id && other.status === 'DEPLOYED')
      .filter(other => placedModels(other).some(m => edgeDistance(model, m) <= trigger.range));

    for (const victim of victims) {
      const amount = dice.rollExpression(trigger.mortalWounds, `${ability.name} mortal wounds on ${victim.meta.name}`);
      log.push(...applyDirectDamage(draft, dice, victim.id, amount, ability.name).log);
    }
  }

  return log;
}
