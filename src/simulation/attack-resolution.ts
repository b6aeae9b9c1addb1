/**
 * Attack resolution for one weapon assignment:
 *
 *  1. number of attacks (Blast, Rapid Fire)
 *  2. hit rolls, modifiers capped at ±1
 *  3. critical hits (Sustained Hits, Lethal Hits)
 *  4. wound rolls (Anti-X, Devastating Wounds, Twin-linked, Lance)
 *  5. saving throws (AP, cover, invulnerable saves)
 *  6. damage allocation (Melta, damage reduction)
 *  7. feel no pain
 */

import type { AttackKind, Unit, WeaponProfile } from '../types';
import { RerollType } from '../types';
import { getBestReroll, shouldReroll } from '../calculators/rerolls';
import {
  calculateWoundTarget,
  netRollModifier,
  resolveSaveTarget,
  rollSucceeds,
  type ModifierSource
} from '../calculators/thresholds';
import { antiThreshold, blastBonus } from '../rules/special-weapons';
import { findWeapon, modelsWithWeapon, weaponAbilities } from '../utils/weapon';
import { applyAttackDamage, applyDirectDamage } from './damage-allocation';
import type { Dice } from './dice';
import { baseRadius, edgeDistance, placedModels, type PlacedModel } from './distance';
import { getUnitEffectProfile, type UnitEffectProfile } from './effects';
import { IntegrityError } from './errors';
import type { StateDraft } from './state-changes';
import { closestDistance, coverAgainst, isVisible } from './targeting';

export interface AttackRequest {
  attackerId: string;
  targetId: string;
  weaponId: string;
  /** Attacking models; defaults to every alive model carrying the weapon */
  modelIds?: string[];
  /** Overwatch: only unmodified 6s hit */
  overwatch?: boolean;
}

export interface AttackSummary {
  weapon: string;
  attacks: number;
  hits: number;
  criticalHits: number;
  wounds: number;
  criticalWounds: number;
  unsaved: number;
  damageDealt: number;
  mortalWounds: number;
  modelsDestroyed: string[];
  log: string[];
}

interface RollOutcome {
  successes: number;
  criticals: number;
}

function requireUnit(draft: StateDraft, id: string): Unit {
  const unit = draft.state.units[id];
  if (!unit) {
    throw new IntegrityError(`Unknown unit ${id}`);
  }
  return unit;
}

function attackingModels(unit: Unit, weapon: WeaponProfile, modelIds?: string[]): PlacedModel[] {
  return modelsWithWeapon(unit, weapon)
    .filter(m => !modelIds || modelIds.includes(m.id))
    .flatMap(m => (m.position ? [{ id: m.id, position: m.position, radius: baseRadius(m) }] : []));
}

function withinHalfRange(model: PlacedModel, target: Unit, weapon: WeaponProfile): boolean {
  return placedModels(target).some(t => edgeDistance(model, t) <= weapon.range / 2);
}

/**
 * Roll a pool of D6 with one kind of re-roll. Every die is recorded, with
 * re-rolls as a second record.
 */
function rollPool(
  dice: Dice,
  context: string,
  count: number,
  succeeds: (roll: number) => boolean,
  isCritical: (roll: number) => boolean,
  reroll: RerollType,
  modifiers: string[]
): RollOutcome {
  if (count <= 0) return { successes: 0, criticals: 0 };

  const rolls: number[] = [];
  for (let i = 0; i < count; i++) rolls.push(dice.d6());
  dice.record(context, rolls, rolls.filter(succeeds).length, modifiers);

  const rerolled: number[] = [];
  const final = rolls.map(roll => {
    if (!shouldReroll(roll, succeeds(roll), reroll)) return roll;
    const again = dice.d6();
    rerolled.push(again);
    return again;
  });
  if (rerolled.length > 0) {
    dice.record(`${context} (re-roll ${reroll})`, rerolled, rerolled.filter(succeeds).length, modifiers);
  }

  return {
    successes: final.filter(succeeds).length,
    criticals: final.filter(r => succeeds(r) && isCritical(r)).length
  };
}

function hitModifiers(
  attacker: Unit,
  weapon: WeaponProfile,
  attackerProfile: UnitEffectProfile,
  targetProfile: UnitEffectProfile,
  heavy: boolean,
  denseCover: boolean,
  indirectUnseen: boolean
): ModifierSource[] {
  const sources: ModifierSource[] = [
    { source: 'attacker effects', value: attackerProfile.hitModifierOutgoing },
    { source: 'target effects', value: targetProfile.hitModifierIncoming }
  ];
  if (weapon.type === 'ranged') {
    if (heavy && attacker.flags.remained_stationary === true) {
      sources.push({ source: 'heavy', value: 1 });
    }
    if (denseCover) {
      sources.push({ source: 'dense cover', value: -1 });
    }
    if (indirectUnseen) {
      sources.push({ source: 'indirect fire', value: -1 });
    }
  }
  return sources;
}

/**
 * Resolve every attack one weapon makes against one target and write the
 * results to the draft
 */
export function resolveAttack(draft: StateDraft, dice: Dice, request: AttackRequest): AttackSummary {
  const attacker = requireUnit(draft, request.attackerId);
  const target = requireUnit(draft, request.targetId);
  const weapon = findWeapon(attacker, request.weaponId);
  if (!weapon) {
    throw new IntegrityError(`${attacker.meta.name} has no weapon ${request.weaponId}`);
  }

  const kind: AttackKind = weapon.type;
  const attackerProfile = getUnitEffectProfile(draft.state, attacker, kind);
  const targetProfile = getUnitEffectProfile(draft.state, target, kind);
  const abilities = weaponAbilities(weapon, attackerProfile.weaponKeywords);
  const models = attackingModels(attacker, weapon, request.modelIds);
  const label = `${attacker.meta.name} ${weapon.name} → ${target.meta.name}`;

  const summary: AttackSummary = {
    weapon: weapon.name,
    attacks: 0,
    hits: 0,
    criticalHits: 0,
    wounds: 0,
    criticalWounds: 0,
    unsaved: 0,
    damageDealt: 0,
    mortalWounds: 0,
    modelsDestroyed: [],
    log: []
  };

  // 1. Attacks
  const targetModelCount = target.models.filter(m => m.alive).length;
  for (const model of models) {
    summary.attacks += dice.rollExpression(weapon.attacks, `${label}: attacks (${model.id})`);
    if (kind === 'ranged' && abilities.rapidFire && withinHalfRange(model, target, weapon)) {
      summary.attacks += dice.rollExpression(abilities.rapidFire, `${label}: rapid fire (${model.id})`);
    }
    summary.attacks += blastBonus(abilities, targetModelCount);
  }

  // 2-3. Hits
  const visible = kind === 'melee' || isVisible(draft.state, models, target);
  const terrain = kind === 'ranged'
    ? coverAgainst(draft.state, models, target)
    : { hasCover: false, denseCover: false };
  const indirectUnseen = abilities.indirectFire && !visible;

  let hits: number;
  let lethal = 0;
  if (abilities.torrent) {
    hits = summary.attacks;
    summary.log.push(`${label}: ${hits} automatic hits (torrent)`);
  } else {
    const modifier = netRollModifier(hitModifiers(
      attacker, weapon, attackerProfile, targetProfile, abilities.heavy, terrain.denseCover, indirectUnseen
    ));
    const critical = attackerProfile.criticalHit;
    const succeeds = request.overwatch
      ? (roll: number) => roll === 6
      : (roll: number) => rollSucceeds(roll, modifier.net, weapon.skill) || roll >= critical;
    const outcome = rollPool(
      dice,
      `${label}: hit rolls ${request.overwatch ? '6' : weapon.skill}+`,
      summary.attacks,
      succeeds,
      roll => roll >= critical,
      attackerProfile.rerollHits,
      modifier.applied
    );
    summary.criticalHits = outcome.criticals;
    hits = outcome.successes;
    if (abilities.sustainedHits > 0) {
      hits += outcome.criticals * abilities.sustainedHits;
    }
    if (abilities.lethalHits) {
      lethal = outcome.criticals;
      hits -= lethal;
    }
  }
  summary.hits = hits + lethal;

  // 4. Wounds
  const woundTarget = calculateWoundTarget(weapon.strength, target.meta.stats.toughness);
  const woundSources: ModifierSource[] = [
    { source: 'attacker effects', value: attackerProfile.woundModifierOutgoing },
    { source: 'target effects', value: targetProfile.woundModifierIncoming }
  ];
  if (abilities.lance && attacker.flags.charged === true) {
    woundSources.push({ source: 'lance', value: 1 });
  }
  const woundModifier = netRollModifier(woundSources);
  const criticalWound = Math.min(attackerProfile.criticalWound, antiThreshold(abilities, target.meta.keywords) ?? 6);
  const woundReroll = getBestReroll(
    attackerProfile.rerollWounds,
    abilities.twinLinked ? RerollType.FAILED : RerollType.NONE
  );
  const woundOutcome = rollPool(
    dice,
    `${label}: wound rolls ${woundTarget}+`,
    hits,
    roll => rollSucceeds(roll, woundModifier.net, woundTarget) || roll >= criticalWound,
    roll => roll >= criticalWound,
    woundReroll,
    woundModifier.applied
  );
  summary.criticalWounds = woundOutcome.criticals;
  summary.wounds = woundOutcome.successes + lethal;

  const devastating = abilities.devastatingWounds ? woundOutcome.criticals : 0;
  const savable = summary.wounds - devastating;

  // 5. Saves
  const cover = kind === 'ranged' && !abilities.ignoresCover
    && (terrain.hasCover || targetProfile.cover || indirectUnseen);
  const save = resolveSaveTarget({
    save: target.meta.stats.save,
    ap: weapon.ap,
    invulnerableSave: targetProfile.invulnerableSave,
    cover,
    saveModifier: targetProfile.saveModifier,
    apReduction: targetProfile.apReduction
  });
  let saved = 0;
  if (savable > 0) {
    const rolls = dice.roll(`${target.meta.name}: saves ${save.target}+`, savable, {
      isSuccess: roll => roll !== 1 && roll >= save.target,
      modifiers: save.modifiers
    });
    saved = rolls.filter(roll => roll !== 1 && roll >= save.target).length;
  }
  summary.unsaved = savable - saved;

  // 6-7. Damage
  const meltaActive = abilities.melta > 0 && closestDistance(models, target) <= weapon.range / 2;
  const damageFor = (context: string): number => {
    const rolled = dice.rollExpression(weapon.damage, context) + (meltaActive ? abilities.melta : 0);
    return targetProfile.damageReduction > 0 ? Math.max(1, rolled - targetProfile.damageReduction) : rolled;
  };

  for (let i = 0; i < summary.unsaved; i++) {
    if (requireUnit(draft, target.id).status === 'DESTROYED') break;
    const result = applyAttackDamage(draft, dice, target.id, damageFor(`${label}: damage`), weapon.name, kind);
    summary.damageDealt += result.woundsLost;
    summary.modelsDestroyed.push(...result.destroyedModels);
    summary.log.push(...result.log);
  }

  if (devastating > 0) {
    let mortal = 0;
    for (let i = 0; i < devastating; i++) {
      mortal += dice.rollExpression(weapon.damage, `${label}: devastating wounds`);
    }
    summary.mortalWounds = mortal;
    const result = applyDirectDamage(draft, dice, target.id, mortal, `${weapon.name} devastating wounds`);
    summary.damageDealt += result.woundsLost;
    summary.modelsDestroyed.push(...result.destroyedModels);
    summary.log.push(...result.log);
  }

  summary.log.unshift(
    `${label}: ${summary.attacks} attacks, ${summary.hits} hits` +
    `${summary.criticalHits > 0 ? ` (${summary.criticalHits} critical)` : ''}, ` +
    `${summary.wounds} wounds, ${saved} saved, ${summary.damageDealt} damage`
  );

  // Hazardous: each 1 inflicts 3 mortal wounds on the firing unit
  if (abilities.hazardous && models.length > 0) {
    const rolls = dice.roll(`${label}: hazardous`, models.length, { isSuccess: roll => roll === 1 });
    const failures = rolls.filter(roll => roll === 1).length;
    if (failures > 0) {
      summary.log.push(...applyDirectDamage(draft, dice, attacker.id, failures * 3, `${weapon.name} hazardous`).log);
    }
  }

  return summary;
}
