/**
 * Who may shoot, with which weapons, at what
 */

import type { GameState, Unit, WeaponAssignment, WeaponProfile } from '../types';
import type { EngineConfig } from './config';
import { edgeDistance, engagedEnemies, isEngaged, isOnTable, placedModels, type PlacedModel } from './distance';
import { getUnitEffectProfile, hasPermission } from './effects';
import { isVisible } from './targeting';
import { findWeapon, getWeaponType, modelsWithWeapon, unitHasKeyword, weaponAbilities } from '../utils/weapon';

/**
 * Placed models that carry the weapon
 */
export function weaponModels(unit: Unit, weapon: WeaponProfile): PlacedModel[] {
  const carriers = new Set(modelsWithWeapon(unit, weapon).map(m => m.id));
  return placedModels(unit).filter(m => carriers.has(m.id));
}

/**
 * Carriers of the weapon within its range of the target
 */
export function modelsInRange(unit: Unit, weapon: WeaponProfile, target: Unit): PlacedModel[] {
  const targets = placedModels(target);
  return weaponModels(unit, weapon).filter(m => targets.some(t => edgeDistance(m, t) <= weapon.range));
}

/**
 * MONSTER and VEHICLE units fire every weapon while engaged
 */
function firesAnyWeaponWhileEngaged(unit: Unit): boolean {
  return unitHasKeyword(unit, 'MONSTER') || unitHasKeyword(unit, 'VEHICLE');
}

/**
 * Reasons a unit cannot be selected to shoot at all
 */
export function shooterErrors(state: GameState, unit: Unit): string[] {
  const errors: string[] = [];
  if (!isOnTable(unit)) {
    errors.push(`${unit.meta.name} is not on the battlefield`);
    return errors;
  }
  if (unit.flags.has_shot === true) {
    errors.push(`${unit.meta.name} has already shot this turn`);
  }
  if (unit.flags.fell_back === true && !hasPermission(state, unit, 'shoot_after_fall_back')) {
    errors.push(`${unit.meta.name} fell back this turn and cannot shoot`);
  }
  return errors;
}

/**
 * Reasons one weapon cannot fire at one target
 */
export function weaponTargetErrors(
  state: GameState,
  unit: Unit,
  weapon: WeaponProfile,
  target: Unit,
  config: EngineConfig
): string[] {
  const errors: string[] = [];
  const range = config.engagementRange;
  const pistol = getWeaponType(weapon) === 'pistol';

  if (weapon.type !== 'ranged') {
    return [`${weapon.name} is not a ranged weapon`];
  }
  // Turn flags only bind the active player; overwatch fires in the opponent's turn
  const ownTurn = unit.owner === state.meta.active_player;
  if (ownTurn && unit.flags.advanced === true && !hasPermission(state, unit, 'shoot_after_advance')) {
    const granted = getUnitEffectProfile(state, unit, 'ranged').weaponKeywords;
    if (!weaponAbilities(weapon, granted).assault) {
      errors.push(`${unit.meta.name} advanced this turn and can only fire Assault weapons; ${weapon.name} is not an Assault weapon`);
    }
  }

  const engagedWith = engagedEnemies(state, unit, range);
  if (engagedWith.length > 0) {
    if (!pistol && !firesAnyWeaponWhileEngaged(unit)) {
      errors.push(`${unit.meta.name} is within Engagement Range and can only fire Pistols`);
    }
    if (!engagedWith.some(e => e.id === target.id)) {
      errors.push(`${unit.meta.name} is within Engagement Range and can only shoot units it is engaged with`);
    }
  }

  if (target.owner === unit.owner) {
    errors.push(`${target.meta.name} is not an enemy unit`);
    return errors;
  }
  if (!isOnTable(target)) {
    errors.push(`${target.meta.name} is not on the battlefield`);
    return errors;
  }

  // Locked in combat with one of our units, unless it is engaged with the shooter itself
  const lockedWithFriendly = Object.values(state.units).some(friend =>
    friend.owner === unit.owner
    && friend.id !== unit.id
    && isOnTable(friend)
    && engagedEnemies(state, friend, range).some(e => e.id === target.id));
  if (lockedWithFriendly && !engagedWith.some(e => e.id === target.id)) {
    errors.push(`${target.meta.name} is locked in combat with a friendly unit`);
  }

  const carriers = weaponModels(unit, weapon);
  if (carriers.length === 0) {
    errors.push(`No model in ${unit.meta.name} carries ${weapon.name}`);
    return errors;
  }
  if (modelsInRange(unit, weapon, target).length === 0) {
    errors.push(`${target.meta.name} is out of range of ${weapon.name} (${weapon.range}")`);
  }
  const abilities = weaponAbilities(weapon, getUnitEffectProfile(state, unit, 'ranged').weaponKeywords);
  if (!abilities.indirectFire && !isVisible(state, carriers, target)) {
    errors.push(`${target.meta.name} is not visible to ${unit.meta.name}`);
  }
  return errors;
}

/**
 * Every reason a set of weapon assignments is illegal
 */
export function assignmentErrors(
  state: GameState,
  unit: Unit,
  assignments: readonly WeaponAssignment[],
  config: EngineConfig
): string[] {
  if (assignments.length === 0) {
    return ['Assign at least one weapon to a target'];
  }
  const errors: string[] = [];
  const seen = new Set<string>();

  for (const assignment of assignments) {
    if (seen.has(assignment.weapon_id)) {
      errors.push(`${assignment.weapon_id} is assigned more than once`);
      continue;
    }
    seen.add(assignment.weapon_id);

    const weapon = findWeapon(unit, assignment.weapon_id);
    if (!weapon) {
      errors.push(`${unit.meta.name} has no weapon ${assignment.weapon_id}`);
      continue;
    }
    const target = state.units[assignment.target_unit_id];
    if (!target) {
      errors.push(`Unknown unit ${assignment.target_unit_id}`);
      continue;
    }
    errors.push(...weaponTargetErrors(state, unit, weapon, target, config));
  }
  return errors;
}

/**
 * Ranged weapons that could fire at the target right now
 */
export function weaponsAbleToFire(state: GameState, unit: Unit, target: Unit, config: EngineConfig): WeaponProfile[] {
  return unit.meta.weapons.filter(w =>
    w.type === 'ranged' && weaponTargetErrors(state, unit, w, target, config).length === 0);
}

/**
 * A unit has something to shoot at
 */
export function canShoot(state: GameState, unit: Unit, config: EngineConfig): boolean {
  if (shooterErrors(state, unit).length > 0) return false;
  return Object.values(state.units)
    .filter(t => t.owner !== unit.owner && isOnTable(t))
    .some(t => weaponsAbleToFire(state, unit, t, config).length > 0);
}

/**
 * Units of the target's opponent that could fire overwatch at it
 */
export function overwatchCandidates(state: GameState, charger: Unit, config: EngineConfig): Unit[] {
  return Object.values(state.units).filter(u =>
    u.owner !== charger.owner
    && isOnTable(u)
    && !isEngaged(state, u, config.engagementRange)
    && weaponsAbleToFire(state, u, charger, config).length > 0);
}
