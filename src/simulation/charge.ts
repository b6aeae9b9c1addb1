/**
 * Charge declaration and charge move legality.
 *
 * A charge move is legal only when all four conditions hold:
 *  (a) the unit ends within Engagement Range of every declared target
 *  (b) it ends within Engagement Range of no other enemy unit
 *  (c) it ends in unit coherency
 *  (d) every model that could reach base contact with a target model while
 *      keeping (a)-(c) does so
 * Each model's path (straight line plus terrain costs) must fit within the
 * charge roll.
 */

import type { GameState, Point, Unit } from '../types';
import type { EngineConfig } from './config';
import {
  basesOverlap,
  baseRadius,
  CONTACT_EPSILON,
  checkCoherency,
  enemyUnits,
  groupDistance,
  inBaseContact,
  isEngaged,
  isOnTable,
  placeAt,
  placedModels,
  type PlacedModel
} from './distance';
import { hasPermission } from './effects';
import { isMovementBlocked, movementCost, type MoverTraits } from './terrain';
import { unitHasKeyword } from '../utils/weapon';

export interface ChargeCheck {
  legal: boolean;
  errors: string[];
}

export function moverTraits(unit: Unit): MoverTraits {
  return {
    infantry: unitHasKeyword(unit, 'INFANTRY'),
    ignoresElevation: unitHasKeyword(unit, 'FLY')
  };
}

/**
 * Reasons a unit cannot declare a charge against the given targets
 */
export function chargeDeclarationErrors(
  state: GameState,
  unit: Unit,
  targetIds: readonly string[],
  config: EngineConfig
): string[] {
  const errors: string[] = [];

  if (!isOnTable(unit)) {
    errors.push(`${unit.meta.name} is not on the battlefield`);
    return errors;
  }
  if (unit.flags.charge_attempted === true || unit.flags.charged === true) {
    errors.push(`${unit.meta.name} has already declared a charge this turn`);
  }
  if (unit.flags.advanced === true && !hasPermission(state, unit, 'charge_after_advance')) {
    errors.push(`${unit.meta.name} advanced this turn and cannot charge`);
  }
  if (unit.flags.fell_back === true && !hasPermission(state, unit, 'charge_after_fall_back')) {
    errors.push(`${unit.meta.name} fell back this turn and cannot charge`);
  }
  if (unitHasKeyword(unit, 'AIRCRAFT')) {
    errors.push(`${unit.meta.name} is an AIRCRAFT and cannot charge`);
  }
  if (isEngaged(state, unit, config.engagementRange)) {
    errors.push(`${unit.meta.name} is already within Engagement Range of an enemy unit`);
  }
  if (targetIds.length === 0) {
    errors.push('A charge needs at least one target');
  }
  if (new Set(targetIds).size !== targetIds.length) {
    errors.push('Charge targets must be distinct');
  }

  const models = placedModels(unit);
  for (const targetId of targetIds) {
    const target = state.units[targetId];
    if (!target) {
      errors.push(`Unknown charge target ${targetId}`);
      continue;
    }
    if (target.owner === unit.owner) {
      errors.push(`${target.meta.name} is not an enemy unit`);
      continue;
    }
    if (!isOnTable(target)) {
      errors.push(`${target.meta.name} is not on the battlefield`);
      continue;
    }
    const distance = groupDistance(models, placedModels(target));
    if (distance > config.maxChargeDistance) {
      errors.push(`${target.meta.name} is ${distance.toFixed(1)}" away, beyond ${config.maxChargeDistance}"`);
    }
  }

  return errors;
}

function otherModels(state: GameState, unit: Unit): PlacedModel[] {
  return Object.values(state.units)
    .filter(u => u.id !== unit.id)
    .flatMap(u => placedModels(u));
}

/**
 * Closest point from which a model touches the given base
 */
function contactPoint(from: Point, radius: number, enemy: PlacedModel): Point {
  const dx = from.x - enemy.position.x;
  const dy = from.y - enemy.position.y;
  const length = Math.hypot(dx, dy) || 1;
  const reach = enemy.radius + radius;
  return {
    x: enemy.position.x + (dx / length) * reach,
    y: enemy.position.y + (dy / length) * reach
  };
}

function pathErrors(
  state: GameState,
  unit: Unit,
  from: Point,
  to: Point,
  allowance: number,
  config: EngineConfig
): string[] {
  const errors: string[] = [];
  const mover = moverTraits(unit);
  const cost = movementCost(from, to, state.board.terrain, config.verticalTerrainThreshold, mover);
  if (cost > allowance + CONTACT_EPSILON) {
    errors.push(`needs ${cost.toFixed(1)}" of movement, more than ${allowance}"`);
  }
  const blocked = isMovementBlocked(from, to, state.board.terrain, mover);
  if (blocked.blocked) {
    errors.push(`path is blocked by ${blocked.blockedBy?.name ?? 'terrain'}`);
  }
  return errors;
}

function onBoard(state: GameState, model: PlacedModel): boolean {
  return model.position.x - model.radius >= 0
    && model.position.y - model.radius >= 0
    && model.position.x + model.radius <= state.board.width
    && model.position.y + model.radius <= state.board.height;
}

/**
 * Validate a charge move against the rolled distance
 */
export function checkChargeMove(
  state: GameState,
  unit: Unit,
  positions: readonly Point[],
  targetIds: readonly string[],
  roll: number,
  config: EngineConfig
): ChargeCheck {
  const errors: string[] = [];
  const alive = unit.models.filter(m => m.alive);

  if (positions.length !== alive.length) {
    return {
      legal: false,
      errors: [`Expected ${alive.length} positions for ${unit.meta.name}, got ${positions.length}`]
    };
  }

  const proposed = placeAt(unit, [...positions]);
  const others = otherModels(state, unit);
  const targets = targetIds
    .map(id => state.units[id])
    .filter((u): u is Unit => u !== undefined);
  const targetModels = targets.flatMap(t => placedModels(t));
  const undeclared = enemyUnits(state, unit).filter(e => !targetIds.includes(e.id));

  // Distance, terrain and placement per model
  alive.forEach((model, idx) => {
    const to = proposed[idx];
    if (!model.position) {
      errors.push(`Model ${model.id} is not on the battlefield`);
      return;
    }
    for (const problem of pathErrors(state, unit, model.position, to.position, roll, config)) {
      errors.push(`Model ${model.id} ${problem}`);
    }
    if (!onBoard(state, to)) {
      errors.push(`Model ${model.id} would end off the battlefield`);
    }
    if (others.some(o => basesOverlap(o, to))) {
      errors.push(`Model ${model.id} would overlap another model`);
    }
  });

  // (a) every declared target
  for (const target of targets) {
    if (groupDistance(proposed, placedModels(target)) > config.engagementRange + CONTACT_EPSILON) {
      errors.push(`Charge does not end within Engagement Range of ${target.meta.name}`);
    }
  }

  // (b) no undeclared enemy
  for (const enemy of undeclared) {
    if (groupDistance(proposed, placedModels(enemy)) <= config.engagementRange + CONTACT_EPSILON) {
      errors.push(`Charge ends within Engagement Range of undeclared unit ${enemy.meta.name}`);
    }
  }

  // (c) coherency
  errors.push(...checkCoherency(proposed, config.coherencyDistance).errors);

  // (d) base contact where achievable without breaking (a) to (c)
  if (errors.length === 0) {
    alive.forEach((model, idx) => {
      const start = model.position;
      if (!start) return;
      if (targetModels.some(t => inBaseContact(proposed[idx], t))) return;

      const radius = baseRadius(model);
      for (const enemy of targetModels) {
        const spot = contactPoint(start, radius, enemy);
        const moved: PlacedModel = { id: model.id, position: spot, radius };
        const alternative = proposed.map((p, i) => (i === idx ? moved : p));

        const reachable = pathErrors(state, unit, start, spot, roll, config).length === 0
          && onBoard(state, moved)
          && !others.some(o => basesOverlap(o, moved))
          && !proposed.some((p, i) => i !== idx && basesOverlap(p, moved))
          && checkCoherency(alternative, config.coherencyDistance).coherent
          && targets.every(t =>
            groupDistance(alternative, placedModels(t)) <= config.engagementRange + CONTACT_EPSILON)
          && undeclared.every(e =>
            groupDistance(alternative, placedModels(e)) > config.engagementRange + CONTACT_EPSILON);

        if (reachable) {
          errors.push(`Model ${model.id} can reach base contact with an enemy model and must do so`);
          return;
        }
      }
    });
  }

  return { legal: errors.length === 0, errors };
}
