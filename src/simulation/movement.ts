/**
 * Move and placement validation shared by deployment, movement, reserves and
 * the fight phase's pile-in and consolidation
 */

import type { DeploymentZone, GameState, Point, Unit } from '../types';
import type { EngineConfig } from './config';
import { moverTraits } from './charge';
import {
  basesOverlap,
  CONTACT_EPSILON,
  checkCoherency,
  enemyUnits,
  groupDistance,
  placeAt,
  placedModels,
  type PlacedModel
} from './distance';
import type { StateDraft } from './state-changes';
import { isMovementBlocked, movementCost, pointInTerrain } from './terrain';

export interface MoveRules {
  maxDistance: number;
  /** May the unit end within Engagement Range of an enemy */
  mayEndEngaged: boolean;
  /** Each model must end at least as close to the closest enemy model (pile in, consolidate) */
  mustCloseIn?: boolean;
}

function onBoard(state: GameState, model: PlacedModel): boolean {
  return model.position.x - model.radius >= -CONTACT_EPSILON
    && model.position.y - model.radius >= -CONTACT_EPSILON
    && model.position.x + model.radius <= state.board.width + CONTACT_EPSILON
    && model.position.y + model.radius <= state.board.height + CONTACT_EPSILON;
}

function inZone(zone: DeploymentZone, model: PlacedModel): boolean {
  return model.position.x - model.radius >= zone.min_x - CONTACT_EPSILON
    && model.position.y - model.radius >= zone.min_y - CONTACT_EPSILON
    && model.position.x + model.radius <= zone.max_x + CONTACT_EPSILON
    && model.position.y + model.radius <= zone.max_y + CONTACT_EPSILON;
}

/**
 * Checks every placed position must pass wherever a unit ends up
 */
function endPositionErrors(state: GameState, unit: Unit, proposed: PlacedModel[], config: EngineConfig): string[] {
  const errors: string[] = [];
  const others = Object.values(state.units)
    .filter(u => u.id !== unit.id)
    .flatMap(u => placedModels(u));

  proposed.forEach((model, idx) => {
    if (!onBoard(state, model)) {
      errors.push(`Model ${model.id} would end off the battlefield`);
    }
    if (others.some(o => basesOverlap(o, model)) || proposed.some((p, j) => j !== idx && basesOverlap(p, model))) {
      errors.push(`Model ${model.id} would overlap another model`);
    }
    const inside = state.board.terrain.find(t => t.impassable && pointInTerrain(model.position, t));
    if (inside) {
      errors.push(`Model ${model.id} cannot end inside ${inside.name}`);
    }
  });

  errors.push(...checkCoherency(proposed, config.coherencyDistance).errors);
  return errors;
}

function positionCountError(unit: Unit, positions: readonly Point[]): string | null {
  const alive = unit.models.filter(m => m.alive).length;
  return positions.length === alive
    ? null
    : `Expected ${alive} positions for ${unit.meta.name}, got ${positions.length}`;
}

/**
 * Reasons a move to the given positions is illegal
 */
export function moveErrors(
  state: GameState,
  unit: Unit,
  positions: readonly Point[],
  rules: MoveRules,
  config: EngineConfig
): string[] {
  const countError = positionCountError(unit, positions);
  if (countError) return [countError];

  const errors: string[] = [];
  const mover = moverTraits(unit);
  const proposed = placeAt(unit, [...positions]);
  const enemies = enemyUnits(state, unit);
  const enemyModels = enemies.flatMap(e => placedModels(e));

  unit.models.filter(m => m.alive).forEach((model, idx) => {
    const from = model.position;
    const to = proposed[idx];
    if (!from) {
      errors.push(`Model ${model.id} is not on the battlefield`);
      return;
    }
    const cost = movementCost(from, to.position, state.board.terrain, config.verticalTerrainThreshold, mover);
    if (cost > rules.maxDistance + CONTACT_EPSILON) {
      errors.push(`Model ${model.id} needs ${cost.toFixed(1)}" of movement, more than ${rules.maxDistance}"`);
    }
    const blocked = isMovementBlocked(from, to.position, state.board.terrain, mover);
    if (blocked.blocked) {
      errors.push(`Model ${model.id} cannot move through ${blocked.blockedBy?.name ?? 'terrain'}`);
    }
    if (rules.mustCloseIn && enemyModels.length > 0) {
      const start: PlacedModel = { id: model.id, position: from, radius: to.radius };
      if (groupDistance([to], enemyModels) > groupDistance([start], enemyModels) + CONTACT_EPSILON) {
        errors.push(`Model ${model.id} must end closer to the closest enemy model`);
      }
    }
  });

  errors.push(...endPositionErrors(state, unit, proposed, config));

  if (!rules.mayEndEngaged) {
    for (const enemy of enemies) {
      if (groupDistance(proposed, placedModels(enemy)) <= config.engagementRange + CONTACT_EPSILON) {
        errors.push(`${unit.meta.name} cannot end within Engagement Range of ${enemy.meta.name}`);
      }
    }
  }

  return errors;
}

/**
 * Reasons a unit cannot be set up in its deployment zone at these positions
 */
export function deploymentErrors(
  state: GameState,
  unit: Unit,
  positions: readonly Point[],
  config: EngineConfig
): string[] {
  const countError = positionCountError(unit, positions);
  if (countError) return [countError];

  const zone = state.board.deployment_zones[unit.owner === 1 ? '1' : '2'];
  const proposed = placeAt(unit, [...positions]);
  const errors = proposed
    .filter(m => !inZone(zone, m))
    .map(m => `Model ${m.id} is outside the deployment zone`);

  errors.push(...endPositionErrors(state, unit, proposed, config));
  return errors;
}

/**
 * Reasons a unit cannot arrive from reserves at these positions
 */
export function reserveArrivalErrors(
  state: GameState,
  unit: Unit,
  positions: readonly Point[],
  config: EngineConfig
): string[] {
  const countError = positionCountError(unit, positions);
  if (countError) return [countError];

  const proposed = placeAt(unit, [...positions]);
  const errors = endPositionErrors(state, unit, proposed, config);
  for (const enemy of enemyUnits(state, unit)) {
    const distance = groupDistance(proposed, placedModels(enemy));
    if (distance <= config.reserveArrivalDistance) {
      errors.push(`${unit.meta.name} must arrive more than ${config.reserveArrivalDistance}" from ${enemy.meta.name}`);
    }
  }
  return errors;
}

/**
 * Write new positions for the unit's alive models, in order
 */
export function placeUnit(draft: StateDraft, unit: Unit, positions: readonly Point[]): void {
  let next = 0;
  unit.models.forEach((model, idx) => {
    if (!model.alive) return;
    draft.set(`units.${unit.id}.models.${idx}.position`, positions[next]);
    next++;
  });
}
