/**
 * Model and unit distance helpers. All distances are in inches and measured
 * edge-to-edge between round bases.
 */

import type { GameState, Model, Point, Unit } from '../types';

export const MM_PER_INCH = 25.4;

/** Tolerance for "touching" comparisons */
export const CONTACT_EPSILON = 0.05;

export interface PlacedModel {
  id: string;
  position: Point;
  radius: number;
}

export function baseRadius(model: Pick<Model, 'base_mm'>): number {
  return model.base_mm / MM_PER_INCH / 2;
}

export function centerDistance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/**
 * Closest distance between two bases; 0 when touching or overlapping
 */
export function edgeDistance(a: PlacedModel, b: PlacedModel): number {
  return Math.max(0, centerDistance(a.position, b.position) - a.radius - b.radius);
}

export function basesOverlap(a: PlacedModel, b: PlacedModel): boolean {
  return centerDistance(a.position, b.position) < a.radius + b.radius - CONTACT_EPSILON;
}

export function inBaseContact(a: PlacedModel, b: PlacedModel): boolean {
  return edgeDistance(a, b) <= CONTACT_EPSILON;
}

/**
 * Alive models that are on the table
 */
export function placedModels(unit: Unit): PlacedModel[] {
  const placed: PlacedModel[] = [];
  for (const model of unit.models) {
    if (!model.alive || !model.position) continue;
    placed.push({ id: model.id, position: model.position, radius: baseRadius(model) });
  }
  return placed;
}

/**
 * Same models placed at proposed positions (index-aligned with alive models)
 */
export function placeAt(unit: Unit, positions: Point[]): PlacedModel[] {
  return unit.models
    .filter(m => m.alive)
    .map((model, idx) => ({ id: model.id, position: positions[idx], radius: baseRadius(model) }));
}

/**
 * Closest edge distance between any pair of models of two groups
 */
export function groupDistance(a: PlacedModel[], b: PlacedModel[]): number {
  let best = Infinity;
  for (const ma of a) {
    for (const mb of b) {
      best = Math.min(best, edgeDistance(ma, mb));
    }
  }
  return best;
}

export function unitDistance(a: Unit, b: Unit): number {
  return groupDistance(placedModels(a), placedModels(b));
}

export function isOnTable(unit: Unit): boolean {
  return unit.status === 'DEPLOYED' && unit.models.some(m => m.alive && m.position !== null);
}

export function enemyUnits(state: GameState, unit: Unit): Unit[] {
  return Object.values(state.units).filter(u => u.owner !== unit.owner && isOnTable(u));
}

/**
 * Enemy units within engagement range of the given models
 */
export function engagedEnemies(
  state: GameState,
  unit: Unit,
  engagementRange: number,
  models: PlacedModel[] = placedModels(unit)
): Unit[] {
  return enemyUnits(state, unit).filter(
    enemy => groupDistance(models, placedModels(enemy)) <= engagementRange + CONTACT_EPSILON
  );
}

export function isEngaged(state: GameState, unit: Unit, engagementRange: number): boolean {
  return engagedEnemies(state, unit, engagementRange).length > 0;
}

// ============================================================================
// COHERENCY
// ============================================================================

export interface CoherencyResult {
  coherent: boolean;
  errors: string[];
}

/**
 * Each model must be within `distance` of at least one other model (two others
 * for units of seven or more), and the unit must form a single group.
 */
export function checkCoherency(models: PlacedModel[], distance: number): CoherencyResult {
  if (models.length <= 1) {
    return { coherent: true, errors: [] };
  }

  const errors: string[] = [];
  const needed = models.length >= 7 ? 2 : 1;
  const neighbours: number[][] = models.map(() => []);

  for (let i = 0; i < models.length; i++) {
    for (let j = i + 1; j < models.length; j++) {
      if (edgeDistance(models[i], models[j]) <= distance + CONTACT_EPSILON) {
        neighbours[i].push(j);
        neighbours[j].push(i);
      }
    }
  }

  models.forEach((model, idx) => {
    if (neighbours[idx].length < needed) {
      errors.push(`Model ${model.id} is not within ${distance}" of ${needed === 2 ? 'two other models' : 'another model'}`);
    }
  });

  // A unit split into two internally coherent groups is still out of coherency
  const seen = new Set<number>([0]);
  const frontier = [0];
  while (frontier.length > 0) {
    const current = frontier.pop();
    if (current === undefined) break;
    for (const next of neighbours[current]) {
      if (!seen.has(next)) {
        seen.add(next);
        frontier.push(next);
      }
    }
  }
  if (seen.size < models.length && errors.length === 0) {
    errors.push('Unit is split into separate groups');
  }

  return { coherent: errors.length === 0, errors };
}
