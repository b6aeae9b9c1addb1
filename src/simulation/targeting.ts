/**
 * Range, visibility and cover between units
 */

import type { GameState, Unit } from '../types';
import { edgeDistance, placedModels, type PlacedModel } from './distance';
import { checkLineOfSight, getTerrainCover } from './terrain';

/**
 * A unit is in range when any of the given models is within range of any
 * target model
 */
export function inRange(models: PlacedModel[], target: Unit, range: number): boolean {
  const targets = placedModels(target);
  return models.some(m => targets.some(t => edgeDistance(m, t) <= range));
}

/**
 * Distance from the closest attacking model to the closest target model
 */
export function closestDistance(models: PlacedModel[], target: Unit): number {
  let best = Infinity;
  for (const m of models) {
    for (const t of placedModels(target)) {
      best = Math.min(best, edgeDistance(m, t));
    }
  }
  return best;
}

/**
 * Visible when any attacking model can see any target model
 */
export function isVisible(state: GameState, models: PlacedModel[], target: Unit): boolean {
  const targets = placedModels(target);
  return models.some(m =>
    targets.some(t => checkLineOfSight(m.position, t.position, state.board.terrain).hasLoS));
}

export interface CoverResult {
  hasCover: boolean;
  denseCover: boolean;
}

/**
 * The target has the benefit of cover when every one of its models is in or
 * behind cover from the attacker's closest model. Dense cover applies when any
 * line of fire crosses it.
 */
export function coverAgainst(state: GameState, models: PlacedModel[], target: Unit): CoverResult {
  const targets = placedModels(target);
  if (models.length === 0 || targets.length === 0) {
    return { hasCover: false, denseCover: false };
  }

  let allCovered = true;
  let denseCover = false;
  for (const t of targets) {
    let shooter = models[0];
    for (const m of models) {
      if (edgeDistance(m, t) < edgeDistance(shooter, t)) shooter = m;
    }
    const cover = getTerrainCover(t.position, shooter.position, state.board.terrain);
    allCovered = allCovered && cover.hasCover;
    denseCover = denseCover || cover.denseCover;
  }

  return { hasCover: allCovered, denseCover };
}
