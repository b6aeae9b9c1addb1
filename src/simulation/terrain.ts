/**
 * Terrain for the battlefield: geometry, movement costs, cover and line of sight.
 * Distances are in inches on a board whose origin is the bottom-left corner.
 */

import type { Point } from '../types';

// ============================================================================
// TERRAIN TYPE DEFINITIONS
// ============================================================================

export type TerrainType =
  | 'ruins'
  | 'woods'
  | 'crater'
  | 'barricade'
  | 'building'
  | 'container'
  | 'hills'
  | 'debris'
  | 'custom';

/** Rules a feature applies to models in it, moving over it or seen through it */
export interface TerrainTraits {
  /** +1 to saves for models wholly within, or behind it */
  coverLight?: boolean;
  /** Cover for models within it */
  coverHeavy?: boolean;
  /** Sight lines crossing it are blocked unless an end lies inside */
  obscuring?: boolean;
  /** Shots drawn through it are at -1 to hit */
  denseCover?: boolean;
  /** INFANTRY pass through its walls */
  breachable?: boolean;
  /** Crossing it costs 2" */
  difficultGround?: boolean;
  /** Never grants cover */
  exposedPosition?: boolean;
}

export type TerrainShape = 'rectangle' | 'circle' | 'polygon';

export interface BoundingBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface TerrainFeature {
  id: string;
  name: string;
  type: TerrainType;
  /** Centre of the footprint */
  x: number;
  y: number;
  /** Footprint along each axis */
  width: number;
  height: number;
  /** Height above the board; features taller than the climb threshold cost movement */
  elevation?: number;
  shape: TerrainShape;
  /** Polygon corners, offset from the centre */
  vertices?: Point[];
  radius?: number;
  traits: TerrainTraits;
  impassable?: boolean;
  /** Only INFANTRY may cross */
  infantryOnly?: boolean;
}

// ============================================================================
// GEOMETRY
// ============================================================================

function circleRadius(terrain: TerrainFeature): number {
  return terrain.radius ?? terrain.width / 2;
}

/**
 * Polygon corners in board coordinates, when the feature is a usable polygon
 */
function absoluteVertices(terrain: TerrainFeature): Point[] | undefined {
  if (terrain.shape !== 'polygon' || !terrain.vertices || terrain.vertices.length < 3) {
    return undefined;
  }
  return terrain.vertices.map(v => ({ x: terrain.x + v.x, y: terrain.y + v.y }));
}

export function getTerrainBounds(terrain: TerrainFeature): BoundingBox {
  if (terrain.shape === 'circle') {
    const r = circleRadius(terrain);
    return { minX: terrain.x - r, minY: terrain.y - r, maxX: terrain.x + r, maxY: terrain.y + r };
  }

  const vertices = absoluteVertices(terrain);
  if (vertices) {
    const xs = vertices.map(v => v.x);
    const ys = vertices.map(v => v.y);
    return { minX: Math.min(...xs), minY: Math.min(...ys), maxX: Math.max(...xs), maxY: Math.max(...ys) };
  }

  const halfW = terrain.width / 2;
  const halfH = terrain.height / 2;
  return { minX: terrain.x - halfW, minY: terrain.y - halfH, maxX: terrain.x + halfW, maxY: terrain.y + halfH };
}

function inBox(point: Point, box: BoundingBox): boolean {
  return point.x >= box.minX && point.x <= box.maxX && point.y >= box.minY && point.y <= box.maxY;
}

function boxCorners(box: BoundingBox): Point[] {
  return [
    { x: box.minX, y: box.minY },
    { x: box.maxX, y: box.minY },
    { x: box.maxX, y: box.maxY },
    { x: box.minX, y: box.maxY }
  ];
}

/** Even-odd rule */
function inPolygon(point: Point, polygon: Point[]): boolean {
  let inside = false;
  polygon.forEach((a, idx) => {
    const b = polygon[(idx + polygon.length - 1) % polygon.length];
    if ((a.y > point.y) !== (b.y > point.y)
      && point.x < ((b.x - a.x) * (point.y - a.y)) / (b.y - a.y) + a.x) {
      inside = !inside;
    }
  });
  return inside;
}

export function pointInTerrain(point: Point, terrain: TerrainFeature): boolean {
  if (terrain.shape === 'circle') {
    return Math.hypot(point.x - terrain.x, point.y - terrain.y) <= circleRadius(terrain);
  }
  const vertices = absoluteVertices(terrain);
  return vertices ? inPolygon(point, vertices) : inBox(point, getTerrainBounds(terrain));
}

/** Sign of the turn from a→b towards c */
function orientation(a: Point, b: Point, c: Point): number {
  return Math.sign((b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x));
}

function withinSpan(a: Point, b: Point, p: Point): boolean {
  return p.x >= Math.min(a.x, b.x) && p.x <= Math.max(a.x, b.x)
    && p.y >= Math.min(a.y, b.y) && p.y <= Math.max(a.y, b.y);
}

function segmentsCross(p1: Point, p2: Point, q1: Point, q2: Point): boolean {
  const d1 = orientation(q1, q2, p1);
  const d2 = orientation(q1, q2, p2);
  const d3 = orientation(p1, p2, q1);
  const d4 = orientation(p1, p2, q2);

  if (d1 * d2 < 0 && d3 * d4 < 0) return true;
  // Touching or collinear
  return (d1 === 0 && withinSpan(q1, q2, p1))
    || (d2 === 0 && withinSpan(q1, q2, p2))
    || (d3 === 0 && withinSpan(p1, p2, q1))
    || (d4 === 0 && withinSpan(p1, p2, q2));
}

function crossesOutline(from: Point, to: Point, outline: Point[], contains: (p: Point) => boolean): boolean {
  if (contains(from) || contains(to)) return true;
  return outline.some((corner, idx) => segmentsCross(from, to, corner, outline[(idx + 1) % outline.length]));
}

/**
 * The closest point of the segment to the centre lies within the radius
 */
function segmentHitsCircle(from: Point, to: Point, centre: Point, radius: number): boolean {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const lengthSq = dx * dx + dy * dy;
  const t = lengthSq === 0
    ? 0
    : Math.min(1, Math.max(0, ((centre.x - from.x) * dx + (centre.y - from.y) * dy) / lengthSq));
  return Math.hypot(from.x + t * dx - centre.x, from.y + t * dy - centre.y) <= radius;
}

/**
 * Whether the segment from one point to another touches the feature
 */
export function lineIntersectsTerrain(from: Point, to: Point, terrain: TerrainFeature): boolean {
  const bounds = getTerrainBounds(terrain);
  if (Math.max(from.x, to.x) < bounds.minX || Math.min(from.x, to.x) > bounds.maxX
    || Math.max(from.y, to.y) < bounds.minY || Math.min(from.y, to.y) > bounds.maxY) {
    return false;
  }

  if (terrain.shape === 'circle') {
    return segmentHitsCircle(from, to, { x: terrain.x, y: terrain.y }, circleRadius(terrain));
  }
  const vertices = absoluteVertices(terrain);
  if (vertices) {
    return crossesOutline(from, to, vertices, p => inPolygon(p, vertices));
  }
  return crossesOutline(from, to, boxCorners(bounds), p => inBox(p, bounds));
}

// ============================================================================
// TERRAIN QUERY FUNCTIONS
// ============================================================================

export interface MoverTraits {
  infantry: boolean;
  /** FLY and similar traits ignore vertical distance and walls */
  ignoresElevation: boolean;
}

/**
 * Check if movement between two points is blocked by any terrain
 */
export function isMovementBlocked(
  from: Point,
  to: Point,
  terrain: TerrainFeature[],
  mover: MoverTraits
): { blocked: boolean; blockedBy?: TerrainFeature } {
  for (const t of terrain) {
    if (!lineIntersectsTerrain(from, to, t)) continue;

    if (t.impassable) {
      return { blocked: true, blockedBy: t };
    }
    if (mover.ignoresElevation) continue;

    if (t.infantryOnly && !mover.infantry) {
      return { blocked: true, blockedBy: t };
    }
    // Walls of obscuring terrain stop everything except infantry going through breaches
    if (t.traits.obscuring && !(t.traits.breachable && mover.infantry)) {
      return { blocked: true, blockedBy: t };
    }
  }

  return { blocked: false };
}

/**
 * Additional inches required for crossing difficult ground
 */
export function getMovementPenalty(
  from: Point,
  to: Point,
  terrain: TerrainFeature[]
): number {
  let penalty = 0;

  for (const t of terrain) {
    if (t.traits.difficultGround && lineIntersectsTerrain(from, to, t)) {
      penalty += 2;
    }
  }

  return penalty;
}

/**
 * Vertical distance paid for climbing terrain taller than the threshold.
 * Crossing a feature costs the climb up plus the climb down; only entering or
 * only leaving it costs half of that.
 */
export function verticalTraversalCost(
  from: Point,
  to: Point,
  terrain: TerrainFeature[],
  threshold: number,
  ignoresElevation: boolean
): number {
  if (ignoresElevation) return 0;

  let cost = 0;
  for (const t of terrain) {
    const elevation = t.elevation ?? 0;
    if (elevation <= threshold) continue;

    const startsInside = pointInTerrain(from, t);
    const endsInside = pointInTerrain(to, t);
    const fullCost = elevation * 2;

    if (startsInside && endsInside) continue;
    if (startsInside !== endsInside) {
      cost += fullCost / 2;
    } else if (lineIntersectsTerrain(from, to, t)) {
      cost += fullCost;
    }
  }

  return cost;
}

/**
 * Total movement spent going from one point to another in a straight line
 */
export function movementCost(
  from: Point,
  to: Point,
  terrain: TerrainFeature[],
  threshold: number,
  mover: MoverTraits
): number {
  const horizontal = Math.hypot(to.x - from.x, to.y - from.y);
  if (horizontal === 0) return 0;
  return horizontal
    + getMovementPenalty(from, to, terrain)
    + verticalTraversalCost(from, to, terrain, threshold, mover.ignoresElevation);
}

/**
 * Check if a model at a position would receive cover from a shooter
 */
export function getTerrainCover(
  position: Point,
  shooterPosition: Point,
  terrain: TerrainFeature[]
): { hasCover: boolean; denseCover: boolean } {
  let hasCover = false;
  let denseCover = false;

  for (const t of terrain) {
    if (t.traits.exposedPosition) continue;

    const targetInTerrain = pointInTerrain(position, t);
    const throughTerrain = lineIntersectsTerrain(shooterPosition, position, t);

    if (targetInTerrain) {
      if (t.traits.coverLight || t.traits.coverHeavy) {
        hasCover = true;
      }
    } else if (throughTerrain) {
      if (t.traits.denseCover) {
        denseCover = true;
      }
      if (t.traits.coverLight || t.traits.obscuring) {
        hasCover = true;
      }
    }
  }

  return { hasCover, denseCover };
}

/**
 * Check line of sight between two positions
 */
export function checkLineOfSight(
  from: Point,
  to: Point,
  terrain: TerrainFeature[]
): { hasLoS: boolean; blockedBy?: TerrainFeature } {
  for (const t of terrain) {
    if (!t.traits.obscuring) continue;

    // A model inside the feature can see out and be seen into
    if (pointInTerrain(from, t) || pointInTerrain(to, t)) continue;

    if (lineIntersectsTerrain(from, to, t)) {
      return { hasLoS: false, blockedBy: t };
    }
  }

  return { hasLoS: true };
}

// ============================================================================
// FACTORIES
// ============================================================================

function rectangle(
  id: string,
  name: string,
  type: TerrainType,
  centre: Point,
  size: [number, number],
  elevation: number,
  traits: TerrainTraits
): TerrainFeature {
  const [width, height] = size;
  return { id, name, type, ...centre, width, height, elevation, shape: 'rectangle', traits };
}

/** Breachable, obscuring ruin that INFANTRY can climb through */
export function createRuins(id: string, x: number, y: number, width = 6, height = 6, elevation = 6): TerrainFeature {
  return rectangle(id, 'Ruins', 'ruins', { x, y }, [width, height], elevation, {
    coverLight: true,
    obscuring: true,
    breachable: true
  });
}

export function createWoods(id: string, x: number, y: number, radius = 3): TerrainFeature {
  return {
    id,
    name: 'Woods',
    type: 'woods',
    x,
    y,
    width: radius * 2,
    height: radius * 2,
    elevation: 2,
    shape: 'circle',
    radius,
    traits: { coverLight: true, denseCover: true, difficultGround: true }
  };
}

/** Impassable block, 6" by 3" lying along x unless turned */
export function createContainer(id: string, x: number, y: number, alongX = true): TerrainFeature {
  return {
    ...rectangle(id, 'Container', 'container', { x, y }, alongX ? [6, 3] : [3, 6], 3, {
      coverHeavy: true,
      obscuring: true
    }),
    impassable: true
  };
}

/** A 1" thick wall */
export function createBarricade(id: string, x: number, y: number, length = 6, alongX = true): TerrainFeature {
  return rectangle(id, 'Barricade', 'barricade', { x, y }, alongX ? [length, 1] : [1, length], 2, { coverLight: true });
}
