import { describe, it, expect } from 'vitest';
import {
  checkLineOfSight,
  createBarricade,
  createContainer,
  createRuins,
  createWoods,
  getTerrainBounds,
  getTerrainCover,
  isMovementBlocked,
  movementCost,
  pointInTerrain,
  verticalTraversalCost,
  type MoverTraits
} from '../src/simulation/terrain';

const INFANTRY: MoverTraits = { infantry: true, ignoresElevation: false };
const VEHICLE: MoverTraits = { infantry: false, ignoresElevation: false };
const FLYER: MoverTraits = { infantry: false, ignoresElevation: true };

const WEST = { x: 4, y: 10 };
const EAST = { x: 16, y: 10 };
const CENTRE = { x: 10, y: 10 };

describe('Terrain System', () => {
  describe('Geometry', () => {
    it('should compute rectangle bounds around the centre', () => {
      expect(getTerrainBounds(createRuins('r1', 10, 10))).toEqual({ minX: 7, minY: 7, maxX: 13, maxY: 13 });
    });

    it('should detect points inside circles', () => {
      const woods = createWoods('w1', 10, 10);
      expect(pointInTerrain({ x: 12, y: 10 }, woods)).toBe(true);
      expect(pointInTerrain({ x: 13, y: 13 }, woods)).toBe(false);
    });
  });

  describe('Vertical movement', () => {
    const ruins = [createRuins('r1', 10, 10)];

    it('should charge the climb up and down when crossing', () => {
      expect(verticalTraversalCost(WEST, EAST, ruins, 2, false)).toBe(12);
    });

    it('should charge half when only entering', () => {
      expect(verticalTraversalCost(WEST, CENTRE, ruins, 2, false)).toBe(6);
    });

    it('should charge nothing when moving within the feature', () => {
      expect(verticalTraversalCost(CENTRE, { x: 11, y: 11 }, ruins, 2, false)).toBe(0);
    });

    it('should charge nothing for movers that ignore elevation', () => {
      expect(verticalTraversalCost(WEST, EAST, ruins, 2, true)).toBe(0);
    });

    it('should ignore features no taller than the threshold', () => {
      expect(verticalTraversalCost(WEST, EAST, [createBarricade('b1', 10, 10)], 2, false)).toBe(0);
    });
  });

  describe('movementCost', () => {
    it('should add climbing to the horizontal distance', () => {
      expect(movementCost(WEST, EAST, [createRuins('r1', 10, 10)], 2, INFANTRY)).toBe(24);
    });

    it('should add the difficult ground penalty', () => {
      expect(movementCost(WEST, EAST, [createWoods('w1', 10, 10)], 2, INFANTRY)).toBe(14);
    });

    it('should cost nothing to stay in place', () => {
      expect(movementCost(CENTRE, CENTRE, [createRuins('r1', 10, 10)], 2, INFANTRY)).toBe(0);
    });
  });

  describe('isMovementBlocked', () => {
    const ruins = createRuins('r1', 10, 10);

    it('should let infantry through ruins', () => {
      expect(isMovementBlocked(WEST, EAST, [ruins], INFANTRY)).toEqual({ blocked: false });
    });

    it('should block other units at ruin walls', () => {
      expect(isMovementBlocked(WEST, EAST, [ruins], VEHICLE)).toEqual({ blocked: true, blockedBy: ruins });
    });

    it('should let flyers over ruins', () => {
      expect(isMovementBlocked(WEST, EAST, [ruins], FLYER).blocked).toBe(false);
    });

    it('should block everything at impassable terrain', () => {
      const container = createContainer('c1', 10, 10);
      expect(isMovementBlocked(WEST, EAST, [container], FLYER)).toEqual({ blocked: true, blockedBy: container });
    });
  });

  describe('Line of sight', () => {
    it('should be blocked through obscuring terrain', () => {
      expect(checkLineOfSight(WEST, EAST, [createRuins('r1', 10, 10)]).hasLoS).toBe(false);
    });

    it('should not be blocked from inside the feature', () => {
      expect(checkLineOfSight(CENTRE, { x: 30, y: 10 }, [createRuins('r1', 10, 10)]).hasLoS).toBe(true);
    });

    it('should not be blocked by woods', () => {
      expect(checkLineOfSight(WEST, EAST, [createWoods('w1', 10, 10)]).hasLoS).toBe(true);
    });
  });

  describe('Cover', () => {
    it('should give cover to a target inside ruins', () => {
      expect(getTerrainCover(CENTRE, { x: 20, y: 10 }, [createRuins('r1', 10, 10)]))
        .toEqual({ hasCover: true, denseCover: false });
    });

    it('should give dense cover to a target behind woods', () => {
      expect(getTerrainCover({ x: 15, y: 10 }, WEST, [createWoods('w1', 10, 10)]))
        .toEqual({ hasCover: true, denseCover: true });
    });

    it('should not apply dense cover to a target inside the woods', () => {
      expect(getTerrainCover(CENTRE, WEST, [createWoods('w1', 10, 10)]))
        .toEqual({ hasCover: true, denseCover: false });
    });

    it('should give no cover in the open', () => {
      expect(getTerrainCover({ x: 30, y: 30 }, WEST, [createRuins('r1', 10, 10)]))
        .toEqual({ hasCover: false, denseCover: false });
    });
  });
});
