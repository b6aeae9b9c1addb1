import { describe, it, expect } from 'vitest';
import {
  baseRadius,
  checkCoherency,
  edgeDistance,
  engagedEnemies,
  inBaseContact,
  isEngaged,
  type PlacedModel
} from '../src/simulation/distance';
import { CONTACT, makeState, makeUnit, row } from './fixtures';

const RADIUS = baseRadius({ base_mm: 32 });

function placed(points: { x: number; y: number }[]): PlacedModel[] {
  return points.map((position, idx) => ({ id: `u-m${idx + 1}`, position, radius: RADIUS }));
}

describe('Distances', () => {
  it('should measure between base edges', () => {
    const [a, b] = placed([{ x: 0, y: 0 }, { x: 3, y: 0 }]);
    expect(edgeDistance(a, b)).toBeCloseTo(3 - 2 * RADIUS, 6);
    expect(edgeDistance(a, b)).toBeCloseTo(1.74, 2);
  });

  it('should treat touching bases as in contact', () => {
    const [a, b] = placed([{ x: 0, y: 0 }, { x: CONTACT, y: 0 }]);
    expect(edgeDistance(a, b)).toBeCloseTo(0, 6);
    expect(inBaseContact(a, b)).toBe(true);
  });
});

describe('Coherency', () => {
  it('should accept two models close together', () => {
    expect(checkCoherency(placed(row(10, 10, 2)), 2)).toEqual({ coherent: true, errors: [] });
  });

  it('should flag a model too far from the rest', () => {
    const result = checkCoherency(placed([...row(10, 10, 2), { x: 16, y: 10 }]), 2);
    expect(result).toEqual({ coherent: false, errors: ['Model u-m3 is not within 2" of another model'] });
  });

  it('should require two neighbours in units of seven or more', () => {
    const result = checkCoherency(placed(row(10, 10, 7, 2.5)), 2);
    expect(result.errors).toEqual([
      'Model u-m1 is not within 2" of two other models',
      'Model u-m7 is not within 2" of two other models'
    ]);
  });

  it('should reject a unit split into two groups', () => {
    const result = checkCoherency(placed([...row(10, 10, 2), ...row(30, 10, 2)]), 2);
    expect(result.errors).toEqual(['Unit is split into separate groups']);
  });

  it('should accept a single model', () => {
    expect(checkCoherency(placed([{ x: 1, y: 1 }]), 2).coherent).toBe(true);
  });
});

describe('Engagement', () => {
  it('should find enemies within engagement range', () => {
    const alpha = makeUnit('alpha', { at: [{ x: 10, y: 10 }] });
    const bravo = makeUnit('bravo', { owner: 2, at: [{ x: 12, y: 10 }] });
    const state = makeState([alpha, bravo]);

    expect(engagedEnemies(state, alpha, 1).map(u => u.id)).toEqual(['bravo']);
  });

  it('should ignore enemies further away and friendly units', () => {
    const alpha = makeUnit('alpha', { at: [{ x: 10, y: 10 }] });
    const bravo = makeUnit('bravo', { owner: 2, at: [{ x: 13, y: 10 }] });
    const friend = makeUnit('friend', { at: [{ x: 11.5, y: 10 }] });
    const state = makeState([alpha, bravo, friend]);

    expect(isEngaged(state, alpha, 1)).toBe(false);
  });

  it('should ignore units that are not on the table', () => {
    const alpha = makeUnit('alpha', { at: [{ x: 10, y: 10 }] });
    const bravo = makeUnit('bravo', { owner: 2, at: [{ x: 11.5, y: 10 }], status: 'DESTROYED' });
    expect(isEngaged(makeState([alpha, bravo]), alpha, 1)).toBe(false);
  });
});
