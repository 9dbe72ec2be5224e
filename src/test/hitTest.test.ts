import { describe, expect, it } from 'vitest';

import { distance, distanceSq, findNearestParticle } from '../model/hitTest';
import { buildCloth } from '../model/topology';

function smallCloth() {
  return buildCloth({ rows: 3, cols: 3, spacing: 20, origin: { x: 100, y: 50 } });
}

describe('findNearestParticle', () => {
  it('returns the closest particle inside the radius', () => {
    expect(findNearestParticle(smallCloth().particles, { x: 121, y: 72 }, 20)).toBe(4);
  });

  it('keeps the first particle in row-major order on a tie', () => {
    expect(findNearestParticle(smallCloth().particles, { x: 110, y: 70 }, 20)).toBe(3);
  });

  it('returns null when the nearest particle is pinned, even with a free one in range', () => {
    const particles = smallCloth().particles;

    expect(findNearestParticle(particles, { x: 100, y: 59 }, 20)).toBeNull();
    expect(findNearestParticle(particles, { x: 100, y: 61 }, 20)).toBe(3);
  });

  it('excludes particles at exactly the radius', () => {
    const particles = smallCloth().particles;

    expect(findNearestParticle(particles, { x: 100, y: 110 }, 20)).toBeNull();
    expect(findNearestParticle(particles, { x: 100, y: 110 }, 20.5)).toBe(6);
  });

  it('selects nothing for a negative or NaN radius', () => {
    const particles = smallCloth().particles;

    expect(findNearestParticle(particles, { x: 121, y: 72 }, -20)).toBeNull();
    expect(findNearestParticle(particles, { x: 500, y: 500 }, Number.NaN)).toBeNull();
    expect(findNearestParticle(particles, { x: 120, y: 70 }, 0)).toBeNull();
  });

  it('returns null when nothing is in range', () => {
    expect(findNearestParticle(smallCloth().particles, { x: 500, y: 500 })).toBeNull();
    expect(findNearestParticle([], { x: 0, y: 0 })).toBeNull();
  });
});

describe('distance helpers', () => {
  it('measures euclidean distance and its square', () => {
    expect(distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
    expect(distanceSq({ x: 1, y: 1 }, { x: 4, y: 5 })).toBe(25);
  });
});
