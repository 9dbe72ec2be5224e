import { distance } from './hitTest';
import type { Cloth, ClothConfig, Constraint, Particle, Vec2 } from './types';

export type GridLayout = Pick<ClothConfig, 'rows' | 'cols' | 'spacing' | 'origin'>;

export function particleIndex(cols: number, row: number, col: number): number {
  return row * cols + col;
}

export function particleAt(cloth: Cloth, row: number, col: number): Particle | null {
  if (row < 0 || row >= cloth.rows || col < 0 || col >= cloth.cols) {
    return null;
  }
  return cloth.particles[particleIndex(cloth.cols, row, col)] ?? null;
}

export function createParticle(pos: Vec2, pinned = false): Particle {
  return {
    position: { x: pos.x, y: pos.y },
    previousPosition: { x: pos.x, y: pos.y },
    pinned
  };
}

export function createConstraint(particles: Particle[], a: number, b: number): Constraint {
  return {
    a,
    b,
    restLength: distance(particles[a].position, particles[b].position)
  };
}

export function expectedConstraintCount(rows: number, cols: number): number {
  if (rows <= 0 || cols <= 0) {
    return 0;
  }
  return rows * (cols - 1) + (rows - 1) * cols + 2 * (rows - 1) * (cols - 1);
}

/**
 * Lays out a `rows x cols` grid with row 0 pinned and links every cell to its
 * right, lower, lower-right and lower-left neighbours, in that order. The
 * relaxation is order sensitive, so the append order is part of the contract.
 */
export function buildCloth(layout: GridLayout): Cloth {
  const { rows, cols, spacing, origin } = layout;
  const particles: Particle[] = [];

  for (let row = 0; row < rows; row += 1) {
    for (let col = 0; col < cols; col += 1) {
      particles.push(
        createParticle(
          {
            x: origin.x + col * spacing,
            y: origin.y + row * spacing
          },
          row === 0
        )
      );
    }
  }

  const constraints: Constraint[] = [];
  const link = (row: number, col: number, otherRow: number, otherCol: number): void => {
    constraints.push(
      createConstraint(
        particles,
        particleIndex(cols, row, col),
        particleIndex(cols, otherRow, otherCol)
      )
    );
  };

  for (let row = 0; row < rows; row += 1) {
    for (let col = 0; col < cols; col += 1) {
      const hasRight = col < cols - 1;
      const hasBelow = row < rows - 1;

      if (hasRight) {
        link(row, col, row, col + 1);
      }
      if (hasBelow) {
        link(row, col, row + 1, col);
      }
      if (hasBelow && hasRight) {
        link(row, col, row + 1, col + 1);
      }
      if (hasBelow && col > 0) {
        link(row, col, row + 1, col - 1);
      }
    }
  }

  return { rows, cols, particles, constraints };
}
