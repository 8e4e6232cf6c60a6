import { onceWarn } from '../utils/warnings';
import { ConfigurationError } from './maze.errors';
import { createGrid } from './maze.grid';
import { pick, randomInt } from './maze.rng';
import { CellState, type Grid, type Position, type RandomSource } from './maze.types';

/** Tuning for {@link generateDensityMaze}. */
export interface DensityMazeOptions {
  /** Grid rows including the border; odd. */
  height: number;
  /** Grid columns including the border; odd. */
  width: number;
  /** Length of each wall-growing pass, as a fraction of `5 * (height + width)`. Default 0.75. */
  complexity?: number;
  /** Number of passes, as a fraction of the lattice node count. Default 0.75. */
  density?: number;
}

function assertOdd(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value % 2 === 0) {
    throw new ConfigurationError(`Maze ${name} must be a positive odd integer, got ${value}`);
  }
}

function assertUnit(name: string, value: number): void {
  if (!(value >= 0 && value <= 1)) {
    throw new ConfigurationError(`Maze ${name} must lie in [0, 1], got ${value}`);
  }
}

/**
 * Legacy density/complexity maze generator.
 *
 * Starts from an open floor with a Wall border, then runs `density` passes: each
 * pass drops a wall on a random even-coordinate node and grows it for up to
 * `complexity` two-cell strides into untouched nodes. Odd/odd cells are never
 * walled, but the result is NOT guaranteed to be a perfect maze: it may contain
 * loops. Prefer `generateWilsonMaze` when a spanning tree is required.
 */
export function generateDensityMaze(options: DensityMazeOptions, rng: RandomSource): Grid {
  const { height, width, complexity = 0.75, density = 0.75 } = options;
  assertOdd('height', height);
  assertOdd('width', width);
  assertUnit('complexity', complexity);
  assertUnit('density', density);
  onceWarn(
    'density-maze',
    'generateDensityMaze does not guarantee a perfect maze; use generateWilsonMaze for a spanning tree.'
  );

  // Scale the unit parameters to the grid size.
  const passLength = Math.floor(complexity * (5 * (height + width)));
  const passCount = Math.floor(density * (Math.floor(height / 2) * Math.floor(width / 2)));

  const grid = createGrid(height, width, CellState.Floor);
  grid[0].fill(CellState.Wall);
  grid[height - 1].fill(CellState.Wall);
  for (const row of grid) {
    row[0] = CellState.Wall;
    row[width - 1] = CellState.Wall;
  }

  const neighbours: Position[] = [];
  for (let pass = 0; pass < passCount; pass++) {
    let x = randomInt(rng, Math.floor(width / 2) + 1) * 2;
    let y = randomInt(rng, Math.floor(height / 2) + 1) * 2;
    grid[y][x] = CellState.Wall;
    for (let stride = 0; stride < passLength; stride++) {
      neighbours.length = 0;
      if (x > 1) neighbours.push([y, x - 2]);
      if (x < width - 2) neighbours.push([y, x + 2]);
      if (y > 1) neighbours.push([y - 2, x]);
      if (y < height - 2) neighbours.push([y + 2, x]);
      if (neighbours.length === 0) continue;
      const [ny, nx] = pick(rng, neighbours);
      if (grid[ny][nx] === CellState.Floor) {
        grid[ny][nx] = CellState.Wall;
        grid[ny + (y - ny) / 2][nx + (x - nx) / 2] = CellState.Wall;
        x = nx;
        y = ny;
      }
    }
  }

  return grid;
}
