import { generateDensityMaze } from '../maze/maze.density';
import { ConfigurationError } from '../maze/maze.errors';
import { cloneGrid } from '../maze/maze.grid';
import type { MazeLayout, MazeStrategy, Position } from '../maze/maze.types';
import { generateWilsonMaze } from '../maze/maze.wilson';

/** Bordered grid size shared by the random strategies. */
export interface MazeSize {
  /** Grid columns including the border; odd, at least 3. */
  width: number;
  /** Grid rows including the border; odd, at least 3. */
  height: number;
}

/** Density generator tuning on top of {@link MazeSize}. */
export interface DensityMazeSize extends MazeSize {
  complexity?: number;
  density?: number;
}

function assertSize({ width, height }: MazeSize): void {
  for (const [name, value] of [
    ['width', width],
    ['height', height],
  ] as const) {
    if (!Number.isInteger(value) || value < 3 || value % 2 === 0) {
      throw new ConfigurationError(`Maze ${name} must be an odd integer >= 3, got ${value}`);
    }
  }
}

// Random mazes start top-left and aim for the opposite inner corner.
function cornerLayout(grid: MazeLayout['grid']): MazeLayout {
  const target: Position = [grid.length - 2, grid[0].length - 2];
  return { grid, agent: [1, 1], target };
}

/**
 * Perfect random maze per reset (Wilson's algorithm), agent at `(1, 1)`, target at
 * `(height - 2, width - 2)`.
 */
export function wilsonMazeStrategy(size: MazeSize): MazeStrategy {
  assertSize(size);
  return (rng) => cornerLayout(generateWilsonMaze(size.height - 2, size.width - 2, rng));
}

/**
 * Legacy density/complexity maze per reset, same endpoints as
 * {@link wilsonMazeStrategy}. Not guaranteed to be a perfect maze.
 */
export function densityMazeStrategy(size: DensityMazeSize): MazeStrategy {
  assertSize(size);
  return (rng) => cornerLayout(generateDensityMaze(size, rng));
}

/** Hand-authored layout returned (as a fresh copy) on every reset; ignores the RNG. */
export function fixedLayoutStrategy(layout: MazeLayout): MazeStrategy {
  const snapshot: MazeLayout = {
    grid: cloneGrid(layout.grid),
    agent: [layout.agent[0], layout.agent[1]],
    target: [layout.target[0], layout.target[1]],
  };
  return () => ({
    grid: cloneGrid(snapshot.grid),
    agent: snapshot.agent,
    target: snapshot.target,
  });
}
