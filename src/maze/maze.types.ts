/**
 * Shared shapes for grids, positions and moves.
 *
 * Coordinates are always `[row, col]`, 0-indexed from the top-left cell.
 *
 * @module maze.types
 */

/** Cell states of a grid. Floor is passable, Wall is not. */
export const CellState = {
  Floor: 0,
  Wall: 1,
} as const;
export type CellState = (typeof CellState)[keyof typeof CellState];

/** Rectangular array of cells, indexed `grid[row][col]`. */
export type Grid = CellState[][];

/** Integer `[row, col]` pair. */
export type Position = readonly [number, number];

/** Integer `[dRow, dCol]` displacement. */
export type Displacement = readonly [number, number];

/** The four discrete action symbols. */
export type Action = 0 | 1 | 2 | 3;

/**
 * Fixed action → displacement table, indexed by action symbol.
 *
 *  - 0: right `[0, 1]`
 *  - 1: up    `[-1, 0]`
 *  - 2: left  `[0, -1]`
 *  - 3: down  `[1, 0]`
 */
export const MOVES: readonly Displacement[] = Object.freeze([
  [0, 1],
  [-1, 0],
  [0, -1],
  [1, 0],
] as const);

/** Narrow an arbitrary value to an {@link Action}. */
export function isAction(value: unknown): value is Action {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

/** A grid together with the agent start and target cells, as produced by a maze strategy. */
export interface MazeLayout {
  grid: Grid;
  agent: Position;
  target: Position;
}

/**
 * Anything that yields uniformly distributed numbers in `[0, 1)`.
 * A `seedrandom` PRNG satisfies this; so does `Math.random` or a test stub.
 */
export type RandomSource = () => number;

/** Maze-producing strategy consumed by the simulator on every reset. */
export type MazeStrategy = (rng: RandomSource) => MazeLayout;
