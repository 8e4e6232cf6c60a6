import {
  ConfigurationError,
  SolverConsistencyError,
  UnreachableGoalError,
} from '../maze/maze.errors';
import { gridShape, inBounds, isRectangular } from '../maze/maze.grid';
import {
  CellState,
  MOVES,
  isAction,
  type Action,
  type Displacement,
  type Position,
} from '../maze/maze.types';
import { buildMoveGraph, toIndex, toPosition, type MoveGraph } from './solver.graph';
import { NO_PREDECESSOR, shortestPathTree } from './solver.search';

/**
 * Convert a cell grid to the boolean array the solver consumes (`true` = wall).
 */
export function impassableFromGrid(grid: ReadonlyArray<ReadonlyArray<CellState>>): boolean[][] {
  return grid.map((row) => row.map((cell) => cell === CellState.Wall));
}

/**
 * Walk predecessor links back from `goal` to `start` and translate each hop into
 * the action whose displacement matches it exactly.
 *
 * @returns Actions in start → goal order, or `null` when `goal` was never reached.
 * @throws SolverConsistencyError when a hop matches no entry of `moves`, which means
 *   the graph was built from a different move table.
 */
export function actionsFromPredecessors(
  graph: MoveGraph,
  moves: readonly Displacement[],
  predecessors: Int32Array,
  start: number,
  goal: number
): Action[] | null {
  const actions: Action[] = [];
  let cursor = goal;
  while (cursor !== start) {
    const previous = predecessors[cursor];
    if (previous === NO_PREDECESSOR) return null;
    const [row, col] = toPosition(graph, cursor);
    const [prevRow, prevCol] = toPosition(graph, previous);
    const dr = row - prevRow;
    const dc = col - prevCol;
    const action = moves.findIndex(([mr, mc]) => mr === dr && mc === dc);
    if (!isAction(action)) {
      throw new SolverConsistencyError(
        `No action moves from (${prevRow}, ${prevCol}) to (${row}, ${col}); ` +
          `displacement [${dr}, ${dc}] is missing from the move table`
      );
    }
    actions.push(action);
    cursor = previous;
  }
  return actions.reverse();
}

/**
 * Shortest action sequence leading from `start` to `goal`.
 *
 * Builds the explicit move graph of the passable cells, runs a uniform-cost search
 * from `start` and backtracks the predecessors. The number of actions equals the
 * graph distance between the two cells.
 *
 * @param impassable - `true` marks a wall; see {@link impassableFromGrid}.
 * @param moves - Move table indexed by action symbol, four entries (usually {@link MOVES}).
 * @param start - Agent cell.
 * @param goal - Target cell.
 * @returns The actions, `[]` when start equals goal, or `null` when no path exists.
 *
 * @example
 * const actions = solveMaze(impassableFromGrid(sim.grid), sim.moves, info.agent, info.target);
 * for (const action of actions ?? []) sim.step(action);
 */
export function solveMaze(
  impassable: ReadonlyArray<ReadonlyArray<boolean>>,
  moves: readonly Displacement[],
  start: Position,
  goal: Position
): Action[] | null {
  if (!isRectangular(impassable)) {
    throw new ConfigurationError('Solver grid must be rectangular');
  }
  if (moves.length !== MOVES.length) {
    throw new ConfigurationError(
      `Move table must hold ${MOVES.length} displacements, got ${moves.length}`
    );
  }
  const [height, width] = gridShape(impassable);
  for (const [name, position] of [
    ['start', start],
    ['goal', goal],
  ] as const) {
    if (!inBounds(position, height, width)) {
      throw new ConfigurationError(
        `Solver ${name} (${position[0]}, ${position[1]}) lies outside the ${height}x${width} grid`
      );
    }
  }

  const graph = buildMoveGraph(impassable, moves);
  const source = toIndex(graph, start);
  const target = toIndex(graph, goal);
  if (source === target) return [];
  const { predecessors } = shortestPathTree(graph, source, target);
  return actionsFromPredecessors(graph, moves, predecessors, source, target);
}

/**
 * Same as {@link solveMaze} but throws {@link UnreachableGoalError} instead of
 * returning `null`.
 */
export function solveMazeOrThrow(
  impassable: ReadonlyArray<ReadonlyArray<boolean>>,
  moves: readonly Displacement[],
  start: Position,
  goal: Position
): Action[] {
  const actions = solveMaze(impassable, moves, start, goal);
  if (actions === null) throw new UnreachableGoalError(start, goal);
  return actions;
}
