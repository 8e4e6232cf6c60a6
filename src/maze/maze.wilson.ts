import { ConfigurationError, GeneratorConsistencyError } from './maze.errors';
import { addBorder, createGrid } from './maze.grid';
import { pick, randomInt } from './maze.rng';
import { CellState, type Displacement, type Grid, type RandomSource } from './maze.types';

/**
 * Perfect-maze generation with Wilson's loop-erased random walk.
 *
 * The maze graph has one vertex per lattice node (cells whose row AND column are
 * even); the cell between two horizontally or vertically adjacent nodes is the edge
 * joining them. Wilson's algorithm samples a spanning tree of that graph uniformly,
 * so the carved cells are connected and acyclic:
 *
 *  1. Put one random node in the tree.
 *  2. From a random node outside the tree, random-walk in two-cell strides until the
 *     walk touches the tree, remembering per node only the direction taken on the
 *     LAST visit. Overwriting on revisit is the loop erasure.
 *  3. Replay the walk from its start following the remembered directions, adding
 *     every node and crossed edge cell to the tree.
 *  4. Repeat until no node is left outside.
 *
 * @module maze.wilson
 */

/** Unit displacements a walk may take; strides are twice these. */
const WALK_DIRECTIONS: readonly Displacement[] = [
  [0, 1],
  [1, 0],
  [0, -1],
  [-1, 0],
];

/** Round to the odd number `2 * floor(n / 2) + 1`. */
export function roundToOdd(n: number): number {
  return 2 * Math.floor(n / 2) + 1;
}

/** Number of lattice nodes in a carved `height × width` lattice (dimensions rounded to odd). */
export function latticeNodeCount(height: number, width: number): number {
  return ((roundToOdd(height) + 1) / 2) * ((roundToOdd(width) + 1) / 2);
}

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`Maze ${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Carve a perfect maze over an odd lattice without any border.
 *
 * Both dimensions are rounded to odd with {@link roundToOdd}; carved cells are
 * `CellState.Floor`, everything else stays `CellState.Wall`.
 *
 * @param height - Lattice rows (positive integer).
 * @param width - Lattice columns (positive integer).
 * @param rng - Random source; the same sequence always yields the same maze.
 */
export function carveWilsonLattice(height: number, width: number, rng: RandomSource): Grid {
  assertDimension('height', height);
  assertDimension('width', width);
  const rows = roundToOdd(height);
  const cols = roundToOdd(width);
  const grid = createGrid(rows, cols, CellState.Wall);

  // Step 0: flat-index bookkeeping. `slot` maps a node to its position in
  // `unvisited` (-1 once it joins the tree) so removal is O(1).
  const cellCount = rows * cols;
  const inTree = new Uint8Array(cellCount);
  const slot = new Int32Array(cellCount).fill(-1);
  const unvisited: number[] = [];
  for (let r = 0; r < rows; r += 2) {
    for (let c = 0; c < cols; c += 2) {
      const index = r * cols + c;
      slot[index] = unvisited.length;
      unvisited.push(index);
    }
  }

  const carve = (index: number): void => {
    const r = (index / cols) | 0;
    grid[r][index - r * cols] = CellState.Floor;
  };
  const addToTree = (index: number): void => {
    const position = slot[index];
    const last = unvisited[unvisited.length - 1];
    unvisited[position] = last;
    slot[last] = position;
    unvisited.pop();
    slot[index] = -1;
    inTree[index] = 1;
    carve(index);
  };
  const advance = (index: number, direction: number, stride: number): number => {
    const [dr, dc] = WALK_DIRECTIONS[direction];
    return index + stride * (dr * cols + dc);
  };

  // Step 1: seed the tree.
  addToTree(unvisited[randomInt(rng, unvisited.length)]);

  // node -> direction taken on the most recent visit during the current walk
  const path = new Map<number, number>();
  const options: number[] = [];

  while (unvisited.length > 0) {
    // Step 2: loop-erased random walk until the tree is hit.
    path.clear();
    const first = unvisited[randomInt(rng, unvisited.length)];
    let current = first;
    while (!inTree[current]) {
      const r = (current / cols) | 0;
      const c = current - r * cols;
      options.length = 0;
      for (let d = 0; d < WALK_DIRECTIONS.length; d++) {
        const [dr, dc] = WALK_DIRECTIONS[d];
        const nr = r + 2 * dr;
        const nc = c + 2 * dc;
        if (nr >= 0 && nr < rows && nc >= 0 && nc < cols) options.push(d);
      }
      const direction = pick(rng, options);
      path.set(current, direction);
      current = advance(current, direction, 2);
    }

    // Step 3: replay the erased walk, carving nodes and the edges between them.
    current = first;
    while (!inTree[current]) {
      const direction = path.get(current);
      if (direction === undefined) {
        throw new GeneratorConsistencyError(
          `Loop-erased walk has no recorded direction at cell ${current}`
        );
      }
      addToTree(current);
      carve(advance(current, direction, 1));
      current = advance(current, direction, 2);
    }
  }

  return grid;
}

/**
 * Generate a bordered perfect maze.
 *
 * The lattice from {@link carveWilsonLattice} is wrapped in a Wall border, so the
 * result is `(roundToOdd(height) + 2) × (roundToOdd(width) + 2)` and lattice nodes sit
 * at odd coordinates; `(1, 1)` and the opposite inner corner are always Floor.
 *
 * @example
 * const grid = generateWilsonMaze(9, 9, createRng(0)); // 11 × 11
 */
export function generateWilsonMaze(height: number, width: number, rng: RandomSource): Grid {
  return addBorder(carveWilsonLattice(height, width, rng));
}
