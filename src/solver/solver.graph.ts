import { ConfigurationError } from '../maze/maze.errors';
import { isRectangular } from '../maze/maze.grid';
import type { Displacement, Position } from '../maze/maze.types';

/**
 * Directed move graph over the passable cells of a grid, in compressed sparse row
 * form. Node ids are flat indices `row * width + col`; the out-edges of node `i`
 * are `targets[offsets[i] .. offsets[i + 1])`. Every edge has weight 1.
 */
export interface MoveGraph {
  readonly height: number;
  readonly width: number;
  readonly offsets: Int32Array;
  readonly targets: Int32Array;
}

/** Flat node id of a `[row, col]` position. */
export function toIndex(graph: Pick<MoveGraph, 'width'>, position: Position): number {
  return position[0] * graph.width + position[1];
}

/** `[row, col]` position of a flat node id. */
export function toPosition(graph: Pick<MoveGraph, 'width'>, index: number): [number, number] {
  const row = Math.floor(index / graph.width);
  return [row, index - row * graph.width];
}

/**
 * Build the move graph of `impassable`.
 *
 * One edge joins each passable cell to every in-bounds passable cell reachable by a
 * single move of `moves`. Impassable cells keep an empty edge list.
 *
 * @param impassable - `true` marks a wall; must be rectangular.
 * @throws ConfigurationError when the rows differ in length.
 * @param moves - Legal displacements, `[dRow, dCol]`.
 */
export function buildMoveGraph(
  impassable: ReadonlyArray<ReadonlyArray<boolean>>,
  moves: readonly Displacement[]
): MoveGraph {
  if (!isRectangular(impassable)) {
    throw new ConfigurationError('Impassable map must be rectangular');
  }
  const height = impassable.length;
  const width = height > 0 ? impassable[0].length : 0;
  const offsets = new Int32Array(height * width + 1);
  const targets: number[] = [];

  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      const node = row * width + col;
      if (!impassable[row][col]) {
        for (const [dr, dc] of moves) {
          const nr = row + dr;
          const nc = col + dc;
          if (nr < 0 || nr >= height || nc < 0 || nc >= width) continue;
          if (impassable[nr][nc]) continue;
          targets.push(nr * width + nc);
        }
      }
      offsets[node + 1] = targets.length;
    }
  }

  return { height, width, offsets, targets: Int32Array.from(targets) };
}

/** Number of edges in the graph. */
export function edgeCount(graph: MoveGraph): number {
  return graph.targets.length;
}
