import { ConfigurationError } from './maze.errors';
import { CellState, type Grid, type MazeLayout, type Position } from './maze.types';

/** Shape of a grid as `[height, width]`. An empty grid is `[0, 0]`. */
export function gridShape(grid: ReadonlyArray<ReadonlyArray<unknown>>): [number, number] {
  return [grid.length, grid.length > 0 ? grid[0].length : 0];
}

/** Deep copy of a grid. */
export function cloneGrid(grid: ReadonlyArray<ReadonlyArray<CellState>>): Grid {
  return grid.map((row) => row.slice());
}

/** `height × width` grid filled with `fill`. */
export function createGrid(height: number, width: number, fill: CellState): Grid {
  const grid: Grid = [];
  for (let r = 0; r < height; r++) grid.push(new Array<CellState>(width).fill(fill));
  return grid;
}

/** True when every row has the same length as the first. */
export function isRectangular(grid: ReadonlyArray<ReadonlyArray<unknown>>): boolean {
  const width = grid.length > 0 ? grid[0].length : 0;
  return grid.every((row) => row.length === width);
}

/** True when `position` lies inside a `height × width` grid. */
export function inBounds(position: Position, height: number, width: number): boolean {
  const [row, col] = position;
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    row < height &&
    col >= 0 &&
    col < width
  );
}

/** True when `position` is inside the grid and not a wall. */
export function isFloor(grid: ReadonlyArray<ReadonlyArray<CellState>>, position: Position): boolean {
  const [height, width] = gridShape(grid);
  return inBounds(position, height, width) && grid[position[0]][position[1]] === CellState.Floor;
}

/** Wrap a grid in a one-cell Wall border. */
export function addBorder(grid: ReadonlyArray<ReadonlyArray<CellState>>): Grid {
  const [, width] = gridShape(grid);
  const wallRow = (): CellState[] => new Array<CellState>(width + 2).fill(CellState.Wall);
  return [wallRow(), ...grid.map((row) => [CellState.Wall, ...row, CellState.Wall]), wallRow()];
}

/** Count the cells in `grid` equal to `state`. */
export function countCells(grid: ReadonlyArray<ReadonlyArray<CellState>>, state: CellState): number {
  let count = 0;
  for (const row of grid) for (const cell of row) if (cell === state) count++;
  return count;
}

/**
 * Build a layout from ASCII rows.
 *
 * `#` is a wall; `.` and space are floor; `S` marks the agent start and `G` the
 * target (both floor). Exactly one `S` and one `G` are required.
 *
 * @example
 * parseLayout([
 *   '#####',
 *   '#S.G#',
 *   '#####',
 * ]);
 */
export function parseLayout(rows: readonly string[]): MazeLayout {
  if (rows.length === 0) throw new ConfigurationError('Layout has no rows');
  const width = rows[0].length;
  const grid: Grid = [];
  let agent: Position | undefined;
  let target: Position | undefined;

  for (let row = 0; row < rows.length; row++) {
    const line = rows[row];
    if (line.length !== width) {
      throw new ConfigurationError(
        `Layout row ${row} has length ${line.length}, expected ${width}`
      );
    }
    const cells: CellState[] = [];
    for (let col = 0; col < line.length; col++) {
      const ch = line[col];
      switch (ch) {
        case '#':
          cells.push(CellState.Wall);
          break;
        case '.':
        case ' ':
          cells.push(CellState.Floor);
          break;
        case 'S':
          if (agent) throw new ConfigurationError('Layout has more than one start cell');
          agent = [row, col];
          cells.push(CellState.Floor);
          break;
        case 'G':
          if (target) throw new ConfigurationError('Layout has more than one target cell');
          target = [row, col];
          cells.push(CellState.Floor);
          break;
        default:
          throw new ConfigurationError(`Unknown layout character '${ch}' at (${row}, ${col})`);
      }
    }
    grid.push(cells);
  }

  if (!agent) throw new ConfigurationError('Layout has no start cell (S)');
  if (!target) throw new ConfigurationError('Layout has no target cell (G)');
  return { grid, agent, target };
}
