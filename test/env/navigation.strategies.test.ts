import {
  densityMazeStrategy,
  fixedLayoutStrategy,
  wilsonMazeStrategy,
} from '../../src/env/navigation.strategies';
import { ConfigurationError } from '../../src/maze/maze.errors';
import { parseLayout } from '../../src/maze/maze.grid';
import { createRng } from '../../src/maze/maze.rng';
import { CellState } from '../../src/maze/maze.types';
import { isPerfectMaze } from '../utils/maze-helpers';

describe('Maze strategies', () => {
  describe('wilsonMazeStrategy()', () => {
    const layout = wilsonMazeStrategy({ width: 13, height: 9 })(createRng(0));

    it('produces the configured shape', () => {
      expect([layout.grid.length, layout.grid[0].length]).toEqual([9, 13]);
    });
    it('starts the agent at (1, 1)', () => {
      expect(layout.agent).toEqual([1, 1]);
    });
    it('places the target in the opposite inner corner', () => {
      expect(layout.target).toEqual([7, 11]);
    });
    it('produces a perfect maze', () => {
      expect(isPerfectMaze(layout.grid)).toBe(true);
    });
    it('produces a single open cell for the smallest maze', () => {
      expect(wilsonMazeStrategy({ width: 3, height: 3 })(createRng(0)).grid[1][1]).toBe(
        CellState.Floor
      );
    });
    it('rejects even sizes', () => {
      expect(() => wilsonMazeStrategy({ width: 12, height: 9 })).toThrow(ConfigurationError);
    });
  });

  describe('densityMazeStrategy()', () => {
    const layout = densityMazeStrategy({ width: 11, height: 11, complexity: 1, density: 1 })(
      createRng(0)
    );

    it('keeps both endpoints on the floor', () => {
      expect([
        layout.grid[layout.agent[0]][layout.agent[1]],
        layout.grid[layout.target[0]][layout.target[1]],
      ]).toEqual([CellState.Floor, CellState.Floor]);
    });
    it('places the target in the opposite inner corner', () => {
      expect(layout.target).toEqual([9, 9]);
    });
    it('rejects sizes below 3', () => {
      expect(() => densityMazeStrategy({ width: 1, height: 11 })).toThrow(ConfigurationError);
    });
  });

  describe('fixedLayoutStrategy()', () => {
    const source = parseLayout(['#####', '#S.G#', '#####']);
    const strategy = fixedLayoutStrategy(source);

    it('returns the layout', () => {
      expect(strategy(createRng(0))).toEqual(source);
    });
    it('returns an independent copy each time', () => {
      const first = strategy(createRng(0));
      first.grid[1][2] = CellState.Wall;
      expect(strategy(createRng(0)).grid[1][2]).toBe(CellState.Floor);
    });
    it('is unaffected by later edits to the source', () => {
      const own = parseLayout(['###', '#S#', '#G#', '###']);
      const fixed = fixedLayoutStrategy(own);
      own.grid[2][1] = CellState.Wall;
      expect(fixed(createRng(0)).grid[2][1]).toBe(CellState.Floor);
    });
  });
});
