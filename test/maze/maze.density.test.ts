import { config } from '../../src/config';
import { generateDensityMaze } from '../../src/maze/maze.density';
import { ConfigurationError } from '../../src/maze/maze.errors';
import { createRng } from '../../src/maze/maze.rng';
import { CellState } from '../../src/maze/maze.types';
import { resetWarnings } from '../../src/utils/warnings';
import { hasWallBorder } from '../utils/maze-helpers';

describe('Density maze generator', () => {
  describe('shape and border', () => {
    const grid = generateDensityMaze({ height: 11, width: 15 }, createRng(0));
    it('matches the requested shape', () => {
      expect([grid.length, grid[0].length]).toEqual([11, 15]);
    });
    it('walls the outer border', () => {
      expect(hasWallBorder(grid)).toBe(true);
    });
  });

  describe('odd/odd cells', () => {
    it('never walls a cell whose row and column are both odd', () => {
      const grid = generateDensityMaze(
        { height: 15, width: 15, complexity: 1, density: 1 },
        createRng('dense')
      );
      const walled = grid.flatMap((row, r) =>
        row.filter((cell, c) => r % 2 === 1 && c % 2 === 1 && cell === CellState.Wall)
      );
      expect(walled).toHaveLength(0);
    });
  });

  describe('density 0', () => {
    it('leaves the interior open', () => {
      const grid = generateDensityMaze({ height: 5, width: 7, density: 0 }, createRng(0));
      expect(grid).toEqual([
        [1, 1, 1, 1, 1, 1, 1],
        [1, 0, 0, 0, 0, 0, 1],
        [1, 0, 0, 0, 0, 0, 1],
        [1, 0, 0, 0, 0, 0, 1],
        [1, 1, 1, 1, 1, 1, 1],
      ]);
    });
  });

  describe('determinism', () => {
    it('repeats for the same seed', () => {
      const a = generateDensityMaze({ height: 21, width: 21 }, createRng(9));
      const b = generateDensityMaze({ height: 21, width: 21 }, createRng(9));
      expect(a).toEqual(b);
    });
  });

  describe('validation', () => {
    it('rejects an even width', () => {
      expect(() => generateDensityMaze({ height: 11, width: 10 }, createRng(0))).toThrow(
        ConfigurationError
      );
    });
    it('rejects an even height', () => {
      expect(() => generateDensityMaze({ height: 8, width: 11 }, createRng(0))).toThrow(
        ConfigurationError
      );
    });
    it('rejects complexity above 1', () => {
      expect(() =>
        generateDensityMaze({ height: 11, width: 11, complexity: 1.5 }, createRng(0))
      ).toThrow(ConfigurationError);
    });
    it('rejects negative density', () => {
      expect(() =>
        generateDensityMaze({ height: 11, width: 11, density: -0.1 }, createRng(0))
      ).toThrow(ConfigurationError);
    });
  });

  describe('perfect-maze caveat warning', () => {
    afterEach(() => {
      config.warnings = false;
      resetWarnings();
      jest.restoreAllMocks();
    });

    it('warns once when warnings are enabled', () => {
      // Arrange
      config.warnings = true;
      resetWarnings();
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
      // Act
      generateDensityMaze({ height: 7, width: 7 }, createRng(0));
      generateDensityMaze({ height: 7, width: 7 }, createRng(1));
      // Assert
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('stays silent when warnings are disabled', () => {
      resetWarnings();
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => {});
      generateDensityMaze({ height: 7, width: 7 }, createRng(0));
      expect(warn).not.toHaveBeenCalled();
    });
  });
});
