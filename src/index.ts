/**
 * maze-navigation public entry point.
 *
 * Generators (`generateWilsonMaze`, `generateDensityMaze`), the shortest-path solver
 * (`solveMaze`), the navigation state machine (`NavigationSimulator`) and the
 * environment registry (`makeEnvironment`).
 */
export { config } from './config';
export type { MazeNavigationConfig } from './config';

export * from './maze/maze.types';
export * from './maze/maze.errors';
export * from './maze/maze.grid';
export { createRng, randomInt, pick } from './maze/maze.rng';
export type { Seed, Prng } from './maze/maze.rng';
export * from './maze/maze.wilson';
export * from './maze/maze.density';

export * from './solver/solver.graph';
export * from './solver/solver.search';
export * from './solver/solver';

export * from './env/navigation.observation';
export * from './env/navigation.simulator';
export * from './env/navigation.strategies';
export { TimeLimit } from './env/timeLimit';
export * from './env/registry';
export { renderEnvironmentTable } from './env/registry.table';
