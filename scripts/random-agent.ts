/*
 * Roll out one episode with uniformly sampled actions, then replay the same maze
 * with the shortest-path solver for comparison.
 * Usage: npm run example:random -- [environment-id] [seed]
 */
import { makeEnvironment } from '../src/env/registry';
import { createRng, randomInt } from '../src/maze/maze.rng';
import { MOVES } from '../src/maze/maze.types';
import { impassableFromGrid, solveMaze } from '../src/solver/solver';

const id = process.argv[2] ?? 'RandomMaze-11x11-v0';
const seed = process.argv[3] ?? '1';

const env = makeEnvironment(id);
const policy = createRng(`policy:${seed}`);

let { info } = env.reset({ seed });
let score = 0;
let steps = 0;
let done = false;
while (!done) {
  const result = env.step(randomInt(policy, MOVES.length));
  score += result.reward;
  steps++;
  info = result.info;
  done = result.terminated || result.truncated;
}
console.log(
  `[random] ${id} seed=${seed} steps=${steps} score=${score.toFixed(2)} reached=${info.distance === 0}`
);

const start = env.reset({ seed }).info;
const actions = solveMaze(impassableFromGrid(env.grid), env.moves, start.agent, start.target) ?? [];
let oracleScore = 0;
for (const action of actions) oracleScore += env.step(action).reward;
console.log(`[oracle] ${id} seed=${seed} steps=${actions.length} score=${oracleScore.toFixed(2)}`);
