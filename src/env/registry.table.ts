import type { EnvironmentSpec } from './registry';

/**
 * Markdown table of environment specs, one row per spec, for the README.
 *
 * @example
 * renderEnvironmentTable(listEnvironments());
 * // | Environment | Size | Max steps | Generator |
 * // |:---|:---:|:---:|:---:|
 * // | RandomMaze-11x11-v0 | 11x11 | 200 | wilson |
 */
export function renderEnvironmentTable(specs: readonly EnvironmentSpec[]): string {
  const lines = ['| Environment | Size | Max steps | Generator |', '|:---|:---:|:---:|:---:|'];
  for (const spec of specs) {
    const limit = spec.maxEpisodeSteps === undefined ? '-' : String(spec.maxEpisodeSteps);
    lines.push(`| ${spec.id} | ${spec.width}x${spec.height} | ${limit} | ${spec.generator} |`);
  }
  return lines.join('\n') + '\n';
}
