import { ObservationCode, findAgent } from '../../src/env/navigation.observation';
import { NavigationSimulator } from '../../src/env/navigation.simulator';
import {
  listEnvironments,
  makeEnvironment,
  registerEnvironment,
  unregisterEnvironment,
  type EnvironmentSpec,
} from '../../src/env/registry';
import { renderEnvironmentTable } from '../../src/env/registry.table';
import { TimeLimit } from '../../src/env/timeLimit';
import { ConfigurationError } from '../../src/maze/maze.errors';

describe('Environment registry', () => {
  afterEach(() => {
    unregisterEnvironment('TestMaze-7x7-v0');
    unregisterEnvironment('TestDensity-9x9-v0');
  });

  describe('defaults', () => {
    it('registers the random maze sizes in order', () => {
      expect(listEnvironments().map((spec) => spec.id)).toEqual([
        'RandomMaze-11x11-v0',
        'RandomMaze-15x15-v0',
        'RandomMaze-21x21-v0',
        'RandomMaze-31x31-v0',
        'RandomMaze-51x51-v0',
        'RandomMaze-101x101-v0',
      ]);
    });
    it('assigns the step limits', () => {
      expect(listEnvironments().map((spec) => spec.maxEpisodeSteps)).toEqual([
        200, 200, 400, 400, 500, 1000,
      ]);
    });
  });

  describe.each(['RandomMaze-11x11-v0', 'RandomMaze-15x15-v0', 'RandomMaze-21x21-v0'])(
    '%s',
    (id) => {
      const env = makeEnvironment(id);
      const first = env.reset({ seed: 0 });
      for (let i = 0; i < 5; i++) {
        if (env.step(i % 4).terminated) break;
      }
      const second = env.reset();

      it('wraps the simulator in a time limit', () => {
        expect(env).toBeInstanceOf(TimeLimit);
      });
      it('starts the agent at (1, 1)', () => {
        expect(first.info.agent).toEqual([1, 1]);
      });
      it('places the target at (width - 2, height - 2)', () => {
        expect(first.info.target).toEqual([env.height - 2, env.width - 2]);
      });
      it('marks the agent in the observation', () => {
        expect(first.observation[1][1]).toBe(ObservationCode.Agent);
      });
      it('marks the target in the observation', () => {
        expect(first.observation[env.height - 2][env.width - 2]).toBe(ObservationCode.Target);
      });
      it('restores the start after a rollout and reset', () => {
        expect(findAgent(second.observation)).toEqual([1, 1]);
      });
    }
  );

  it('reads the limit of a built environment', () => {
    const env = makeEnvironment('RandomMaze-51x51-v0');
    expect(env instanceof TimeLimit && env.maxEpisodeSteps).toBe(500);
  });

  it('lets callers override the limit', () => {
    const env = makeEnvironment('RandomMaze-11x11-v0', { maxEpisodeSteps: 7 });
    expect(env instanceof TimeLimit && env.maxEpisodeSteps).toBe(7);
  });

  it('builds a bare simulator when no limit applies', () => {
    registerEnvironment({ id: 'TestMaze-7x7-v0', width: 7, height: 7, generator: 'wilson' });
    expect(makeEnvironment('TestMaze-7x7-v0')).toBeInstanceOf(NavigationSimulator);
  });

  it('builds density environments', () => {
    registerEnvironment({
      id: 'TestDensity-9x9-v0',
      width: 9,
      height: 9,
      maxEpisodeSteps: 50,
      generator: 'density',
      complexity: 1,
      density: 1,
    });
    const { info } = makeEnvironment('TestDensity-9x9-v0').reset({ seed: 2 });
    expect(info.target).toEqual([7, 7]);
  });

  it('rejects duplicate ids', () => {
    expect(() =>
      registerEnvironment({ id: 'RandomMaze-11x11-v0', width: 11, height: 11, generator: 'wilson' })
    ).toThrow(ConfigurationError);
  });

  it('rejects unknown ids', () => {
    expect(() => makeEnvironment('NoSuchMaze-v0')).toThrow(/Unknown environment 'NoSuchMaze-v0'/);
  });

  it('returns copies from listEnvironments()', () => {
    listEnvironments()[0].width = 3;
    expect(listEnvironments()[0].width).toBe(11);
  });
});

describe('renderEnvironmentTable()', () => {
  it('renders one row per spec', () => {
    const specs: EnvironmentSpec[] = [
      { id: 'RandomMaze-11x11-v0', width: 11, height: 11, maxEpisodeSteps: 200, generator: 'wilson' },
      { id: 'Open-5x7-v0', width: 7, height: 5, generator: 'density' },
    ];
    expect(renderEnvironmentTable(specs)).toBe(
      '| Environment | Size | Max steps | Generator |\n' +
        '|:---|:---:|:---:|:---:|\n' +
        '| RandomMaze-11x11-v0 | 11x11 | 200 | wilson |\n' +
        '| Open-5x7-v0 | 7x5 | - | density |\n'
    );
  });
});
