/**
 * Tests for the convergence engine.
 */

import { describe, it, expect } from 'vitest';
import { ConvergenceEngine } from '../../src/engine/convergence.js';
import { applyUpdates } from '../../src/engine/updates.js';
import { buildTopology } from '../../src/engine/simulation.js';
import { UNREACHABLE, type Scenario } from '../../src/core/types.js';
import { lineScenario, scenario, shortestPaths } from '../helpers/scenarios.js';

function converge(input: Scenario, maxRounds = 100): ConvergenceEngine {
  const engine = new ConvergenceEngine(buildTopology(input), { maxRounds });
  const result = engine.run();
  expect(result.converged).toBe(true);
  return engine;
}

const meshes: Record<string, Scenario> = {
  ring: scenario(
    ['A', 'B', 'C', 'D', 'E'],
    [
      ['A', 'B', 2],
      ['B', 'C', 2],
      ['C', 'D', 2],
      ['D', 'E', 2],
      ['E', 'A', 7],
    ]
  ),
  weighted: scenario(
    ['u', 'v', 'w', 'x', 'y', 'z'],
    [
      ['u', 'v', 7],
      ['u', 'w', 3],
      ['u', 'x', 5],
      ['v', 'w', 3],
      ['v', 'y', 4],
      ['w', 'x', 4],
      ['w', 'y', 8],
      ['x', 'y', 7],
      ['y', 'z', 2],
      ['x', 'z', 9],
    ]
  ),
  partitioned: scenario(
    ['P', 'Q', 'R', 'S'],
    [
      ['P', 'Q', 3],
      ['R', 'S', 1],
    ]
  ),
};

describe('ConvergenceEngine', () => {
  describe('line topology', () => {
    it('should route A to C through B', () => {
      const engine = converge(lineScenario());

      expect(engine.nextHop('A', 'C')).toBe('B');
      expect(engine.costTo('A', 'C')).toBe(2);
      expect(engine.nextHop('C', 'A')).toBe('B');
      expect(engine.costTo('C', 'A')).toBe(2);
    });

    it('should reach a fixpoint at round 2', () => {
      const engine = new ConvergenceEngine(buildTopology(lineScenario()));
      const result = engine.run();

      expect(result).toEqual({ converged: true, sweeps: 2, finalRound: 2, maxRounds: 7 });
    });

    it('should report the first-round discoveries', () => {
      const engine = new ConvergenceEngine(buildTopology(lineScenario()));
      const changes = engine.sweep();

      expect(changes).toEqual([
        {
          node: 'A',
          destination: 'C',
          previousCost: UNREACHABLE,
          cost: 2,
          previousNextHop: null,
          nextHop: 'B',
        },
        {
          node: 'C',
          destination: 'A',
          previousCost: UNREACHABLE,
          cost: 2,
          previousNextHop: null,
          nextHop: 'B',
        },
      ]);
    });

    it('should keep dominated rows up to date', () => {
      const engine = converge(lineScenario());
      // B (1) reaching A (0) through C (2) bounces back through B
      expect(engine.distances.get(1, 2, 0)).toBe(3);
      expect(engine.distances.get(1, 0, 2)).toBe(3);
    });

    it('should list reachable routes in label order', () => {
      const engine = converge(lineScenario());

      expect(engine.routes('A')).toEqual([
        { destination: 'B', nextHop: 'B', cost: 1 },
        { destination: 'C', nextHop: 'B', cost: 2 },
      ]);
    });
  });

  describe('static topologies', () => {
    for (const [name, input] of Object.entries(meshes)) {
      it(`should match all-pairs shortest paths on ${name}`, () => {
        const engine = converge(input);
        const oracle = shortestPaths(input);

        for (const a of input.routers) {
          for (const b of input.routers) {
            expect(engine.costTo(a, b)).toBe(oracle.get(`${a}->${b}`));
          }
        }
      });

      it(`should converge to symmetric costs on ${name}`, () => {
        const engine = converge(input);

        for (const a of input.routers) {
          for (const b of input.routers) {
            expect(engine.costTo(a, b)).toBe(engine.costTo(b, a));
          }
        }
      });

      it(`should keep the own row at or below every other row on ${name}`, () => {
        const engine = converge(input);
        const size = engine.topology.size;

        for (let n = 0; n < size; n++) {
          for (let d = 0; d < size; d++) {
            if (d === n) continue;
            const own = engine.distances.get(n, n, d);
            for (let k = 0; k < size; k++) {
              if (k === n) continue;
              expect(own).toBeLessThanOrEqual(engine.distances.get(n, k, d));
            }
          }
        }
      });

      it(`should change nothing when swept again on ${name}`, () => {
        const engine = converge(input);
        const before = engine.distances.snapshot(engine.topology.routers, 0);

        expect(engine.sweep()).toEqual([]);
        expect(engine.distances.snapshot(engine.topology.routers, 0)).toEqual(before);
      });
    }

    it('should leave partitions unreachable', () => {
      const engine = converge(meshes.partitioned);

      expect(engine.costTo('P', 'R')).toBe(UNREACHABLE);
      expect(engine.nextHop('P', 'R')).toBeNull();
      expect(engine.routes('P')).toEqual([{ destination: 'Q', nextHop: 'Q', cost: 3 }]);
    });
  });

  describe('warm start after updates', () => {
    it('should pick up a new direct link', () => {
      const engine = converge(lineScenario());
      applyUpdates(engine.topology, [{ src: 'A', dest: 'C', cost: 1 }]);
      const result = engine.run();

      expect(result).toEqual({ converged: true, sweeps: 2, finalRound: 4, maxRounds: 100 });
      expect(engine.nextHop('A', 'C')).toBe('C');
      expect(engine.costTo('A', 'C')).toBe(1);
      expect(engine.nextHop('C', 'A')).toBe('A');
      expect(engine.costTo('C', 'A')).toBe(1);
    });

    it('should drop destinations cut off by a removal', () => {
      const engine = converge(lineScenario());
      applyUpdates(engine.topology, [{ src: 'B', dest: 'C', cost: -1 }]);
      const result = engine.run();

      expect(result.converged).toBe(true);
      expect(engine.nextHop('B', 'C')).toBeNull();
      expect(engine.nextHop('A', 'C')).toBeNull();
      expect(engine.routes('A')).toEqual([{ destination: 'B', nextHop: 'B', cost: 1 }]);
      expect(engine.routes('B')).toEqual([{ destination: 'A', nextHop: 'A', cost: 1 }]);
      expect(engine.routes('C')).toEqual([]);
    });

    it('should move to the alternate path after a removal', () => {
      const input = scenario(
        ['A', 'B', 'C'],
        [
          ['A', 'B', 1],
          ['B', 'C', 1],
          ['A', 'C', 5],
        ]
      );
      const engine = converge(input);
      expect(engine.nextHop('A', 'C')).toBe('B');
      expect(engine.costTo('A', 'C')).toBe(2);

      applyUpdates(engine.topology, [{ src: 'B', dest: 'C', cost: -1 }]);

      // B first trusts A's stale route to C
      engine.sweep();
      expect(engine.nextHop('B', 'C')).toBe('A');
      expect(engine.costTo('B', 'C')).toBe(3);
      expect(engine.nextHop('A', 'C')).toBe('B');

      const result = engine.run();
      expect(result.converged).toBe(true);
      expect(engine.nextHop('B', 'C')).toBe('A');
      expect(engine.costTo('B', 'C')).toBe(6);
      expect(engine.nextHop('A', 'C')).toBe('C');
      expect(engine.costTo('A', 'C')).toBe(5);
      expect(engine.nextHop('C', 'B')).toBe('A');
      expect(engine.costTo('C', 'B')).toBe(6);
    });

    it('should count to infinity before giving up on a removed destination', () => {
      const input = scenario(
        ['A', 'B', 'C', 'D'],
        [
          ['A', 'B', 1],
          ['B', 'C', 1],
          ['A', 'D', 20],
        ]
      );
      const engine = converge(input);
      applyUpdates(engine.topology, [{ src: 'B', dest: 'C', cost: -1 }]);

      // B believes A's stale advertisement of C
      engine.sweep();
      expect(engine.costTo('B', 'C')).toBe(3);
      expect(engine.nextHop('B', 'C')).toBe('A');

      engine.sweep();
      expect(engine.costTo('A', 'C')).toBe(4);

      const result = engine.run();
      expect(result.converged).toBe(true);
      expect(result.sweeps).toBe(20);
      expect(engine.costTo('A', 'C')).toBe(UNREACHABLE);
      expect(engine.costTo('B', 'C')).toBe(UNREACHABLE);
      expect(engine.costTo('D', 'C')).toBe(UNREACHABLE);
      expect(engine.costTo('D', 'B')).toBe(21);
    });

    it('should report non-convergence when the round bound is too low', () => {
      const input = scenario(
        ['A', 'B', 'C', 'D'],
        [
          ['A', 'B', 1],
          ['B', 'C', 1],
          ['A', 'D', 20],
        ]
      );
      const engine = converge(input, 10);
      applyUpdates(engine.topology, [{ src: 'B', dest: 'C', cost: -1 }]);

      expect(engine.run()).toEqual({
        converged: false,
        sweeps: 10,
        finalRound: engine.round,
        maxRounds: 10,
      });
      expect(engine.costTo('A', 'C')).not.toBe(UNREACHABLE);
    });

    it('should keep the current next hop when an equal-cost path appears', () => {
      const input = scenario(
        ['A', 'B', 'C', 'D'],
        [
          ['A', 'B', 1],
          ['A', 'C', 1],
          ['B', 'D', 5],
          ['C', 'D', 1],
        ]
      );
      const engine = converge(input);
      expect(engine.nextHop('A', 'D')).toBe('C');

      applyUpdates(engine.topology, [{ src: 'B', dest: 'D', cost: 1 }]);
      engine.run();

      expect(engine.costTo('A', 'D')).toBe(2);
      expect(engine.nextHop('A', 'D')).toBe('C');
      expect(engine.nextHop('D', 'A')).toBe('C');
    });

    it('should break fresh ties toward the first router in label order', () => {
      const input = scenario(
        ['A', 'B', 'C', 'D'],
        [
          ['A', 'B', 1],
          ['A', 'C', 1],
          ['B', 'D', 1],
          ['C', 'D', 1],
        ]
      );
      const engine = converge(input);

      expect(engine.nextHop('A', 'D')).toBe('B');
      expect(engine.nextHop('D', 'A')).toBe('B');
    });
  });

  describe('horizon', () => {
    it('should default to the total link cost', () => {
      const engine = new ConvergenceEngine(buildTopology(lineScenario()));
      expect(engine.horizon()).toBe(2);
    });

    it('should treat costs at the configured infinity as unreachable', () => {
      const engine = new ConvergenceEngine(buildTopology(lineScenario()), { infinity: 2 });
      engine.run();

      expect(engine.horizon()).toBe(1);
      expect(engine.costTo('A', 'B')).toBe(1);
      expect(engine.costTo('A', 'C')).toBe(UNREACHABLE);
    });
  });

  describe('round bound', () => {
    it('should derive the bound from the horizon and the cheapest link', () => {
      const engine = new ConvergenceEngine(buildTopology(lineScenario()));
      expect(engine.roundBound()).toBe(7);
    });

    it('should follow a configured infinity', () => {
      const engine = new ConvergenceEngine(buildTopology(lineScenario()), { infinity: 2 });
      expect(engine.roundBound()).toBe(6);
    });

    it('should scale down with expensive links', () => {
      const input = scenario(['A', 'B', 'C'], [['A', 'B', 10], ['B', 'C', 10]]);
      const engine = new ConvergenceEngine(buildTopology(input));
      expect(engine.roundBound()).toBe(7);
    });

    it('should prefer an explicit bound', () => {
      const engine = new ConvergenceEngine(buildTopology(lineScenario()), { maxRounds: 5 });
      expect(engine.roundBound()).toBe(5);
    });

    it('should fall back to the router count without links', () => {
      const engine = new ConvergenceEngine(buildTopology(scenario(['A', 'B'], [])));
      expect(engine.roundBound()).toBe(4);
    });
  });
});
