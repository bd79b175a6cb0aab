/**
 * Two-phase Distance Vector simulation driver.
 *
 * Converges the initial topology, applies the queued link edits, then
 * re-converges from the existing tables. Every round is announced through
 * typed events so reporters can stream output as it is produced.
 */

import { TypedEventEmitter } from '../utils/event-emitter.js';
import { NonConvergenceError } from '../core/errors.js';
import type {
  DistanceSnapshot,
  Phase,
  Route,
  RouteChange,
  RouterId,
  Scenario,
} from '../core/types.js';
import { Topology } from '../graph/topology.js';
import { ConvergenceEngine, type ConvergenceResult } from './convergence.js';
import { applyUpdates, validateUpdates, type AppliedEdit } from './updates.js';

export interface SimulationConfig {
  maxRounds?: number; // Per-phase sweep bound; derived from the horizon when unset
  infinity?: number;
  failOnNonConvergence: boolean; // Throw NonConvergenceError instead of reporting
}

export interface PhaseResult {
  phase: Phase;
  converged: boolean;
  maxRounds: number; // Sweep bound the phase ran under
  rounds: DistanceSnapshot[];
  routes: Record<RouterId, Route[]>;
}

export interface SimulationResult {
  converged: boolean;
  phases: PhaseResult[];
}

export type SimulationEvents = {
  round: { phase: Phase; snapshot: DistanceSnapshot; changes: RouteChange[] };
  'phase:complete': { phase: Phase; result: ConvergenceResult; routes: Record<RouterId, Route[]> };
  'updates:applied': { applied: AppliedEdit[] };
};

export const DEFAULT_CONFIG: SimulationConfig = {
  failOnNonConvergence: false,
};

/**
 * Build a topology from a scenario's router set and initial links.
 */
export function buildTopology(scenario: Scenario): Topology {
  const topology = new Topology(scenario.routers);
  for (const link of scenario.links) {
    topology.setLink(link.a, link.b, link.cost);
  }
  return topology;
}

export class Simulation extends TypedEventEmitter<SimulationEvents> {
  readonly config: SimulationConfig;
  readonly scenario: Scenario;
  readonly topology: Topology;
  readonly engine: ConvergenceEngine;
  private started = false;

  constructor(scenario: Scenario, config: Partial<SimulationConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.scenario = scenario;
    this.topology = buildTopology(scenario);
    validateUpdates(this.topology, scenario.updates);
    this.engine = new ConvergenceEngine(this.topology, {
      maxRounds: this.config.maxRounds,
      infinity: this.config.infinity,
    });
  }

  /**
   * Run both phases. A phase that hits the round bound ends the run.
   */
  run(): SimulationResult {
    if (this.started) {
      throw new Error('Simulation has already been run');
    }
    this.started = true;

    const phases: PhaseResult[] = [];
    const initial = this.runPhase('initial', true);
    phases.push(initial);

    if (initial.converged && this.scenario.updates.length > 0) {
      const applied = applyUpdates(this.topology, this.scenario.updates);
      this.emit('updates:applied', { applied });
      phases.push(this.runPhase('updated', false));
    }

    return {
      converged: phases.every((p) => p.converged),
      phases,
    };
  }

  /**
   * Routing table of every router, keyed by label.
   */
  routingTables(): Record<RouterId, Route[]> {
    const tables: Record<RouterId, Route[]> = {};
    for (const router of this.topology.routers) {
      tables[router] = this.engine.routes(router);
    }
    return tables;
  }

  private runPhase(phase: Phase, reportInitialState: boolean): PhaseResult {
    const rounds: DistanceSnapshot[] = [];
    const record = (snapshot: DistanceSnapshot, changes: RouteChange[]) => {
      rounds.push(snapshot);
      this.emit('round', { phase, snapshot, changes });
    };

    if (reportInitialState) {
      record(this.snapshot(), []);
    }

    const result = this.engine.run((_round, changes) => {
      record(this.snapshot(), changes);
    });

    if (!result.converged && this.config.failOnNonConvergence) {
      throw new NonConvergenceError(result.maxRounds);
    }

    const routes = this.routingTables();
    this.emit('phase:complete', { phase, result, routes });
    return { phase, converged: result.converged, maxRounds: result.maxRounds, rounds, routes };
  }

  private snapshot(): DistanceSnapshot {
    return this.engine.distances.snapshot(this.topology.routers, this.engine.round);
  }
}
