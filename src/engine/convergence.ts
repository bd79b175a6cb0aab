/**
 * Convergence engine: synchronous distributed Bellman-Ford.
 *
 * Each sweep recomputes every router's rows from the previous round's
 * advertisements into a fresh table and commits it at the end, so no
 * router sees a value produced earlier in the same round.
 */

import { UNREACHABLE, type Cost, type RouteChange, type RouterId, type Route } from '../core/types.js';
import { addCost, clampToHorizon, isReachable } from '../core/cost.js';
import type { Topology } from '../graph/topology.js';
import { DistanceTable, RoutingTable, initializeTables } from './tables.js';

export interface ConvergenceConfig {
  maxRounds?: number; // Sweep bound per run; derived from the horizon when unset
  infinity?: number; // Costs at or above this are unreachable; defaults to total link cost + 1
}

export interface ConvergenceResult {
  converged: boolean;
  sweeps: number;
  finalRound: number;
  maxRounds: number;
}

export type SweepListener = (round: number, changes: RouteChange[]) => void;

export class ConvergenceEngine {
  readonly topology: Topology;
  readonly config: ConvergenceConfig;
  private distanceTable: DistanceTable;
  private routingTable: RoutingTable;
  private currentRound = 0;

  constructor(topology: Topology, config: Partial<ConvergenceConfig> = {}) {
    this.topology = topology;
    this.config = { ...config };
    const { distances, routing } = initializeTables(topology);
    this.distanceTable = distances;
    this.routingTable = routing;
  }

  get round(): number {
    return this.currentRound;
  }

  get distances(): DistanceTable {
    return this.distanceTable;
  }

  get routing(): RoutingTable {
    return this.routingTable;
  }

  /**
   * Largest cost still treated as a path. Read from the live topology, so
   * it follows link edits.
   */
  horizon(): Cost {
    if (this.config.infinity !== undefined) {
      return this.config.infinity - 1;
    }
    return this.topology.totalCost();
  }

  /**
   * Sweep bound for the next run. Unless configured, it is large enough for
   * a stale estimate to climb past the horizon one shortest link at a time,
   * plus a full relaxation of the remaining paths.
   */
  roundBound(): number {
    if (this.config.maxRounds !== undefined) {
      return this.config.maxRounds;
    }
    const size = this.topology.size;
    const shortest = this.topology.minLinkCost();
    if (shortest === undefined) return size + 2;
    return Math.ceil(this.horizon() / shortest) + size + 2;
  }

  /**
   * Run one synchronous round and return the selected-route changes.
   */
  sweep(): RouteChange[] {
    const { topology } = this;
    const size = topology.size;
    const previous = this.distanceTable;
    const next = previous.clone();
    const nextRouting = this.routingTable.clone();
    const horizon = this.horizon();
    const changes: RouteChange[] = [];

    for (let n = 0; n < size; n++) {
      const neighbors = new Set(topology.adjacentIndices(n));

      for (let d = 0; d < size; d++) {
        if (d === n) continue;

        let bestCost = UNREACHABLE;
        let bestHop: number | null = null;

        for (let k = 0; k < size; k++) {
          if (k === n) continue;

          let cost = UNREACHABLE;
          if (neighbors.has(k)) {
            const link = topology.linkCost(n, k);
            cost = k === d ? link : addCost(link, previous.advertised(k, d));
          }
          next.set(n, k, d, cost);

          if (cost < bestCost) {
            bestCost = cost;
            bestHop = k;
          }
        }

        bestCost = clampToHorizon(bestCost, horizon);
        if (!isReachable(bestCost)) bestHop = null;

        // An equal-cost alternative never displaces the current next hop.
        const previousHop = this.routingTable.nextHop(n, d);
        if (
          bestHop !== null &&
          previousHop !== null &&
          neighbors.has(previousHop) &&
          next.get(n, previousHop, d) === bestCost
        ) {
          bestHop = previousHop;
        }

        next.set(n, n, d, bestCost);
        nextRouting.setNextHop(n, d, bestHop);

        const previousCost = previous.get(n, n, d);
        if (previousCost !== bestCost || previousHop !== bestHop) {
          changes.push({
            node: topology.routers[n],
            destination: topology.routers[d],
            previousCost,
            cost: bestCost,
            previousNextHop: this.label(previousHop),
            nextHop: this.label(bestHop),
          });
        }
      }
    }

    this.distanceTable = next;
    this.routingTable = nextRouting;
    this.currentRound++;
    return changes;
  }

  /**
   * Sweep until a round changes nothing or the round bound is hit.
   * Continues from whatever state the tables are in.
   */
  run(onSweep?: SweepListener): ConvergenceResult {
    const maxRounds = this.roundBound();
    for (let sweeps = 1; sweeps <= maxRounds; sweeps++) {
      const changes = this.sweep();
      onSweep?.(this.currentRound, changes);
      if (changes.length === 0) {
        return { converged: true, sweeps, finalRound: this.currentRound, maxRounds };
      }
    }
    return {
      converged: false,
      sweeps: maxRounds,
      finalRound: this.currentRound,
      maxRounds,
    };
  }

  /**
   * Selected cost from `node` to `destination`.
   */
  costTo(node: RouterId, destination: RouterId): Cost {
    const n = this.topology.indexOf(node);
    const d = this.topology.indexOf(destination);
    return n === d ? 0 : this.distanceTable.get(n, n, d);
  }

  nextHop(node: RouterId, destination: RouterId): RouterId | null {
    const hop = this.routingTable.nextHop(
      this.topology.indexOf(node),
      this.topology.indexOf(destination)
    );
    return this.label(hop);
  }

  /**
   * Reachable destinations of `node`, in label order.
   */
  routes(node: RouterId): Route[] {
    const n = this.topology.indexOf(node);
    const result: Route[] = [];
    this.topology.routers.forEach((destination, d) => {
      if (d === n) return;
      const cost = this.distanceTable.get(n, n, d);
      const hop = this.routingTable.nextHop(n, d);
      if (hop !== null && isReachable(cost)) {
        result.push({ destination, nextHop: this.topology.routers[hop], cost });
      }
    });
    return result;
  }

  private label(index: number | null): RouterId | null {
    return index === null ? null : this.topology.routers[index];
  }
}
