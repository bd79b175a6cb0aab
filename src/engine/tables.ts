/**
 * Distance and routing table stores.
 *
 * Both are dense matrices addressed by router index. A distance entry
 * `[node][via][destination]` is the cost `node` believes it would pay to
 * reach `destination` through `via`; the row `via == node` is the node's
 * own best estimate and doubles as its advertisement.
 */

import { UNREACHABLE, type Cost, type DistanceSnapshot, type RouterId } from '../core/types.js';
import type { Topology } from '../graph/topology.js';

const NO_HOP = -1;

export class DistanceTable {
  readonly size: number;
  private readonly cells: Float64Array;

  constructor(size: number, cells?: Float64Array) {
    this.size = size;
    this.cells = cells ?? new Float64Array(size * size * size).fill(UNREACHABLE);
  }

  get(node: number, via: number, destination: number): Cost {
    return this.cells[this.offset(node, via, destination)];
  }

  set(node: number, via: number, destination: number, cost: Cost): void {
    this.cells[this.offset(node, via, destination)] = cost;
  }

  /**
   * What `node` advertises for `destination`: its own row, which holds the
   * minimum over every row it keeps.
   */
  advertised(node: number, destination: number): Cost {
    return this.get(node, node, destination);
  }

  clone(): DistanceTable {
    return new DistanceTable(this.size, this.cells.slice());
  }

  snapshot(routers: readonly RouterId[], round: number): DistanceSnapshot {
    const costs: DistanceSnapshot['costs'] = {};
    routers.forEach((node, n) => {
      const rows: Record<RouterId, Record<RouterId, Cost>> = {};
      routers.forEach((via, v) => {
        const row: Record<RouterId, Cost> = {};
        routers.forEach((destination, d) => {
          if (d !== n) row[destination] = this.get(n, v, d);
        });
        rows[via] = row;
      });
      costs[node] = rows;
    });
    return { round, routers: [...routers], costs };
  }

  private offset(node: number, via: number, destination: number): number {
    return (node * this.size + via) * this.size + destination;
  }
}

export class RoutingTable {
  readonly size: number;
  private readonly hops: Int32Array;

  constructor(size: number, hops?: Int32Array) {
    this.size = size;
    this.hops = hops ?? new Int32Array(size * size).fill(NO_HOP);
  }

  /**
   * Next hop index, or null when the destination is unreachable.
   */
  nextHop(node: number, destination: number): number | null {
    const hop = this.hops[node * this.size + destination];
    return hop === NO_HOP ? null : hop;
  }

  setNextHop(node: number, destination: number, hop: number | null): void {
    this.hops[node * this.size + destination] = hop ?? NO_HOP;
  }

  clone(): RoutingTable {
    return new RoutingTable(this.size, this.hops.slice());
  }
}

/**
 * Round-0 tables: every router knows only its direct links.
 */
export function initializeTables(topology: Topology): {
  distances: DistanceTable;
  routing: RoutingTable;
} {
  const distances = new DistanceTable(topology.size);
  const routing = new RoutingTable(topology.size);

  for (let n = 0; n < topology.size; n++) {
    for (const k of topology.adjacentIndices(n)) {
      const cost = topology.linkCost(n, k);
      distances.set(n, k, k, cost);
      distances.set(n, n, k, cost);
      routing.setNextHop(n, k, k);
    }
  }

  return { distances, routing };
}
