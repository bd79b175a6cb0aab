/**
 * Console and JSON reporting of simulation output.
 */

import { formatCost, isReachable } from '../core/cost.js';
import type { Cost, DistanceSnapshot, Route, RouterId } from '../core/types.js';
import type { Simulation, SimulationResult } from '../engine/simulation.js';

export const APPLYING_UPDATES_MARKER = 'APPLYING UPDATES';

const COLUMN_GAP = '    ';
const HEADER_INDENT = '     ';

/**
 * Render one router's distance table at a round. Rows are the other
 * routers as next hops, columns the other routers as destinations.
 */
export function formatDistanceTable(snapshot: DistanceSnapshot, router: RouterId): string {
  const others = snapshot.routers.filter((r) => r !== router);
  const rows = snapshot.costs[router];
  const lines = [
    `Distance Table of router ${router} at t=${snapshot.round}:`,
    `${HEADER_INDENT}${others.join(COLUMN_GAP)}`,
  ];
  for (const via of others) {
    const costs = others.map((destination) => formatCost(rows[via][destination]));
    lines.push(`${via}${COLUMN_GAP}${costs.join(COLUMN_GAP)}`);
  }
  return lines.join('\n');
}

/**
 * Render a routing table: one `dest,next_hop,cost` line per reachable
 * destination.
 */
export function formatRoutingTable(router: RouterId, routes: Route[]): string {
  const lines = [`Routing Table of router ${router}:`];
  for (const route of routes) {
    lines.push(`${route.destination},${route.nextHop},${route.cost}`);
  }
  return lines.join('\n');
}

export interface TextReporterOptions {
  routesOnly?: boolean; // Skip per-round distance tables
}

/**
 * Stream the text protocol for a simulation as it runs. Blocks are
 * separated by a single blank line.
 */
export function attachTextReporter(
  simulation: Simulation,
  write: (text: string) => void,
  options: TextReporterOptions = {}
): void {
  let first = true;
  const block = (text: string) => {
    write(first ? text : `\n${text}`);
    first = false;
  };

  simulation.on('round', ({ snapshot }) => {
    if (options.routesOnly) return;
    for (const router of snapshot.routers) {
      block(formatDistanceTable(snapshot, router));
    }
  });

  simulation.on('phase:complete', ({ result, routes }) => {
    if (!result.converged) return;
    for (const router of simulation.topology.routers) {
      block(formatRoutingTable(router, routes[router]));
    }
  });

  simulation.on('updates:applied', () => {
    block(APPLYING_UPDATES_MARKER);
  });
}

type JsonCost = number | null;

function jsonCost(cost: Cost): JsonCost {
  return isReachable(cost) ? cost : null;
}

export interface JsonRound {
  round: number;
  costs: Record<RouterId, Record<RouterId, Record<RouterId, JsonCost>>>;
}

export interface JsonReport {
  converged: boolean;
  phases: {
    phase: string;
    converged: boolean;
    rounds: JsonRound[];
    routes: Record<RouterId, Route[]>;
  }[];
}

function toJsonRound(snapshot: DistanceSnapshot): JsonRound {
  const costs: JsonRound['costs'] = {};
  for (const [node, rows] of Object.entries(snapshot.costs)) {
    costs[node] = {};
    for (const [via, row] of Object.entries(rows)) {
      costs[node][via] = Object.fromEntries(
        Object.entries(row).map(([destination, cost]) => [destination, jsonCost(cost)])
      );
    }
  }
  return { round: snapshot.round, costs };
}

/**
 * Export a finished run as a JSON-safe object; unreachable is null.
 */
export function toJsonReport(result: SimulationResult, options: TextReporterOptions = {}): JsonReport {
  return {
    converged: result.converged,
    phases: result.phases.map((phase) => ({
      phase: phase.phase,
      converged: phase.converged,
      rounds: options.routesOnly ? [] : phase.rounds.map(toJsonRound),
      routes: phase.routes,
    })),
  };
}
