/**
 * Core type definitions for routers, links and routing state.
 */

/**
 * Router label. Unique within a scenario and free of whitespace.
 */
export type RouterId = string;

/**
 * Non-negative integer cost, or UNREACHABLE.
 */
export type Cost = number;

/**
 * Sentinel for "no path". Never produced by adding finite link costs
 * within the simulation horizon.
 */
export const UNREACHABLE: Cost = Number.MAX_SAFE_INTEGER;

/**
 * Wire-format cost that deletes a link.
 */
export const DELETE_LINK = -1;

/**
 * Largest accepted link cost. Keeps every sum of link costs well below
 * UNREACHABLE.
 */
export const MAX_LINK_COST = 2 ** 31 - 1;

/**
 * A direct link between two routers.
 */
export interface Link {
  a: RouterId;
  b: RouterId;
  cost: Cost;
}

/**
 * A queued topology mutation. `cost` of DELETE_LINK removes the link.
 */
export interface LinkEdit {
  src: RouterId;
  dest: RouterId;
  cost: number;
}

/**
 * A fully parsed simulation input.
 */
export interface Scenario {
  routers: RouterId[];
  links: Link[];
  updates: LinkEdit[];
}

/**
 * One routing table line.
 */
export interface Route {
  destination: RouterId;
  nextHop: RouterId;
  cost: Cost;
}

/**
 * The two phases of a simulation run.
 */
export type Phase = 'initial' | 'updated';

/**
 * Immutable copy of every router's distance table at one round.
 * `costs[node][via][destination]`, keyed by label.
 */
export interface DistanceSnapshot {
  round: number;
  routers: RouterId[];
  costs: Record<RouterId, Record<RouterId, Record<RouterId, Cost>>>;
}

/**
 * A selected-cost or next-hop change detected by a sweep.
 */
export interface RouteChange {
  node: RouterId;
  destination: RouterId;
  previousCost: Cost;
  cost: Cost;
  previousNextHop: RouterId | null;
  nextHop: RouterId | null;
}
