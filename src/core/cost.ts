/**
 * Saturating cost arithmetic over the UNREACHABLE sentinel.
 */

import { UNREACHABLE, type Cost } from './types.js';

export function isReachable(cost: Cost): boolean {
  return cost !== UNREACHABLE;
}

/**
 * Add two costs. Unreachable is absorbing, and any sum at or past the
 * sentinel saturates to it.
 */
export function addCost(a: Cost, b: Cost): Cost {
  if (a === UNREACHABLE || b === UNREACHABLE) return UNREACHABLE;
  const sum = a + b;
  return sum >= UNREACHABLE ? UNREACHABLE : sum;
}

/**
 * Clamp a cost to the simulation horizon: anything strictly above
 * `horizon` is unreachable.
 */
export function clampToHorizon(cost: Cost, horizon: Cost): Cost {
  return cost > horizon ? UNREACHABLE : cost;
}

/**
 * Render a cost the way the console reporter prints it.
 */
export function formatCost(cost: Cost): string {
  return isReachable(cost) ? String(cost) : 'INF';
}
