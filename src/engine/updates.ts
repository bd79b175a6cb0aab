/**
 * Apply queued link edits to a live topology.
 *
 * Tables are deliberately left alone: the engine re-converges from its
 * current state, so invalidated multi-hop costs only fade out through
 * relaxation rounds (count-to-infinity).
 */

import type { LinkEdit } from '../core/types.js';
import { Topology, type LinkMutation } from '../graph/topology.js';

export interface AppliedEdit {
  edit: LinkEdit;
  result: LinkMutation;
}

/**
 * Apply edits in list order. Throws on the first invalid edit, leaving
 * earlier edits applied.
 */
export function applyUpdates(topology: Topology, edits: readonly LinkEdit[]): AppliedEdit[] {
  return edits.map((edit) => ({
    edit,
    result: topology.setLink(edit.src, edit.dest, edit.cost),
  }));
}

/**
 * Check every edit against the topology's router set and cost rules
 * without mutating anything.
 */
export function validateUpdates(topology: Topology, edits: readonly LinkEdit[]): void {
  const probe = new Topology(topology.routers);
  applyUpdates(probe, edits);
}
