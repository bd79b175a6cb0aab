/**
 * Undirected weighted link topology over a fixed router set.
 *
 * Routers are assigned dense indices once, from the sorted label set, so
 * the engine can address tables by integer instead of by label.
 */

import {
  DELETE_LINK,
  MAX_LINK_COST,
  UNREACHABLE,
  type Cost,
  type Link,
  type RouterId,
} from '../core/types.js';
import {
  DvsimError,
  InvalidCostError,
  InvalidLinkError,
  UnknownRouterError,
} from '../core/errors.js';

/**
 * Outcome of a single link mutation.
 */
export type LinkMutation = 'added' | 'changed' | 'removed' | 'unchanged';

/**
 * Accept an integer cost in 1..MAX_LINK_COST, or DELETE_LINK.
 */
export function assertLinkCost(cost: number): void {
  if (cost === DELETE_LINK) return;
  if (!Number.isSafeInteger(cost) || cost <= 0 || cost > MAX_LINK_COST) {
    throw new InvalidCostError(cost);
  }
}

export class Topology {
  readonly routers: readonly RouterId[];
  private readonly index: Map<RouterId, number>;
  private readonly adjacency: Map<number, Cost>[];

  constructor(routers: Iterable<RouterId>) {
    const sorted = [...routers].sort();
    this.index = new Map();
    sorted.forEach((id, i) => {
      if (this.index.has(id)) {
        throw new DvsimError(`Duplicate router: ${id}`, 'DUPLICATE_ROUTER');
      }
      this.index.set(id, i);
    });
    this.routers = sorted;
    this.adjacency = sorted.map(() => new Map<number, Cost>());
  }

  get size(): number {
    return this.routers.length;
  }

  /**
   * Dense index of a router label.
   */
  indexOf(id: RouterId): number {
    const i = this.index.get(id);
    if (i === undefined) {
      throw new UnknownRouterError(id);
    }
    return i;
  }

  /**
   * Add, overwrite or (with DELETE_LINK) remove the symmetric link a-b.
   */
  setLink(a: RouterId, b: RouterId, cost: number): LinkMutation {
    const i = this.indexOf(a);
    const j = this.indexOf(b);
    assertLinkCost(cost);
    if (i === j) {
      throw new InvalidLinkError(`Self-loop on router ${a} is not allowed`);
    }

    const existing = this.adjacency[i].get(j);
    if (cost === DELETE_LINK) {
      if (existing === undefined) return 'unchanged';
      this.adjacency[i].delete(j);
      this.adjacency[j].delete(i);
      return 'removed';
    }

    this.adjacency[i].set(j, cost);
    this.adjacency[j].set(i, cost);
    if (existing === undefined) return 'added';
    return existing === cost ? 'unchanged' : 'changed';
  }

  /**
   * Remove the link a-b. A missing link is not an error.
   */
  removeLink(a: RouterId, b: RouterId): LinkMutation {
    return this.setLink(a, b, DELETE_LINK);
  }

  hasLink(a: RouterId, b: RouterId): boolean {
    return this.adjacency[this.indexOf(a)].has(this.indexOf(b));
  }

  /**
   * Direct link cost, or UNREACHABLE when there is no link.
   */
  cost(a: RouterId, b: RouterId): Cost {
    return this.linkCost(this.indexOf(a), this.indexOf(b));
  }

  linkCost(i: number, j: number): Cost {
    return this.adjacency[i].get(j) ?? UNREACHABLE;
  }

  /**
   * Currently linked routers, in index order.
   */
  *neighbors(node: RouterId): Generator<RouterId> {
    for (const j of this.adjacentIndices(this.indexOf(node))) {
      yield this.routers[j];
    }
  }

  adjacentIndices(i: number): number[] {
    return [...this.adjacency[i].keys()].sort((x, y) => x - y);
  }

  /**
   * Every link once, with `a` sorting before `b`.
   */
  links(): Link[] {
    const result: Link[] = [];
    this.adjacency.forEach((edges, i) => {
      for (const j of [...edges.keys()].sort((x, y) => x - y)) {
        if (j > i) {
          result.push({ a: this.routers[i], b: this.routers[j], cost: this.linkCost(i, j) });
        }
      }
    });
    return result;
  }

  /**
   * Sum of every link cost. No simple path can cost more.
   */
  totalCost(): Cost {
    return this.links().reduce((sum, link) => sum + link.cost, 0);
  }

  /**
   * Cheapest link, or undefined when there are no links.
   */
  minLinkCost(): Cost | undefined {
    let min: Cost | undefined;
    for (const link of this.links()) {
      if (min === undefined || link.cost < min) min = link.cost;
    }
    return min;
  }
}
