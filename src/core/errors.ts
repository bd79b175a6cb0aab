/**
 * Error types for the simulator.
 *
 * Every error carries a `code` for programmatic handling. Library code
 * throws; the CLI is the only place that catches and exits.
 */

import { MAX_LINK_COST, type RouterId } from './types.js';

/**
 * Base error class for all simulator errors.
 */
export class DvsimError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  constructor(message: string, code = 'UNKNOWN') {
    super(message);
    this.name = 'DvsimError';
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Malformed input: wrong token count, non-integer cost, missing block
 * terminator, duplicate router label.
 */
export class ParseError extends DvsimError {
  /** 1-based input line, when the error is tied to one */
  readonly line: number | undefined;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `line ${line}: ${message}`, 'PARSE_ERROR');
    this.name = 'ParseError';
    this.line = line;
  }
}

/**
 * A label that is not in the declared router set.
 */
export class UnknownRouterError extends DvsimError {
  readonly router: RouterId;

  constructor(router: RouterId) {
    super(`Unknown router: ${router}`, 'UNKNOWN_ROUTER');
    this.name = 'UnknownRouterError';
    this.router = router;
  }
}

/**
 * Link cost that is neither a positive integer nor the delete sentinel.
 */
export class InvalidCostError extends DvsimError {
  readonly cost: number;

  constructor(cost: number) {
    super(
      `Invalid link cost: ${cost}. Must be an integer from 1 to ${MAX_LINK_COST}, or -1`,
      'INVALID_COST'
    );
    this.name = 'InvalidCostError';
    this.cost = cost;
  }
}

/**
 * Structurally invalid link, such as a self-loop.
 */
export class InvalidLinkError extends DvsimError {
  constructor(message: string) {
    super(message, 'INVALID_LINK');
    this.name = 'InvalidLinkError';
  }
}

/**
 * The engine hit its round bound before reaching a fixpoint.
 */
export class NonConvergenceError extends DvsimError {
  readonly maxRounds: number;

  constructor(maxRounds: number) {
    super(`Did not converge within ${maxRounds} rounds`, 'NON_CONVERGENCE');
    this.name = 'NonConvergenceError';
    this.maxRounds = maxRounds;
  }
}
