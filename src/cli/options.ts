/**
 * Map CLI option strings onto a SimulationConfig.
 */

import { DvsimError } from '../core/errors.js';
import { DEFAULT_CONFIG, type SimulationConfig } from '../engine/simulation.js';

export type OutputFormat = 'text' | 'json';

export interface RunOptions {
  maxRounds?: string;
  infinity?: string;
  format: string;
  routesOnly?: boolean;
  verbose?: boolean;
  strict?: boolean;
}

function parsePositiveInt(value: string, flag: string, min: number): number {
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) < min) {
    throw new DvsimError(
      `Invalid ${flag}: ${value}. Must be an integer >= ${min}`,
      'INVALID_OPTION'
    );
  }
  return Number.parseInt(value, 10);
}

export function parseFormat(value: string): OutputFormat {
  if (value !== 'text' && value !== 'json') {
    throw new DvsimError(`Invalid format: ${value}. Must be text or json`, 'INVALID_OPTION');
  }
  return value;
}

export function toSimulationConfig(options: RunOptions): SimulationConfig {
  return {
    ...DEFAULT_CONFIG,
    maxRounds:
      options.maxRounds === undefined
        ? undefined
        : parsePositiveInt(options.maxRounds, '--max-rounds', 1),
    infinity:
      options.infinity === undefined
        ? undefined
        : parsePositiveInt(options.infinity, '--infinity', 2),
    failOnNonConvergence: options.strict ?? false,
  };
}
