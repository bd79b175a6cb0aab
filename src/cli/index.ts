#!/usr/bin/env node
/**
 * dvsim CLI - run Distance Vector simulations from scenario files.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { DvsimError, NonConvergenceError } from '../core/errors.js';
import { Simulation } from '../engine/simulation.js';
import { readScenario, saveScenario } from '../storage/scenario.js';
import { attachTextReporter, toJsonReport } from '../export/report.js';
import { parseFormat, toSimulationConfig, type RunOptions } from './options.js';

const EXIT_INPUT_ERROR = 1;
const EXIT_NON_CONVERGENCE = 2;

/**
 * Run a command body, turning simulator errors into a red message and an
 * exit code. Anything else is a bug and propagates.
 */
function guard(body: () => void): void {
  try {
    body();
  } catch (error) {
    if (error instanceof DvsimError) {
      console.error(chalk.red(error.message));
      process.exit(
        error instanceof NonConvergenceError ? EXIT_NON_CONVERGENCE : EXIT_INPUT_ERROR
      );
    }
    throw error;
  }
}

const program = new Command();

program
  .name('dvsim')
  .description('Simulate synchronous Distance Vector routing over a router topology')
  .version('0.1.0');

// Run command
program
  .command('run [file]')
  .description('Converge a scenario, apply its updates and re-converge (stdin when no file)')
  .option('-m, --max-rounds <n>', 'Round bound per convergence phase (default: derived from the link costs)')
  .option('-i, --infinity <n>', 'Treat costs at or above this value as unreachable')
  .option('-f, --format <format>', 'Output format (text, json)', 'text')
  .option('-r, --routes-only', 'Print routing tables only')
  .option('-v, --verbose', 'Log per-round change counts to stderr')
  .option('--strict', 'Fail as soon as a phase does not converge')
  .action((file: string | undefined, options: RunOptions) => {
    guard(() => {
      const format = parseFormat(options.format);
      const config = toSimulationConfig(options);
      const simulation = new Simulation(readScenario(file), config);

      if (format === 'text') {
        attachTextReporter(simulation, (text) => console.log(text), {
          routesOnly: options.routesOnly,
        });
      }

      if (options.verbose) {
        simulation.on('round', ({ phase, snapshot, changes }) => {
          console.error(
            chalk.gray(`[${phase}] t=${snapshot.round}: ${changes.length} route change(s)`)
          );
        });
        simulation.on('updates:applied', ({ applied }) => {
          for (const { edit, result } of applied) {
            console.error(
              chalk.gray(`${edit.src}-${edit.dest} ${edit.cost}: ${result}`)
            );
          }
        });
      }

      const result = simulation.run();

      if (format === 'json') {
        const report = toJsonReport(result, { routesOnly: options.routesOnly });
        console.log(JSON.stringify(report, null, 2));
      }

      const stalled = result.phases.find((phase) => !phase.converged);
      if (stalled) {
        console.error(
          chalk.red(`Did not converge within ${stalled.maxRounds} rounds`)
        );
        process.exit(EXIT_NON_CONVERGENCE);
      }
    });
  });

// Validate command
program
  .command('validate [file]')
  .description('Parse and check a scenario without simulating it')
  .action((file: string | undefined) => {
    guard(() => {
      const scenario = readScenario(file);
      new Simulation(scenario);
      console.log(chalk.green('Scenario is valid'));
      console.log(
        chalk.gray(
          `${scenario.routers.length} routers, ${scenario.links.length} links, ${scenario.updates.length} updates`
        )
      );
    });
  });

// Convert command
program
  .command('convert <input> <output>')
  .description('Convert a scenario (text or YAML) to a YAML scenario file')
  .action((input: string, output: string) => {
    guard(() => {
      saveScenario(output, readScenario(input));
      console.log(chalk.green(`Wrote ${output}`));
    });
  });

program.parse();
