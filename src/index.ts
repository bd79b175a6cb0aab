/**
 * dvsim - synchronous Distance Vector routing simulator
 *
 * @packageDocumentation
 */

export type {
  RouterId,
  Cost,
  Link,
  LinkEdit,
  Scenario,
  Route,
  RouteChange,
  DistanceSnapshot,
  Phase,
} from './core/types.js';
export { UNREACHABLE, DELETE_LINK } from './core/types.js';
export {
  DvsimError,
  ParseError,
  UnknownRouterError,
  InvalidCostError,
  InvalidLinkError,
  NonConvergenceError,
} from './core/errors.js';
export { Topology } from './graph/topology.js';
export { ConvergenceEngine } from './engine/convergence.js';
export { applyUpdates } from './engine/updates.js';
export { Simulation, buildTopology } from './engine/simulation.js';
export type { SimulationConfig, SimulationResult } from './engine/simulation.js';
export {
  parseScenarioText,
  parseScenarioYaml,
  loadScenario,
  saveScenario,
} from './storage/scenario.js';
export {
  formatDistanceTable,
  formatRoutingTable,
  attachTextReporter,
  toJsonReport,
} from './export/report.js';
