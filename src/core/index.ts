/**
 * Core orchestration module.
 * Coordinates translator → executor → verdict per test, and tests per suite.
 */

export {
  translateStep,
  parseModelResponse,
  heuristicAction,
  quotedValueAfterAs,
  describeSite,
  HEURISTIC_RULES,
} from './translator.js';
export type { HeuristicRule } from './translator.js';
export { runTestCase, reachSite, findAlternateSite } from './orchestrator.js';
export type { OrchestratorDeps, ReachedSite } from './orchestrator.js';
export { runSuite, suiteExitCode, effectiveVerdict, isTimeoutError } from './suite.js';
export type { SmokeRun, SuiteEntry, SuiteResult, TestRunner } from './suite.js';
