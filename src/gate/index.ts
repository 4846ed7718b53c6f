export { aggregateRun, classificationRunMetrics, toSummaryJSON } from './aggregator.js';
export { actualFor, decideGate, findBreach, gateDecisionToJSON, PASS_RATE } from './gate-decider.js';
export {
  diffRuns,
  metricDeltas,
  numericScores,
  regressionDiffToJSON,
  selectBaseline,
} from './regression-differ.js';
export { canTransition, isTerminal, transition } from './run-state.js';
