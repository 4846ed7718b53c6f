export {
  renderDuration,
  renderNumber,
  renderNumberDiff,
  renderPercentage,
} from './render-numbers.js';
export type { RunTableOptions } from './renderer.js';
export { renderGateDecision, renderRegressionDiff, renderRunTable } from './renderer.js';
