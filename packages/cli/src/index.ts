// @proofcost/cli

export {
  runCli,
  processIO,
  UsageError,
  EXIT_OK,
  EXIT_INVALID_PARAMETER,
  EXIT_USAGE,
  type CliIO,
  type RunCliOptions,
} from './program.js';

export { loadConfig, type CliConfig } from './config.js';

export {
  renderJson,
  renderEstimateText,
  renderComparisonText,
  renderVerificationText,
  renderVerificationComparisonText,
  comparisonToJson,
  formatUsd,
  formatGas,
} from './render.js';
