// @proofcost/runtime
// Proof cost estimation and on-chain verification pricing

// Error types
export {
  EstimatorError,
  InvalidParameterError,
  UnknownSystemError,
  UnsupportedSecurityLevelError,
  isEstimatorError,
  toEstimatorError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createEntryLogger,
  createLevelLogger,
  createCapturingLogger,
  formatLogLine,
  LOG_THRESHOLDS,
  type EstimatorLogger,
  type LogLevel,
  type LogThreshold,
  type LogEntry,
} from './logging/index.js';

// Estimation
export {
  estimateCost,
  parseEstimateRequest,
  calculateBatches,
  securityFactorFor,
  createLogVolumeCurve,
  defaultVolumeCurve,
  flatVolumeCurve,
  clamp,
  REFERENCE_VOLUME,
  estimateScenarios,
  compareSystems,
  type EstimateOptions,
  type VolumeCurve,
  type LogVolumeCurveOptions,
  type EstimateScenario,
  type EstimateScenariosOptions,
  type EstimateScenariosResult,
} from './estimator/index.js';

// On-chain verification
export {
  estimateVerificationCost,
  compareVerificationCosts,
  verdictFor,
  ETH_PER_GWEI,
  type VerificationOptions,
} from './verification/index.js';
