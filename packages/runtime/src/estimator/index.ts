// Proof cost estimation module

export {
  estimateCost,
  parseEstimateRequest,
  calculateBatches,
  securityFactorFor,
  type EstimateOptions,
} from './estimate.js';

export {
  createLogVolumeCurve,
  defaultVolumeCurve,
  flatVolumeCurve,
  clamp,
  REFERENCE_VOLUME,
  type VolumeCurve,
  type LogVolumeCurveOptions,
} from './volume.js';

export {
  estimateScenarios,
  compareSystems,
  type EstimateScenario,
  type EstimateScenariosOptions,
  type EstimateScenariosResult,
} from './scenarios.js';
