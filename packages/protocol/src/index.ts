// @proofcost/protocol
// Profiles, request/result types and request validation

export * from './types/index.js';

export {
  SYSTEM_KEYS,
  SECURITY_LEVELS,
  PROVING_SYSTEM_PROFILES,
  isSystemKey,
  isSecurityBits,
  getProfile,
  listProfiles,
} from './profiles/catalog.js';

export { DEFAULT_ESTIMATE_PARAMETERS, LARGE_PROOF_COUNT_THRESHOLD } from './defaults/index.js';

export {
  EstimateRequestSchema,
  VerificationCostRequestSchema,
  VerificationComparisonRequestSchema,
  validateEstimateRequest,
  validateVerificationCostRequest,
  validateVerificationComparisonRequest,
  type RequestValidationError,
  type RequestValidationResult,
} from './validation/requests.js';
