export {
  estimateVerificationCost,
  compareVerificationCosts,
  verdictFor,
  ETH_PER_GWEI,
  type VerificationOptions,
} from './gas.js';
