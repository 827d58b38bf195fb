// Request Validation
//
// Validates raw estimate and verification parameters before any arithmetic.
// Omitted optional fields take the documented defaults; invalid values are
// reported, never replaced.

import { z } from 'zod';
import type { EstimatorErrorCode } from '../types/common.js';
import type { EstimateRequest } from '../types/estimates.js';
import type {
  VerificationComparisonRequest,
  VerificationCostRequest,
} from '../types/verification.js';
import { DEFAULT_ESTIMATE_PARAMETERS } from '../defaults/index.js';
import { SECURITY_LEVELS, SYSTEM_KEYS, isSecurityBits } from '../profiles/catalog.js';

/**
 * A single failing field
 */
export type RequestValidationError = {
  /**
   * Name of the offending parameter ("request" when the input is not an object)
   */
  field: string;
  message: string;
  code: EstimatorErrorCode;
  /**
   * The raw value that was rejected
   */
  value?: unknown;
};

export type RequestValidationResult<T> =
  | { valid: true; value: T; errors: [] }
  | { valid: false; errors: RequestValidationError[] };

function positiveInteger(field: string) {
  return z
    .number({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a number`,
    })
    .int({ message: `${field} must be an integer` })
    .positive({ message: `${field} must be a positive integer` })
    .safe({ message: `${field} must be at most ${Number.MAX_SAFE_INTEGER}` });
}

function positiveReal(field: string) {
  return z
    .number({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a number`,
    })
    .finite({ message: `${field} must be finite` })
    .positive({ message: `${field} must be > 0` });
}

export const EstimateRequestSchema = z.object({
  txCount: positiveInteger('txCount'),
  systemKey: z
    .enum(SYSTEM_KEYS, {
      errorMap: () => ({ message: `systemKey must be one of: ${SYSTEM_KEYS.join(', ')}` }),
    })
    .default(DEFAULT_ESTIMATE_PARAMETERS.systemKey),
  batchSize: positiveInteger('batchSize').default(DEFAULT_ESTIMATE_PARAMETERS.batchSize),
  securityBits: z
    .custom<EstimateRequest['securityBits']>(isSecurityBits, {
      message: `securityBits must be one of: ${SECURITY_LEVELS.join(', ')}`,
    })
    .default(DEFAULT_ESTIMATE_PARAMETERS.securityBits),
  hardwareScale: positiveReal('hardwareScale').default(DEFAULT_ESTIMATE_PARAMETERS.hardwareScale),
});

export const VerificationCostRequestSchema = z.object({
  numProofs: positiveInteger('numProofs'),
  gasPerProof: positiveInteger('gasPerProof'),
  gasPriceGwei: positiveReal('gasPriceGwei'),
  ethPriceUsd: positiveReal('ethPriceUsd'),
});

export const VerificationComparisonRequestSchema = z.object({
  numProofs: positiveInteger('numProofs'),
  gasPerProofA: positiveInteger('gasPerProofA'),
  gasPerProofB: positiveInteger('gasPerProofB'),
  gasPriceGwei: positiveReal('gasPriceGwei'),
  ethPriceUsd: positiveReal('ethPriceUsd'),
});

const FIELD_ERROR_CODES: Readonly<Partial<Record<string, EstimatorErrorCode>>> = {
  systemKey: 'UNKNOWN_SYSTEM',
  securityBits: 'UNSUPPORTED_SECURITY_LEVEL',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Run a schema and collapse its issues to one error per field,
 * in schema field order.
 */
function validateWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): RequestValidationResult<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { valid: true, value: parsed.data, errors: [] };
  }

  const errors: RequestValidationError[] = [];
  const seen = new Set<string>();

  for (const issue of parsed.error.issues) {
    const head = issue.path[0];
    const field = head === undefined ? 'request' : String(head);
    if (seen.has(field)) {
      continue;
    }
    seen.add(field);

    errors.push({
      field,
      message: field === 'request' ? 'Request must be an object' : issue.message,
      code: FIELD_ERROR_CODES[field] ?? 'INVALID_PARAMETER',
      value: isRecord(input) ? input[field] : input,
    });
  }

  return { valid: false, errors };
}

/**
 * Validate raw estimate parameters.
 *
 * @param input - Untrusted parameters (e.g. from a command line or request body)
 * @returns The complete request with defaults applied, or every failing field
 */
export function validateEstimateRequest(input: unknown): RequestValidationResult<EstimateRequest> {
  return validateWith(EstimateRequestSchema, input);
}

export function validateVerificationCostRequest(
  input: unknown
): RequestValidationResult<VerificationCostRequest> {
  return validateWith(VerificationCostRequestSchema, input);
}

export function validateVerificationComparisonRequest(
  input: unknown
): RequestValidationResult<VerificationComparisonRequest> {
  return validateWith(VerificationComparisonRequestSchema, input);
}
