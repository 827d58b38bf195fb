// Scenario Comparison
//
// Evaluates several independent estimate requests side by side.
// One failing scenario never affects the others.

import type { EstimateRequestInput, EstimateResult } from '@proofcost/protocol';
import { SYSTEM_KEYS } from '@proofcost/protocol';
import { EstimatorError, InvalidParameterError, isEstimatorError } from '../errors.js';
import { consoleLogger, type EstimatorLogger } from '../logging/index.js';
import { estimateCost, parseEstimateRequest, type EstimateOptions } from './estimate.js';

/**
 * A labelled, unvalidated estimate request
 */
export type EstimateScenario = {
  label: string;
  request: unknown;
};

export type EstimateScenariosOptions = EstimateOptions & {
  /**
   * Receives one warning per failed scenario (defaults to console)
   */
  logger?: EstimatorLogger;
};

/**
 * Result of estimating multiple scenarios. Both maps keep input order.
 */
export type EstimateScenariosResult = {
  estimates: Map<string, EstimateResult>;
  failures: Map<string, EstimatorError>;
};

/**
 * Estimate a list of scenarios.
 *
 * @throws InvalidParameterError if two scenarios share a label
 */
export function estimateScenarios(
  scenarios: EstimateScenario[],
  options: EstimateScenariosOptions = {}
): EstimateScenariosResult {
  const { logger = consoleLogger, ...estimateOptions } = options;

  const labels = new Set<string>();
  for (const { label } of scenarios) {
    if (labels.has(label)) {
      throw new InvalidParameterError(`Duplicate scenario label: ${label}`, {
        field: 'label',
        details: { label },
      });
    }
    labels.add(label);
  }

  const estimates = new Map<string, EstimateResult>();
  const failures = new Map<string, EstimatorError>();

  for (const scenario of scenarios) {
    try {
      const request = parseEstimateRequest(scenario.request);
      estimates.set(scenario.label, estimateCost(request, estimateOptions));
    } catch (error) {
      if (!isEstimatorError(error)) {
        throw error;
      }
      logger.warn('Scenario failed', {
        label: scenario.label,
        code: error.code,
        message: error.message,
      });
      failures.set(scenario.label, error);
    }
  }

  return { estimates, failures };
}

/**
 * Estimate the same workload on every catalog profile, labelled by system key.
 *
 * @param params - Shared parameters; any systemKey given is ignored
 */
export function compareSystems(
  params: Omit<EstimateRequestInput, 'systemKey'>,
  options: EstimateScenariosOptions = {}
): EstimateScenariosResult {
  const scenarios = SYSTEM_KEYS.map((systemKey) => ({
    label: systemKey,
    request: { ...params, systemKey },
  }));
  return estimateScenarios(scenarios, options);
}
