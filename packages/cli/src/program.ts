// proofcost command line
//
// Parses arguments with yargs, builds requests, and renders results.
// Exit codes: 0 success, 1 invalid parameter, 2 usage error.

import yargs, { type Argv } from 'yargs';
import {
  compareSystems,
  compareVerificationCosts,
  createLevelLogger,
  estimateCost,
  estimateVerificationCost,
  isEstimatorError,
  parseEstimateRequest,
  type EstimatorLogger,
} from '@proofcost/runtime';
import { DEFAULT_ESTIMATE_PARAMETERS, SECURITY_LEVELS, SYSTEM_KEYS } from '@proofcost/protocol';
import { loadConfig, type CliConfig } from './config.js';
import {
  comparisonToJson,
  renderComparisonText,
  renderEstimateText,
  renderJson,
  renderVerificationComparisonText,
  renderVerificationText,
} from './render.js';

export const EXIT_OK = 0;
export const EXIT_INVALID_PARAMETER = 1;
export const EXIT_USAGE = 2;

/**
 * Where the CLI writes. Each call receives one complete chunk of text.
 */
export type CliIO = {
  stdout(text: string): void;
  stderr(text: string): void;
};

export type RunCliOptions = {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
};

export const processIO: CliIO = {
  stdout(text: string) {
    process.stdout.write(`${text}\n`);
  },
  stderr(text: string) {
    process.stderr.write(`${text}\n`);
  },
};

/**
 * Command-line misuse (missing argument, unknown option)
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// yargs collects a repeated flag into an array
function single<T>(flag: string) {
  return (value: T | T[]): T => {
    if (Array.isArray(value)) {
      throw new UsageError(`--${flag} may be given only once`);
    }
    return value;
  };
}

function scenarioOptions<T>(y: Argv<T>) {
  return y
    .positional('txCount', {
      type: 'number',
      demandOption: true,
      describe: 'Number of transactions to prove',
    })
    .option('batch-size', {
      type: 'number',
      requiresArg: true,
      coerce: single<number>('batch-size'),
      describe: 'Transactions per proof/batch',
      defaultDescription: String(DEFAULT_ESTIMATE_PARAMETERS.batchSize),
    })
    .option('security-bits', {
      type: 'number',
      requiresArg: true,
      coerce: single<number>('security-bits'),
      describe: `Security level in bits (${SECURITY_LEVELS.join(', ')})`,
      defaultDescription: String(DEFAULT_ESTIMATE_PARAMETERS.securityBits),
    })
    .option('hardware-scale', {
      type: 'number',
      requiresArg: true,
      coerce: single<number>('hardware-scale'),
      describe: 'Relative hardware scale factor; >1 for better hardware',
      defaultDescription: DEFAULT_ESTIMATE_PARAMETERS.hardwareScale.toFixed(1),
    });
}

function requiredNumber(flag: string, describe: string) {
  return {
    type: 'number',
    demandOption: true,
    requiresArg: true,
    coerce: single<number>(flag),
    describe,
  } as const;
}

type ScenarioArgs = {
  txCount: number;
  'batch-size'?: number;
  'security-bits'?: number;
  'hardware-scale'?: number;
};

function scenarioInput(args: ScenarioArgs, config: CliConfig) {
  return {
    txCount: args.txCount,
    batchSize: args['batch-size'] ?? config.batchSize,
    securityBits: args['security-bits'] ?? config.securityBits,
    hardwareScale: args['hardware-scale'] ?? config.hardwareScale,
  };
}

function buildParser(args: string[], io: CliIO, config: CliConfig, logger: EstimatorLogger) {
  let exitCode = EXIT_OK;

  // Estimator errors end the command with a message; anything else propagates
  const run = (action: () => string | undefined) => {
    try {
      const output = action();
      if (output !== undefined) {
        io.stdout(output);
      }
    } catch (error) {
      if (!isEstimatorError(error)) {
        throw error;
      }
      logger.debug('Command failed', { code: error.code });
      io.stderr(`error: ${error.message}`);
      exitCode = EXIT_INVALID_PARAMETER;
    }
  };

  const parser = yargs(args)
    .scriptName('proofcost')
    .option('json', {
      type: 'boolean',
      default: false,
      describe: 'Print JSON instead of human-readable text',
    })
    .command(
      '$0 <txCount>',
      'Estimate proof count, latency and cost for a workload',
      (y) =>
        scenarioOptions(y).option('system', {
          type: 'string',
          requiresArg: true,
          coerce: single<string>('system'),
          describe: `Proving system profile (${SYSTEM_KEYS.join(', ')})`,
          defaultDescription: DEFAULT_ESTIMATE_PARAMETERS.systemKey,
        }),
      (argv) =>
        run(() => {
          const request = parseEstimateRequest({
            ...scenarioInput(argv, config),
            systemKey: argv.system ?? config.systemKey,
          });
          logger.debug('Estimating', { ...request });
          const result = estimateCost(request);
          return argv.json ? renderJson(result) : renderEstimateText(result);
        })
    )
    .command(
      'compare <txCount>',
      'Estimate the same workload on every proving system',
      (y) => scenarioOptions(y),
      (argv) =>
        run(() => {
          const comparison = compareSystems(scenarioInput(argv, config), { logger });
          if (comparison.failures.size > 0) {
            exitCode = EXIT_INVALID_PARAMETER;
          }
          if (comparison.estimates.size === 0) {
            for (const [label, error] of comparison.failures) {
              io.stderr(`error: ${label}: ${error.message}`);
            }
            return undefined;
          }
          return argv.json
            ? renderJson(comparisonToJson(comparison))
            : renderComparisonText(comparison);
        })
    )
    .command(
      'verify-cost',
      'Price on-chain verification of a number of proofs',
      (y) =>
        y
          .option('num-proofs', requiredNumber('num-proofs', 'Number of proofs'))
          .option('gas-per-proof', requiredNumber('gas-per-proof', 'On-chain gas cost per proof'))
          .option('gas-price-gwei', requiredNumber('gas-price-gwei', 'Gas price in gwei'))
          .option('eth-price-usd', requiredNumber('eth-price-usd', 'ETH price in USD')),
      (argv) =>
        run(() => {
          const result = estimateVerificationCost(
            {
              numProofs: argv['num-proofs'],
              gasPerProof: argv['gas-per-proof'],
              gasPriceGwei: argv['gas-price-gwei'],
              ethPriceUsd: argv['eth-price-usd'],
            },
            { logger }
          );
          return argv.json ? renderJson(result) : renderVerificationText(result);
        })
    )
    .command(
      'compare-gas',
      'Compare verification cost of two gas-per-proof figures',
      (y) =>
        y
          .option('num-proofs', requiredNumber('num-proofs', 'Number of proofs'))
          .option('gas-per-proof-a', requiredNumber('gas-per-proof-a', 'Gas cost per proof for scheme A'))
          .option('gas-per-proof-b', requiredNumber('gas-per-proof-b', 'Gas cost per proof for scheme B'))
          .option('gas-price-gwei', requiredNumber('gas-price-gwei', 'Gas price in gwei'))
          .option('eth-price-usd', requiredNumber('eth-price-usd', 'ETH price in USD')),
      (argv) =>
        run(() => {
          const comparison = compareVerificationCosts(
            {
              numProofs: argv['num-proofs'],
              gasPerProofA: argv['gas-per-proof-a'],
              gasPerProofB: argv['gas-per-proof-b'],
              gasPriceGwei: argv['gas-price-gwei'],
              ethPriceUsd: argv['eth-price-usd'],
            },
            { logger }
          );
          return argv.json ? renderJson(comparison) : renderVerificationComparisonText(comparison);
        })
    )
    .strict()
    .version(false)
    .help()
    .exitProcess(false)
    .fail((message: string | null, error: Error | undefined) => {
      throw new UsageError(message || error?.message || 'Invalid usage');
    });

  return { parser, exitCode: () => exitCode };
}

/**
 * Run the CLI with the given arguments (without the node/script prefix).
 *
 * @returns The process exit code
 */
export async function runCli(args: string[], options: RunCliOptions = {}): Promise<number> {
  const { io = processIO, env = process.env } = options;

  let config: CliConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (!isEstimatorError(error)) {
      throw error;
    }
    io.stderr(`error: ${error.message}`);
    return EXIT_INVALID_PARAMETER;
  }

  const logger = createLevelLogger((line) => io.stderr(line), config.logLevel);
  const { parser, exitCode } = buildParser(args, io, config, logger);

  try {
    await parser.parseAsync();
  } catch (error) {
    if (!(error instanceof UsageError)) {
      throw error;
    }
    io.stderr(`error: ${error.message}`);
    return EXIT_USAGE;
  }

  return exitCode();
}
