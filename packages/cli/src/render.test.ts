// Tests for output rendering

import { describe, it, expect } from 'vitest';
import {
  compareVerificationCosts,
  compareSystems,
  estimateCost,
  estimateScenarios,
  estimateVerificationCost,
  silentLogger,
} from '@proofcost/runtime';
import {
  comparisonToJson,
  formatGas,
  formatUsd,
  renderComparisonText,
  renderEstimateText,
  renderJson,
  renderVerificationComparisonText,
  renderVerificationText,
} from './render.js';

const defaultEstimate = () =>
  estimateCost({
    txCount: 10000,
    systemKey: 'aztec',
    batchSize: 500,
    securityBits: 128,
    hardwareScale: 1,
  });

describe('renderJson', () => {
  it('sorts keys at every level and indents by two spaces', () => {
    expect(renderJson({ b: 1, a: { d: 2, c: [{ f: 1, e: 2 }] } })).toBe(
      [
        '{',
        '  "a": {',
        '    "c": [',
        '      {',
        '        "e": 2,',
        '        "f": 1',
        '      }',
        '    ],',
        '    "d": 2',
        '  },',
        '  "b": 1',
        '}',
      ].join('\n')
    );
  });

  it('keeps estimate numbers unrounded', () => {
    const parsed: unknown = JSON.parse(renderJson(defaultEstimate()));
    expect(parsed).toMatchObject({ totalUsd: 0.18 * 20, perTxUsd: (0.18 * 20) / 10000 });
  });
});

describe('formatUsd / formatGas', () => {
  it('groups thousands', () => {
    expect(formatUsd(3200)).toBe('$3,200.00');
    expect(formatUsd(-48)).toBe('$-48.00');
    expect(formatGas(2500000)).toBe('2,500,000 gas');
  });
});

describe('renderEstimateText', () => {
  it('renders every group of the default estimate', () => {
    expect(renderEstimateText(defaultEstimate())).toBe(
      [
        'proofcost estimate',
        'System        : Aztec-style zk SNARK System (aztec)',
        'Family        : zk-snark',
        'Description   : Privacy-focused zk rollup proving for encrypted state and contracts.',
        '',
        'Transactions  : 10000',
        'Batch size    : 500',
        'Batches       : 20',
        'Security bits : 128',
        'Hardware x    : 1',
        'Volume factor : 1.0000',
        '',
        'Per-proof estimate:',
        '  Time        : 420.000 ms',
        '  Cost        : $0.180000',
        '',
        'Per-transaction estimate:',
        '  Time        : 0.84000 ms/tx',
        '  Cost        : $0.00036000 per tx',
        '',
        'Total estimate:',
        '  Time        : 8400.000 ms',
        '  Cost        : $3.600000',
      ].join('\n')
    );
  });
});

describe('renderComparisonText', () => {
  it('renders one row per system', () => {
    const comparison = compareSystems({ txCount: 10000 }, { logger: silentLogger });
    expect(renderComparisonText(comparison).split('\n')).toEqual([
      'System     Family       Batches  Per-proof ms  Per-proof USD  Total ms      Total USD',
      'aztec      zk-snark     20       420.000       0.180000       8400.000      3.600000',
      'zama       fhe-hybrid   20       780.000       0.350000       15600.000     7.000000',
      'soundness  verified-zk  20       500.000       0.220000       10000.000     4.400000',
    ]);
  });

  it('lists failures after the table', () => {
    const comparison = estimateScenarios(
      [
        { label: 'aztec', request: { txCount: 10000 } },
        { label: 'weak', request: { txCount: 10000, securityBits: 100 } },
      ],
      { logger: silentLogger }
    );
    expect(renderComparisonText(comparison).split('\n')).toEqual([
      'System     Family       Batches  Per-proof ms  Per-proof USD  Total ms      Total USD',
      'aztec      zk-snark     20       420.000       0.180000       8400.000      3.600000',
      'weak       error: Unsupported security level 100; supported levels: 128, 192, 256',
    ]);
  });

  it('prints only the failures when every scenario failed', () => {
    const comparison = compareSystems({ txCount: 0 }, { logger: silentLogger });
    expect(renderComparisonText(comparison).split('\n')).toEqual([
      'aztec      error: txCount must be a positive integer',
      'zama       error: txCount must be a positive integer',
      'soundness  error: txCount must be a positive integer',
    ]);
  });
});

describe('comparisonToJson', () => {
  it('lists results in order and failures by label', () => {
    const comparison = compareSystems({ txCount: 100, securityBits: 100 }, { logger: silentLogger });
    const json = comparisonToJson(comparison);
    expect(json.results).toEqual([]);
    expect(json.failures[0]).toEqual({
      label: 'aztec',
      code: 'UNSUPPORTED_SECURITY_LEVEL',
      message: 'Unsupported security level 100; supported levels: 128, 192, 256',
    });
  });
});

describe('renderVerificationText', () => {
  it('renders gas, ETH and USD totals', () => {
    const result = estimateVerificationCost(
      { numProofs: 10, gasPerProof: 250000, gasPriceGwei: 30, ethPriceUsd: 3200 },
      { logger: silentLogger }
    );
    expect(renderVerificationText(result)).toBe(
      [
        'Number of proofs      : 10',
        'Gas per proof         : 250,000 gas',
        'Total gas             : 2,500,000 gas',
        'Gas price             : 30.000 gwei',
        'ETH price             : $3,200.00 / ETH',
        '----------------------------------------',
        'Total cost (ETH)      : 0.075000 ETH',
        'Total cost (USD)      : $240.00',
      ].join('\n')
    );
  });
});

describe('renderVerificationComparisonText', () => {
  it('renders both schemes and the verdict', () => {
    const comparison = compareVerificationCosts(
      {
        numProofs: 10,
        gasPerProofA: 250000,
        gasPerProofB: 300000,
        gasPriceGwei: 30,
        ethPriceUsd: 3200,
      },
      { logger: silentLogger }
    );
    expect(renderVerificationComparisonText(comparison)).toBe(
      [
        'Scheme A:',
        '  Gas per proof      : 250,000 gas',
        '  Total gas (A)      : 2,500,000 gas',
        '  Total cost (A)     : 0.075000 ETH ≈ $240.00',
        '',
        'Scheme B:',
        '  Gas per proof      : 300,000 gas',
        '  Total gas (B)      : 3,000,000 gas',
        '  Total cost (B)     : 0.090000 ETH ≈ $288.00',
        '',
        'Comparison (B minus A):',
        '  Extra cost         : 0.015000 ETH ≈ $48.00',
        '  => Scheme B is more expensive.',
      ].join('\n')
    );
  });
});
