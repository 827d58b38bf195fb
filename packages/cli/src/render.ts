// Output rendering
//
// Turns computed results into text or JSON. Numbers stay unrounded in JSON;
// text output fixes the precision per field.

import type {
  EstimateResult,
  VerificationComparison,
  VerificationCostResult,
} from '@proofcost/protocol';
import type { EstimateScenariosResult } from '@proofcost/runtime';

const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const usdFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.keys(value)
        .sort()
        .map((key) => [key, sortKeys(value[key])])
    );
  }
  return value;
}

/**
 * Two-space indented JSON with object keys sorted.
 */
export function renderJson(value: unknown): string {
  return JSON.stringify(sortKeys(value), null, 2);
}

export function formatUsd(amount: number): string {
  return `$${usdFormat.format(amount)}`;
}

export function formatGas(gas: number): string {
  return `${integerFormat.format(gas)} gas`;
}

export function renderEstimateText(result: EstimateResult): string {
  return [
    'proofcost estimate',
    `System        : ${result.systemName} (${result.system})`,
    `Family        : ${result.family}`,
    `Description   : ${result.description}`,
    '',
    `Transactions  : ${result.txCount}`,
    `Batch size    : ${result.batchSize}`,
    `Batches       : ${result.batches}`,
    `Security bits : ${result.securityBits}`,
    `Hardware x    : ${result.hardwareScale}`,
    `Volume factor : ${result.volumeFactor.toFixed(4)}`,
    '',
    'Per-proof estimate:',
    `  Time        : ${result.perProofMs.toFixed(3)} ms`,
    `  Cost        : $${result.perProofUsd.toFixed(6)}`,
    '',
    'Per-transaction estimate:',
    `  Time        : ${result.perTxMs.toFixed(5)} ms/tx`,
    `  Cost        : $${result.perTxUsd.toFixed(8)} per tx`,
    '',
    'Total estimate:',
    `  Time        : ${result.totalMs.toFixed(3)} ms`,
    `  Cost        : $${result.totalUsd.toFixed(6)}`,
  ].join('\n');
}

const COMPARISON_COLUMNS: ReadonlyArray<readonly [string, number]> = [
  ['System', 11],
  ['Family', 13],
  ['Batches', 9],
  ['Per-proof ms', 14],
  ['Per-proof USD', 15],
  ['Total ms', 14],
  ['Total USD', 0],
];

function row(cells: string[]): string {
  return cells
    .map((cell, index) => cell.padEnd(COMPARISON_COLUMNS[index]?.[1] ?? 0))
    .join('')
    .trimEnd();
}

/**
 * One row per scenario, then one line per failed scenario.
 */
export function renderComparisonText(comparison: EstimateScenariosResult): string {
  // No table when nothing succeeded; only the failures remain
  const lines =
    comparison.estimates.size > 0 ? [row(COMPARISON_COLUMNS.map(([title]) => title))] : [];

  for (const [label, result] of comparison.estimates) {
    lines.push(
      row([
        label,
        result.family,
        String(result.batches),
        result.perProofMs.toFixed(3),
        result.perProofUsd.toFixed(6),
        result.totalMs.toFixed(3),
        result.totalUsd.toFixed(6),
      ])
    );
  }

  for (const [label, error] of comparison.failures) {
    lines.push(`${label.padEnd(11)}error: ${error.message}`);
  }

  return lines.join('\n');
}

/**
 * Structured form of a comparison: results in order, failures by label.
 */
export function comparisonToJson(comparison: EstimateScenariosResult): {
  results: EstimateResult[];
  failures: { label: string; code: string; message: string }[];
} {
  return {
    results: [...comparison.estimates.values()],
    failures: [...comparison.failures].map(([label, error]) => ({
      label,
      code: error.code,
      message: error.message,
    })),
  };
}

export function renderVerificationText(result: VerificationCostResult): string {
  return [
    `Number of proofs      : ${result.numProofs}`,
    `Gas per proof         : ${formatGas(result.gasPerProof)}`,
    `Total gas             : ${formatGas(result.totalGas)}`,
    `Gas price             : ${result.gasPriceGwei.toFixed(3)} gwei`,
    `ETH price             : ${formatUsd(result.ethPriceUsd)} / ETH`,
    '-'.repeat(40),
    `Total cost (ETH)      : ${result.totalEth.toFixed(6)} ETH`,
    `Total cost (USD)      : ${formatUsd(result.totalUsd)}`,
  ].join('\n');
}

const VERDICT_LINES: Record<VerificationComparison['verdict'], string> = {
  b_more_expensive: '  => Scheme B is more expensive.',
  b_cheaper: '  => Scheme B is cheaper.',
  equal: '  => Costs are equal.',
};

function schemeLines(name: 'A' | 'B', scheme: VerificationCostResult): string[] {
  return [
    `Scheme ${name}:`,
    `  Gas per proof      : ${formatGas(scheme.gasPerProof)}`,
    `  Total gas (${name})      : ${formatGas(scheme.totalGas)}`,
    `  Total cost (${name})     : ${scheme.totalEth.toFixed(6)} ETH ≈ ${formatUsd(scheme.totalUsd)}`,
  ];
}

export function renderVerificationComparisonText(comparison: VerificationComparison): string {
  return [
    ...schemeLines('A', comparison.a),
    '',
    ...schemeLines('B', comparison.b),
    '',
    'Comparison (B minus A):',
    `  Extra cost         : ${comparison.diffEth.toFixed(6)} ETH ≈ ${formatUsd(comparison.diffUsd)}`,
    VERDICT_LINES[comparison.verdict],
  ].join('\n');
}
