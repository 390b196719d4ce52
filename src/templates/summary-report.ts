import { Outcome, Summary } from '../types/index.js';

const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

export function formatBytes(size: number): string {
  let value = size;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[0]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * Plain text report: totals, the store listing and this run's failures
 */
export function renderSummaryReport(summary: Summary, storeDirectory: string, outcomes: readonly Outcome[] = []): string[] {
  const lines = [
    'Provisioning summary',
    `  Total instances: ${summary.total}`,
    `  Successful:      ${summary.successful}`,
    `  Failed:          ${summary.failed}`,
    '',
    `Artifacts in ${storeDirectory} (${summary.artifacts.length}):`
  ];

  if (summary.artifacts.length === 0) {
    lines.push('  (none)');
  } else {
    const width = Math.max(...summary.artifacts.map(artifact => artifact.fileName.length));
    for (const artifact of summary.artifacts) {
      lines.push(`  ${artifact.fileName.padEnd(width)}  ${formatBytes(artifact.size)}`);
    }
  }

  const failures = outcomes.filter(
    (outcome): outcome is Extract<Outcome, { status: 'failed' }> => outcome.status === 'failed'
  );
  if (failures.length > 0) {
    lines.push('', `Failed this run (${failures.length}):`);
    for (const failure of failures) {
      const where = failure.logPath ? `log: ${failure.logPath}` : failure.error.message;
      lines.push(`  ${failure.instanceId}  (${where})`);
    }
  }

  return lines;
}
