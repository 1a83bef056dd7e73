import type { DeploymentReport } from './DeploymentPipeline.js';

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Plain-text summary printed after an attempt. The failing state is named on
 * its own line so nobody has to read the logs to find it.
 */
export function formatReport(report: DeploymentReport): string {
  const lines = [
    `Deployment ${report.attemptId} of ${report.tenant}: ${report.finalState}`,
  ];

  if (report.failedState && report.error) {
    lines.push(
      `Failed in ${report.failedState}: [${report.error.type}] ${report.error.message}`
    );
    if (report.error.requiresOperator) {
      lines.push('Operator action required; the database was not modified by rollback');
    }
  }
  if (report.rollbackError) {
    lines.push(
      `Rollback failed: [${report.rollbackError.type}] ${report.rollbackError.message}`
    );
  }
  if (report.migrations) {
    const names = report.migrations.migrations.join(', ') || 'none';
    lines.push(`Migrations: ${report.migrations.action} (${names})`);
  }
  if (report.pruned === false) {
    lines.push('Prune failed; see logs');
  }

  lines.push('Steps:');
  for (const step of report.steps) {
    const outcome = step.outcome === 'success' ? 'ok' : 'FAILED';
    lines.push(
      `  ${step.state.padEnd(16)}${outcome.padEnd(8)}${formatDuration(step.durationMs)}`
    );
  }
  lines.push(`Total: ${formatDuration(report.durationMs)}`);

  return lines.join('\n');
}
