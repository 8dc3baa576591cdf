/**
 * Plain-text run reports for the terminal
 */

import type { DockerfileAnalysis, PipelineRun } from '@deckhand/shared';

export function formatRun(run: PipelineRun): string {
  const lines = [`Run ${run.id} [${run.trigger}] ${run.revision.refName}: ${run.status}`];

  for (const stage of run.stages) {
    lines.push(`  ${stage.stage.padEnd(8)} ${stage.status.padEnd(9)} ${stage.durationMs}ms`);
    if (stage.error) {
      lines.push(`    ${stage.error}`);
    }
  }

  if (run.gate) {
    const failed = run.gate.failedStages.length > 0 ? ` (${run.gate.failedStages.join(', ')})` : '';
    lines.push(`Gate: ${run.gate.reason}${failed}`);
  }

  const promotion = run.promotion;
  if (promotion) {
    if (promotion.success) {
      lines.push(`Promotion: ${promotion.refName} restarted on ${promotion.target}`);
    } else {
      lines.push(
        `Promotion: failed at ${promotion.failedStep ?? 'cleanup'}, remote ${promotion.remoteOutcome}, ` +
        `credentials ${promotion.credentialsRemoved ? 'removed' : 'NOT removed'}`
      );
    }
    if (promotion.error) {
      lines.push(`  ${promotion.error}`);
    }
  }

  return `${lines.join('\n')}\n`;
}

export function formatAnalysis(analysis: DockerfileAnalysis): string {
  if (analysis.findings.length === 0) {
    return 'Dockerfile OK\n';
  }
  const lines = analysis.findings.map((finding) =>
    `${finding.severity} ${finding.rule}${finding.line !== undefined ? ` (line ${finding.line})` : ''}: ${finding.message}`
  );
  return `${lines.join('\n')}\n`;
}
