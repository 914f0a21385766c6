import pc from 'picocolors';
import type { BatchSummary } from '../../orchestrator/scheduler.js';
import type { TrialResult } from '../../types.js';

/** Build logs are long; the terminal shows only the end of them. */
export const OUTPUT_TAIL_LINES = 50;

export function tailLines(text: string, count = OUTPUT_TAIL_LINES): string {
  const lines = text.replace(/\s+$/, '').split('\n');
  if (lines.length <= count) {
    return lines.join('\n');
  }
  return [`... (${lines.length - count} earlier lines omitted)`, ...lines.slice(-count)].join('\n');
}

export function formatDuration(seconds: number | null): string {
  if (seconds === null) {
    return '-';
  }
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds - minutes * 60)}s`;
}

export function formatTrialResult(result: TrialResult): string {
  const lines: string[] = [];
  const status = result.success ? pc.green('✓ PASSED') : pc.red('✗ FAILED');
  lines.push(`${status} ${pc.bold(result.taskId)} ${pc.dim(result.prUrl)}`);
  lines.push(`   Trial:    ${result.trialName}`);
  lines.push(`   Duration: ${formatDuration(result.durationSec)}`);
  lines.push(`   Attempts: ${result.attempts}`);
  lines.push(`   Results:  ${result.trialDir}`);

  if (result.exceptionInfo) {
    lines.push(pc.red(`   Error (${result.exceptionInfo.kind}): ${result.exceptionInfo.exceptionMessage}`));
  }

  const verification = result.verificationResult;
  if (verification) {
    lines.push(`   Tasks:    ${verification.tasksRun.join(', ') || '-'}`);
    if (!verification.success) {
      if (verification.errorMessage) {
        lines.push(pc.red(`   ${verification.errorMessage}`));
      }
      lines.push('', pc.dim(tailLines(verification.compilationOutput)));
    }
  }

  return lines.join('\n');
}

export function formatBatchSummary(summary: BatchSummary): string {
  const lines = [
    pc.bold('Summary:'),
    `   Total:   ${summary.total}`,
    pc.green(`   Success: ${summary.succeeded}`),
    pc.red(`   Failed:  ${summary.failed}`),
    `   Avg duration: ${formatDuration(summary.metrics.avgDurationSec)}`,
  ];
  if (summary.failedKeys.length > 0) {
    lines.push('', pc.bold('Failed trials:'), ...summary.failedKeys.map((key) => `   - ${key}`));
  }
  return lines.join('\n');
}
