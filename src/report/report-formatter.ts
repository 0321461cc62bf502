import type { JsonReport, RunSummary } from '../types.js';

export const RULE = '='.repeat(50);

export interface RenderedReport {
  text: string;
  exitCode: number;
}

export function formatDuration(durationMs: number): string {
  return `${(durationMs / 1000).toFixed(1)}s`;
}

/**
 * Render the end-of-run summary. The exit code is the number of failed
 * modules, so CI can gate on the process status alone.
 */
export function render(summary: RunSummary): RenderedReport {
  const lines: string[] = [
    RULE,
    '📊 Test Suite Summary',
    RULE,
    `Total modules: ${summary.total}`,
    `Passed: ${summary.passed} ✅`,
    `Failed: ${summary.failed} ❌`,
    `Duration: ${formatDuration(summary.durationMs)}`,
    '',
  ];

  if (summary.total === 0) {
    lines.push('No modules in catalogue.');
  } else if (summary.failedModules.length > 0) {
    const logPaths = new Map(
      summary.outcomes.map((outcome) => [outcome.moduleId, outcome.logPath]),
    );

    lines.push('❌ Failed modules:');
    for (const moduleId of summary.failedModules) {
      lines.push(`   - ${moduleId}`);
    }
    lines.push('');
    lines.push('View logs:');
    for (const moduleId of summary.failedModules) {
      lines.push(`   cat ${logPaths.get(moduleId) ?? '(no log)'}`);
    }
  } else {
    lines.push('✅ All modules passed!');
  }

  lines.push(RULE);

  return {
    text: lines.join('\n'),
    exitCode: summary.failed,
  };
}

export function toJsonReport(summary: RunSummary): JsonReport {
  return {
    totalModules: summary.total,
    passed: summary.passed,
    failed: summary.failed,
    failedModules: [...summary.failedModules],
    durationMs: summary.durationMs,
    logDir: summary.logDir,
    results: summary.outcomes,
  };
}
