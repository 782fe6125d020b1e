/**
 * Report rendering for the CLI. Text mode is for humans; JSON mode carries
 * the same data for scripts.
 */

import type { DeploymentConfig, StepResult } from '../domain/types';
import { formatImageRef } from '../domain/types';
import type { PipelineReport } from '../workflows/pipeline';
import type { PlannedStep } from '../workflows/deployment-plan';

const ICONS: Record<StepResult['outcome'], string> = {
  succeeded: '✅',
  failed: '❌',
  skipped: '⏭️ ',
};

const WARNING_ICON = '⚠️ ';

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds - minutes * 60)}s`;
}

function icon(result: StepResult): string {
  return result.level === 'warning' && result.outcome !== 'succeeded' ? WARNING_ICON : ICONS[result.outcome];
}

function formatStep(result: StepResult, depth: number): string[] {
  const indent = '  '.repeat(depth + 1);
  const retries = result.attempts !== undefined && result.attempts > 1 ? ` [${result.attempts} attempts]` : '';
  const timing = `(${formatDuration(result.durationMs)})${retries}`;
  const line = `${indent}${icon(result)} ${result.step} ${timing}: ${result.message}`;
  const nested = (result.children ?? []).flatMap((child) => formatStep(child, depth + 1));
  return [line, ...nested];
}

function describeConfig(config: DeploymentConfig): string[] {
  return [
    `Environment: ${config.environment} (target: ${config.target})`,
    `Image:       ${formatImageRef(config.image)}`,
    ...(config.target === 'kubernetes'
      ? [`Namespace:   ${config.namespace} (provider: ${config.cloudProvider ?? 'generic'})`]
      : []),
  ];
}

/**
 * The service URL resolved by the cluster deploy, when there is one
 */
export function findServiceUrl(results: readonly StepResult[]): string | undefined {
  for (const result of results) {
    if (result.step === 'resolveServiceUrl' && result.outcome === 'succeeded' && result.output !== undefined) {
      return result.output;
    }
    const nested = findServiceUrl(result.children ?? []);
    if (nested !== undefined) return nested;
  }
  return undefined;
}

export function formatReport(report: PipelineReport, config: DeploymentConfig): string {
  const headline =
    report.status === 'succeeded'
      ? `🎉 Deployment succeeded in ${formatDuration(report.durationMs)}`
      : report.status === 'cancelled'
        ? '🛑 Deployment cancelled'
        : `❌ Deployment failed at ${report.failedStep?.step ?? 'unknown step'}`;

  const lines = [headline, ...describeConfig(config), '', 'Steps:'];
  for (const result of report.results) lines.push(...formatStep(result, 0));

  const url = findServiceUrl(report.results);
  if (url !== undefined) lines.push('', `Dashboard URL: ${url}`);
  else if (report.status === 'succeeded' && config.target === 'local') {
    lines.push('', `Dashboard URL: ${config.dashboardUrl}`, `Airflow URL:   ${config.airflowUrl}`);
  }

  if (report.warnings.length > 0) {
    lines.push('', `${report.warnings.length} warning(s):`);
    for (const warning of report.warnings) lines.push(`  ${WARNING_ICON} ${warning.step}: ${warning.message}`);
  }
  return lines.join('\n');
}

export function formatJsonReport(report: PipelineReport, config: DeploymentConfig): string {
  const serviceUrl = findServiceUrl(report.results);
  return JSON.stringify(
    {
      status: report.status,
      environment: config.environment,
      target: config.target,
      image: formatImageRef(config.image),
      durationMs: report.durationMs,
      ...(serviceUrl !== undefined && { serviceUrl }),
      ...(report.failedStep !== undefined && { failedStep: report.failedStep.step }),
      results: report.results,
    },
    null,
    2,
  );
}

export function formatPlan(plan: readonly PlannedStep[], config: DeploymentConfig): string {
  const lines = ['📋 Deployment plan (dry run)', ...describeConfig(config), ''];
  for (const step of plan) {
    const indent = '  '.repeat(step.depth + 1);
    const flags = [step.advisory ? 'advisory' : undefined, step.retryable ? 'retryable' : undefined].filter(
      (flag): flag is string => flag !== undefined,
    );
    const suffix = flags.length > 0 ? ` [${flags.join(', ')}]` : '';
    const detail = step.applies ? (step.description ?? '') : `skip: ${step.note ?? ''}`;
    lines.push(`${indent}${step.applies ? '•' : '-'} ${step.name}${suffix}${detail ? ` - ${detail}` : ''}`);
  }
  return lines.join('\n');
}

export function formatInitResults(results: readonly StepResult[]): string {
  return results.map((result) => `${icon(result)} ${result.message}`).join('\n');
}
