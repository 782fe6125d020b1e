import { describe, it, expect } from '@jest/globals';
import { resolveDeploymentConfig } from '../../../src/config/resolver';
import { findServiceUrl, formatDuration, formatReport } from '../../../src/cli/output';
import type { PipelineReport } from '../../../src/workflows/pipeline';
import { failed, succeeded } from '../../__support__/utilities/mock-infrastructure';

const config = resolveDeploymentConfig('development', undefined, undefined, {});

describe('formatDuration', () => {
  it.each([
    [0, '0ms'],
    [999, '999ms'],
    [1500, '1.5s'],
    [61000, '1m 1s'],
    [185400, '3m 5s'],
  ])('should render %d as %s', (ms, text) => {
    expect(formatDuration(ms)).toBe(text);
  });
});

describe('findServiceUrl', () => {
  it('should find the resolved URL among nested results', () => {
    const results = [
      succeeded('build'),
      {
        ...succeeded('deployKubernetes'),
        children: [succeeded('push'), { ...succeeded('resolveServiceUrl'), output: 'http://lb.example.com' }],
      },
    ];

    expect(findServiceUrl(results)).toBe('http://lb.example.com');
  });

  it('should ignore a failed lookup', () => {
    expect(findServiceUrl([{ ...failed('resolveServiceUrl'), output: 'http://stale' }])).toBeUndefined();
  });
});

describe('formatReport', () => {
  it('should render a failed run with nested steps and warnings', () => {
    const airflow = { ...failed('awaitAirflow', 'http://localhost:8080 not ready'), level: 'warning' as const };
    const report: PipelineReport = {
      status: 'failed',
      durationMs: 2500,
      results: [
        { ...succeeded('build', 'Built image'), durationMs: 2000 },
        {
          ...failed('deployLocal', 'startServices failed: exited with code 1'),
          durationMs: 500,
          children: [{ ...succeeded('push', 'Push skipped for development'), outcome: 'skipped' }, airflow],
        },
      ],
      warnings: [airflow],
    };
    report.failedStep = report.results[1];

    expect(formatReport(report, config).split('\n')).toEqual([
      '❌ Deployment failed at deployLocal',
      'Environment: development (target: local)',
      'Image:       docker.io/yourusername/dashboard:latest',
      '',
      'Steps:',
      '  ✅ build (2.0s): Built image',
      '  ❌ deployLocal (500ms): startServices failed: exited with code 1',
      '    ⏭️  push (0ms): Push skipped for development',
      '    ⚠️  awaitAirflow (0ms): http://localhost:8080 not ready',
      '',
      '1 warning(s):',
      '  ⚠️  awaitAirflow: http://localhost:8080 not ready',
    ]);
  });

  it('should list the local URLs after a successful local deployment', () => {
    const report: PipelineReport = { status: 'succeeded', durationMs: 0, results: [], warnings: [] };

    expect(formatReport(report, config).split('\n').slice(-2)).toEqual([
      'Dashboard URL: http://localhost:8501',
      'Airflow URL:   http://localhost:8080',
    ]);
  });
});
