/**
 * Dashboard Deployer CLI
 * Command-line interface for building and deploying the dashboard stack
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { loadRuntimeSettings, type ProcessEnvironment } from '../config';
import { resolveDeploymentConfig } from '../config/resolver';
import { errorMessage, isConfigError } from '../errors';
import { createLogger } from '../lib/logger';
import { CommandExecutor } from '../infrastructure/command-executor';
import { ExternalCommandGateway, type CommandGateway } from '../infrastructure/command-gateway';
import { createDockerClient } from '../infrastructure/docker';
import { createKubernetesClient } from '../infrastructure/kubernetes';
import type { Clock } from '../shared/async';
import type { DeploymentConfig } from '../domain/types';
import { createDeploymentPlan, describePlan } from '../workflows/deployment-plan';
import { createStepContext, runPipeline, type Step } from '../workflows/pipeline';
import { initWorkspace } from '../workflows/workspace-setup';
import { formatInitResults, formatJsonReport, formatPlan, formatReport } from './output';

export const EXIT_CODES = {
  success: 0,
  stepFailed: 1,
  configError: 2,
  cancelled: 130,
} as const;

export interface CliDependencies {
  env: ProcessEnvironment;
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  createLogger: (level: string) => Logger;
  createGateway: (logger: Logger, signal: AbortSignal) => CommandGateway;
  plan?: () => Step[];
  clock?: Clock;
  signal?: AbortSignal;
}

export interface DeployArguments {
  environment?: string;
  registry?: string;
  tag?: string;
}

export interface DeployOptions {
  logLevel?: string;
  json?: boolean;
  dryRun?: boolean;
}

function readVersion(): string {
  // src/cli -> root when run from sources, dist/src/cli -> root when built
  const candidates = [join(__dirname, '../../package.json'), join(__dirname, '../../../package.json')];
  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf-8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
  }
  return '0.0.0';
}

export function createGateway(logger: Logger, signal: AbortSignal): CommandGateway {
  return new ExternalCommandGateway({
    docker: createDockerClient(logger),
    kubernetes: () => createKubernetesClient(logger),
    runner: new CommandExecutor(logger),
    logger,
    signal,
  });
}

export const defaultDependencies = (): CliDependencies => ({
  env: process.env,
  cwd: process.cwd(),
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  createLogger: (level) => createLogger({ level }),
  createGateway,
});

function reportConfigError(deps: CliDependencies, error: unknown): number {
  if (!isConfigError(error)) throw error;
  deps.stderr(`❌ Configuration error: ${error.message}`);
  return EXIT_CODES.configError;
}

/**
 * Resolve, run and report one deployment. Returns the process exit code.
 */
export async function runDeploy(
  args: DeployArguments,
  options: DeployOptions,
  deps: CliDependencies,
): Promise<number> {
  let logger: Logger;
  let config: DeploymentConfig;
  try {
    const settings = loadRuntimeSettings(deps.env, {
      ...(options.logLevel !== undefined && { logLevel: options.logLevel }),
    });
    logger = deps.createLogger(settings.logLevel);
    config = resolveDeploymentConfig(args.environment, args.registry, args.tag, deps.env);
  } catch (error) {
    return reportConfigError(deps, error);
  }

  const plan = (deps.plan ?? createDeploymentPlan)();
  if (options.dryRun) {
    const planned = describePlan(plan, config);
    deps.stdout(
      options.json ? JSON.stringify({ dryRun: true, plan: planned }, null, 2) : formatPlan(planned, config),
    );
    return EXIT_CODES.success;
  }

  const runLogger = logger.child({ runId: nanoid(10), environment: config.environment, target: config.target });
  runLogger.info({ config }, 'Starting deployment');

  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort();
  if (deps.signal?.aborted) controller.abort();
  deps.signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    const gateway = deps.createGateway(runLogger, controller.signal);
    const context = createStepContext(gateway, runLogger, {
      signal: controller.signal,
      ...(deps.clock !== undefined && { clock: deps.clock }),
    });
    const report = await runPipeline(config, plan, context);

    deps.stdout(options.json ? formatJsonReport(report, config) : formatReport(report, config));
    runLogger.info({ status: report.status, durationMs: report.durationMs }, 'Deployment finished');

    if (report.status === 'cancelled') return EXIT_CODES.cancelled;
    if (report.failedStep !== undefined) {
      const failed = report.failedStep;
      deps.stderr(`❌ Step ${failed.step} failed: ${failed.message}`);
      if (failed.diagnostics !== undefined) deps.stderr(failed.diagnostics);
      return EXIT_CODES.stepFailed;
    }
    return EXIT_CODES.success;
  } finally {
    deps.signal?.removeEventListener('abort', forwardAbort);
  }
}

export async function runInit(directory: string, deps: CliDependencies): Promise<number> {
  const logger = deps.createLogger(loadRuntimeSettings(deps.env).logLevel);
  const results = await initWorkspace(directory, logger);
  deps.stdout(formatInitResults(results));
  return results.some((result) => result.outcome === 'failed') ? EXIT_CODES.stepFailed : EXIT_CODES.success;
}

/**
 * Build the commander program. The chosen command's exit code is handed to
 * `onExit`.
 */
export function createProgram(deps: CliDependencies, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('dashboard-deploy')
    .description('Build, push and deploy the dashboard stack locally or to Kubernetes')
    .version(readVersion())
    .argument('[environment]', 'development, staging or production (default: development)')
    .argument('[registry]', 'image registry (default: docker.io/yourusername)')
    .argument('[tag]', 'image tag (default: latest)')
    .option('--log-level <level>', 'logging level: debug, info, warn, error (default: info)')
    .option('--json', 'print the report as JSON')
    .option('--dry-run', 'print the deployment plan without running it')
    .addHelpText(
      'after',
      `

Examples:
  $ dashboard-deploy                                    Deploy locally with docker compose
  $ dashboard-deploy production registry.example.com v1.2.0
  $ dashboard-deploy staging --dry-run                  Show what would run
  $ dashboard-deploy init                               Create data/log directories and .env

Environment Variables:
  DATABASE_URL, REDIS_URL   Required for Kubernetes deployments
  CLOUD_PROVIDER            minikube or generic (default: generic)
  DEPLOY_TARGET             local or kubernetes (default: by environment)
  REGISTRY_USERNAME         Registry credentials for push (with REGISTRY_PASSWORD)
  READY_TIMEOUT             Readiness deadline in seconds
  LOG_LEVEL                 Logging level (debug, info, warn, error)
`,
    )
    .action(
      async (
        environment: string | undefined,
        registry: string | undefined,
        tag: string | undefined,
        options: DeployOptions,
      ) => {
        const args: DeployArguments = {
          ...(environment !== undefined && { environment }),
          ...(registry !== undefined && { registry }),
          ...(tag !== undefined && { tag }),
        };
        onExit(await runDeploy(args, options, deps));
      },
    );

  program
    .command('init')
    .description('Prepare the workspace: runtime directories and .env from .env.example')
    .option('--dir <path>', 'workspace directory', deps.cwd)
    .action(async (options: { dir: string }) => {
      onExit(await runInit(options.dir, deps));
    });

  return program;
}

/**
 * Entry point: wires signals to cancellation and sets the exit code
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const controller = new AbortController();
  const cancel = (): void => {
    process.stderr.write('\n🛑 Cancelling deployment...\n');
    controller.abort();
  };
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  const deps: CliDependencies = { ...defaultDependencies(), signal: controller.signal };
  try {
    await createProgram(deps, (code) => {
      process.exitCode = code;
    }).parseAsync(argv);
  } catch (error) {
    process.stderr.write(`❌ ${errorMessage(error)}\n`);
    process.exitCode = EXIT_CODES.stepFailed;
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
  }
}
