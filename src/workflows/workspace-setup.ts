/**
 * Workspace preparation for `init`: runtime directories and a `.env`
 * seeded from `.env.example`.
 */

import { copyFile, mkdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import type { StepResult } from '../domain/types';
import { errorMessage } from '../errors';
import { WORKSPACE_DIRECTORIES } from '../config/defaults';

export const ENV_TEMPLATE = '.env.example';
export const ENV_FILE = '.env';

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
}

function result(
  step: string,
  outcome: StepResult['outcome'],
  message: string,
  level: StepResult['level'] = 'info',
): StepResult {
  return {
    step,
    outcome,
    message,
    exitCode: outcome === 'failed' ? 1 : 0,
    level,
    durationMs: 0,
  };
}

async function createDirectories(root: string): Promise<StepResult> {
  try {
    const created: string[] = [];
    for (const directory of WORKSPACE_DIRECTORIES) {
      const path = join(root, directory);
      if (await exists(path)) continue;
      await mkdir(path, { recursive: true });
      created.push(directory);
    }
    return result(
      'directories',
      'succeeded',
      created.length > 0 ? `Created ${created.join(', ')}` : 'All directories already exist',
    );
  } catch (error) {
    return result('directories', 'failed', `Cannot create directories: ${errorMessage(error)}`, 'error');
  }
}

async function seedEnvironmentFile(root: string): Promise<StepResult> {
  const target = join(root, ENV_FILE);
  const template = join(root, ENV_TEMPLATE);
  try {
    if (await exists(target)) {
      return result('envFile', 'skipped', `${ENV_FILE} already exists`);
    }
    if (!(await exists(template))) {
      return result('envFile', 'skipped', `${ENV_TEMPLATE} not found; create ${ENV_FILE} manually`, 'warning');
    }
    await copyFile(template, target);
    return result('envFile', 'succeeded', `Created ${ENV_FILE} from ${ENV_TEMPLATE}; edit it before deploying`);
  } catch (error) {
    return result('envFile', 'failed', `Cannot create ${ENV_FILE}: ${errorMessage(error)}`, 'error');
  }
}

/**
 * Prepare `root` for local deployments. Safe to run repeatedly.
 */
export async function initWorkspace(root: string, logger: Logger): Promise<StepResult[]> {
  const results = [await createDirectories(root), await seedEnvironmentFile(root)];
  for (const entry of results) {
    const fields = { step: entry.step, outcome: entry.outcome, root };
    if (entry.level === 'error') logger.error(fields, entry.message);
    else if (entry.level === 'warning') logger.warn(fields, entry.message);
    else logger.info(fields, entry.message);
  }
  return results;
}
