import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough } from 'node:stream';
import {
  BUILD_DIAGNOSTIC_LINES,
  createDockerClient,
  progressError,
  type DockerEngine,
} from '../../../../src/infrastructure/docker/client';
import { createTestLogger } from '../../../__support__/utilities/mock-infrastructure';

type FollowProgress = DockerEngine['modem']['followProgress'];

/**
 * Engine stand-in whose progress streams replay `events` and then finish cleanly
 */
function createEngine(events: unknown[] = []) {
  const push = jest.fn<ReturnType<DockerEngine['getImage']>['push']>(async () => new PassThrough());
  const engine = {
    ping: jest.fn<DockerEngine['ping']>(async () => 'OK'),
    buildImage: jest.fn<DockerEngine['buildImage']>(async () => new PassThrough()),
    getImage: jest.fn<DockerEngine['getImage']>(() => ({ push })),
    modem: {
      followProgress: jest.fn<FollowProgress>((_stream, onFinished, onProgress) => {
        for (const event of events) onProgress(event);
        onFinished(null);
      }),
    },
  } satisfies DockerEngine;
  return { engine, push };
}

describe('createDockerClient', () => {
  let context: string;

  beforeEach(async () => {
    context = await mkdtemp(join(tmpdir(), 'docker-client-'));
    await mkdir(join(context, 'infrastructure'));
    await writeFile(join(context, 'infrastructure', 'Dockerfile'), 'FROM python:3.11-slim\n');
    await writeFile(join(context, 'requirements.txt'), 'streamlit\n');
  });

  afterEach(async () => {
    await rm(context, { recursive: true, force: true });
  });

  describe('buildImage', () => {
    it('should hand the engine the context directory and its entries', async () => {
      const { engine } = createEngine([
        { stream: 'Step 1/2 : FROM python:3.11-slim\n' },
        { stream: '\n' },
        { aux: { ID: 'sha256:built' } },
      ]);

      const result = await createDockerClient(createTestLogger(), engine).buildImage({
        context,
        dockerfile: 'infrastructure/Dockerfile',
        tag: 'registry.example.com/team/dashboard:v1',
        buildArgs: { ENVIRONMENT: 'production' },
      });

      expect(result).toEqual({
        ok: true,
        value: { imageId: 'sha256:built', logs: ['Step 1/2 : FROM python:3.11-slim'] },
      });
      expect(engine.buildImage).toHaveBeenCalledWith(
        { context, src: expect.arrayContaining(['infrastructure', 'requirements.txt']) },
        {
          t: 'registry.example.com/team/dashboard:v1',
          dockerfile: 'infrastructure/Dockerfile',
          buildargs: { ENVIRONMENT: 'production' },
        },
      );
    });

    it('should keep the trailing build output when the build fails', async () => {
      const lines = Array.from({ length: 25 }, (_, i) => ({ stream: `line ${i + 1}\n` }));
      const { engine } = createEngine([
        ...lines,
        { error: 'pip failed', errorDetail: { message: 'The command returned a non-zero code: 1' } },
      ]);

      const result = await createDockerClient(createTestLogger(), engine).buildImage({
        context,
        dockerfile: 'infrastructure/Dockerfile',
        tag: 'dashboard:latest',
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Build failed: The command returned a non-zero code: 1');
        expect(result.error.logs).toHaveLength(BUILD_DIAGNOSTIC_LINES);
        expect(result.error.logs[0]).toBe('line 6');
        expect(result.error.logs[BUILD_DIAGNOSTIC_LINES - 1]).toBe('line 25');
      }
    });

    it('should fail without calling the engine when the context is missing', async () => {
      const { engine } = createEngine();

      const result = await createDockerClient(createTestLogger(), engine).buildImage({
        context: join(context, 'missing'),
        dockerfile: 'Dockerfile',
        tag: 'dashboard:latest',
      });

      expect(result.ok).toBe(false);
      expect(engine.buildImage).not.toHaveBeenCalled();
    });

    it('should destroy the build stream when its signal aborts', async () => {
      const stream = new PassThrough();
      const { engine } = createEngine();
      engine.buildImage.mockResolvedValue(stream);
      engine.modem.followProgress.mockImplementation(() => undefined);
      const controller = new AbortController();

      const pending = createDockerClient(createTestLogger(), engine).buildImage({
        context,
        dockerfile: 'infrastructure/Dockerfile',
        tag: 'dashboard:latest',
        signal: controller.signal,
      });
      await new Promise((resolve) => setImmediate(resolve));
      controller.abort();

      const result = await pending;
      expect(result).toEqual({ ok: false, error: { message: 'Build failed: stream aborted', logs: [] } });
      expect(stream.destroyed).toBe(true);
    });
  });

  describe('pushImage', () => {
    it('should push the tag with credentials and capture the digest', async () => {
      const { engine, push } = createEngine([{ status: 'Pushed' }, { aux: { Digest: 'sha256:test-digest' } }]);
      const auth = { username: 'deployer', password: 'test-secret', serveraddress: 'registry.example.com' };

      const result = await createDockerClient(createTestLogger(), engine).pushImage(
        'registry.example.com/team/dashboard',
        'v1',
        auth,
      );

      expect(result).toEqual({ ok: true, value: { digest: 'sha256:test-digest' } });
      expect(engine.getImage).toHaveBeenCalledWith('registry.example.com/team/dashboard');
      expect(push).toHaveBeenCalledWith({ tag: 'v1', authconfig: auth });
    });

    it('should fail on an in-stream push error', async () => {
      const { engine } = createEngine([{ error: 'denied: requested access to the resource is denied' }]);

      const result = await createDockerClient(createTestLogger(), engine).pushImage('docker.io/team/dashboard', 'v1');

      expect(result).toEqual({
        ok: false,
        error: 'Failed to push image: denied: requested access to the resource is denied',
      });
    });

    it('should not follow a push whose signal already aborted', async () => {
      const stream = new PassThrough();
      const { engine, push } = createEngine();
      push.mockResolvedValue(stream);
      const controller = new AbortController();
      controller.abort();

      const result = await createDockerClient(createTestLogger(), engine).pushImage(
        'docker.io/team/dashboard',
        'v1',
        undefined,
        controller.signal,
      );

      expect(result).toEqual({ ok: false, error: 'Failed to push image: stream aborted' });
      expect(stream.destroyed).toBe(true);
      expect(engine.modem.followProgress).not.toHaveBeenCalled();
    });
  });

  describe('ping', () => {
    it('should report an unreachable daemon', async () => {
      const { engine } = createEngine();
      engine.ping.mockRejectedValue(new Error('connect ENOENT /var/run/docker.sock'));

      const result = await createDockerClient(createTestLogger(), engine).ping();

      expect(result).toEqual({ ok: false, error: 'Docker daemon unreachable: connect ENOENT /var/run/docker.sock' });
    });
  });
});

describe('progressError', () => {
  it('should prefer the detailed error message', () => {
    expect(
      progressError({ error: 'short', errorDetail: { message: 'COPY failed: file not found in build context' } }),
    ).toBe('COPY failed: file not found in build context');
  });

  it('should fall back to the plain error', () => {
    expect(progressError({ error: 'denied: requested access to the resource is denied' })).toBe(
      'denied: requested access to the resource is denied',
    );
  });

  it('should return undefined for ordinary progress', () => {
    expect(progressError({ stream: 'Step 1/5 : FROM python:3.11-slim\n' })).toBeUndefined();
    expect(progressError({ status: 'Pushed', aux: { Digest: 'sha256:test-digest' } })).toBeUndefined();
  });
});
