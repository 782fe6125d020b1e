/**
 * Docker client for image build and push
 */

import Docker from 'dockerode';
import { readdir } from 'node:fs/promises';
import { Readable } from 'node:stream';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types';
import { errorMessage } from '../../errors';

/**
 * Options for building a Docker image.
 */
export interface DockerBuildOptions {
  /** Build context directory */
  context: string;
  /** Path to Dockerfile relative to context */
  dockerfile: string;
  /** Full reference applied to the built image */
  tag: string;
  /** Build-time variables (Docker ARG values) */
  buildArgs?: Record<string, string>;
  /** Stops the build stream when aborted */
  signal?: AbortSignal;
}

/** Build output lines kept on a failed build */
export const BUILD_DIAGNOSTIC_LINES = 20;

/**
 * Result of a Docker image build operation.
 */
export interface DockerBuildResult {
  imageId: string;
  /** Build output lines, in order */
  logs: string[];
}

export interface DockerBuildFailure {
  message: string;
  /** Trailing build output, oldest first */
  logs: string[];
}

export interface DockerPushResult {
  /** Content-addressable digest reported by the registry, when it sent one */
  digest?: string;
}

export interface RegistryAuth {
  username: string;
  password: string;
  serveraddress: string;
}

/**
 * Progress event emitted on build and push streams
 */
export interface DockerProgressEvent {
  stream?: string;
  status?: string;
  error?: string;
  errorDetail?: { message?: string };
  aux?: { ID?: string; Digest?: string };
}

/**
 * The parts of dockerode the client drives
 */
export interface DockerEngine {
  ping(): Promise<unknown>;
  buildImage(context: Docker.ImageBuildContext, options: Docker.ImageBuildOptions): Promise<NodeJS.ReadableStream>;
  getImage(name: string): {
    push(options: { tag: string; authconfig?: RegistryAuth }): Promise<NodeJS.ReadableStream>;
  };
  modem: {
    followProgress(
      stream: NodeJS.ReadableStream,
      onFinished: (error: Error | null) => void,
      onProgress: (event: unknown) => void,
    ): void;
  };
}

/**
 * Docker client interface for container operations.
 */
export interface DockerClient {
  /** Check that the daemon answers */
  ping: () => Promise<Result<void>>;
  buildImage: (options: DockerBuildOptions) => Promise<Result<DockerBuildResult, DockerBuildFailure>>;
  /**
   * Push `repository:tag` to its registry. Aborting `signal` stops the upload.
   */
  pushImage: (
    repository: string,
    tag: string,
    auth?: RegistryAuth,
    signal?: AbortSignal,
  ) => Promise<Result<DockerPushResult>>;
}

function isProgressEvent(value: unknown): value is DockerProgressEvent {
  return typeof value === 'object' && value !== null;
}

/**
 * Error text carried inside a progress event, if any. The engine reports
 * build and push failures in-stream rather than through the HTTP status.
 */
export function progressError(event: DockerProgressEvent): string | undefined {
  return event.errorDetail?.message ?? event.error;
}

/**
 * Drain a progress stream, failing on the first in-stream error. Aborting
 * `signal` destroys the stream.
 */
function followProgress(
  docker: DockerEngine,
  stream: NodeJS.ReadableStream,
  onEvent: (event: DockerProgressEvent) => void,
  signal?: AbortSignal,
): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let streamError: string | undefined;
    const onAbort = (): void => {
      if (stream instanceof Readable) stream.destroy();
      reject(new Error('stream aborted'));
    };
    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    docker.modem.followProgress(
      stream,
      (err: Error | null) => {
        signal?.removeEventListener('abort', onAbort);
        if (err) reject(err);
        else if (streamError !== undefined) reject(new Error(streamError));
        else resolve();
      },
      (event: unknown) => {
        if (!isProgressEvent(event)) return;
        streamError ??= progressError(event);
        onEvent(event);
      },
    );
  });
}

/**
 * Create a Docker client with core operations
 */
export const createDockerClient = (logger: Logger, docker: DockerEngine = new Docker()): DockerClient => {
  return {
    async ping(): Promise<Result<void>> {
      try {
        await docker.ping();
        return Success(undefined);
      } catch (error) {
        return Failure(`Docker daemon unreachable: ${errorMessage(error)}`);
      }
    },

    async buildImage(options: DockerBuildOptions): Promise<Result<DockerBuildResult, DockerBuildFailure>> {
      const logs: string[] = [];
      try {
        const { context, dockerfile, tag } = options;
        logger.debug({ context, dockerfile, tag }, 'Starting Docker build');

        // dockerode packs the listed entries, walking directories and honouring .dockerignore
        const src = await readdir(options.context);
        const stream = await docker.buildImage(
          { context: options.context, src },
          {
            t: options.tag,
            dockerfile: options.dockerfile,
            ...(options.buildArgs !== undefined && { buildargs: options.buildArgs }),
          },
        );

        let imageId = '';
        await followProgress(
          docker,
          stream,
          (event) => {
            if (event.stream) {
              const line = event.stream.trimEnd();
              if (line.length > 0) logs.push(line);
            }
            if (event.aux?.ID) imageId = event.aux.ID;
            logger.debug(event, 'Docker build progress');
          },
          options.signal,
        );

        logger.debug({ imageId, tag: options.tag }, 'Docker build completed');
        return Success<DockerBuildResult, DockerBuildFailure>({ imageId, logs });
      } catch (error) {
        const message = `Build failed: ${errorMessage(error)}`;
        logger.error({ error: message, tag: options.tag }, 'Docker build failed');
        return Failure<DockerBuildResult, DockerBuildFailure>({
          message,
          logs: logs.slice(-BUILD_DIAGNOSTIC_LINES),
        });
      }
    },

    async pushImage(
      repository: string,
      tag: string,
      auth?: RegistryAuth,
      signal?: AbortSignal,
    ): Promise<Result<DockerPushResult>> {
      try {
        const image = docker.getImage(repository);
        const stream = await image.push({
          tag,
          ...(auth !== undefined && { authconfig: auth }),
        });

        const pushed: DockerPushResult = {};
        await followProgress(
          docker,
          stream,
          (event) => {
            if (event.aux?.Digest) pushed.digest = event.aux.Digest;
            logger.debug(event, 'Docker push progress');
          },
          signal,
        );

        logger.info({ repository, tag, digest: pushed.digest }, 'Image pushed successfully');
        return Success(pushed);
      } catch (error) {
        return Failure(`Failed to push image: ${errorMessage(error)}`);
      }
    },
  };
};
