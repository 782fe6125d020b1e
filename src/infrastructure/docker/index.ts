/**
 * Docker infrastructure - Engine API client
 */

export {
  type DockerClient,
  createDockerClient,
  progressError,
  BUILD_DIAGNOSTIC_LINES,
  type DockerEngine,
  type DockerBuildFailure,
  type DockerBuildOptions,
  type DockerBuildResult,
  type DockerPushResult,
  type RegistryAuth,
} from './client';
