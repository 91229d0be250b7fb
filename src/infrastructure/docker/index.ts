/**
 * Docker infrastructure - engine and registry clients
 */

export {
  type DockerClient,
  createDockerClient,
  type DockerBuildOptions,
  type DockerBuildResult,
} from './client';
export {
  type RegistryClient,
  type RegistryClientOptions,
  type RegistryCredentials,
  type RegistryPushResult,
  createRegistryClient,
} from './registry';
