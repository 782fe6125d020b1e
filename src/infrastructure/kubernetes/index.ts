/**
 * Kubernetes infrastructure - cluster API client
 */

export {
  type KubernetesClient,
  createKubernetesClient,
  parseManifests,
  summarizePods,
  loadBalancerAddress,
  type AppliedResource,
  type ManifestObject,
  type PodReadiness,
} from './client';
