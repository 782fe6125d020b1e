/**
 * Kubernetes Client - Direct k8s API Access
 *
 * Namespace, secret, manifest and service operations on top of
 * @kubernetes/client-node. Every call returns a Result; nothing throws.
 */

import * as k8s from '@kubernetes/client-node';
import { readFile, readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import yaml from 'js-yaml';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types';
import { errorMessage } from '../../errors';

const MANIFEST_EXTENSIONS = new Set(['.yaml', '.yml', '.json']);

const LAST_APPLIED_ANNOTATION = 'kubectl.kubernetes.io/last-applied-configuration';

export interface ManifestObject extends k8s.KubernetesObject {
  apiVersion: string;
  kind: string;
  metadata: k8s.V1ObjectMeta & { name: string };
}

export interface AppliedResource {
  kind: string;
  name: string;
  action: 'created' | 'configured';
}

export interface PodReadiness {
  total: number;
  ready: number;
  notReady: string[];
}

export interface KubernetesClient {
  ping: () => Promise<Result<void>>;
  ensureNamespace: (namespace: string) => Promise<Result<'created' | 'exists'>>;
  upsertSecret: (
    namespace: string,
    name: string,
    data: Record<string, string>,
  ) => Promise<Result<'created' | 'replaced'>>;
  applyManifests: (path: string, namespace: string) => Promise<Result<AppliedResource[]>>;
  getPodReadiness: (namespace: string, selector: string) => Promise<Result<PodReadiness>>;
  getLoadBalancerAddress: (namespace: string, service: string) => Promise<Result<string | undefined>>;
}

function describeApiError(error: unknown): string {
  if (error instanceof k8s.HttpError) {
    const body: unknown = error.body;
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
      return `${error.statusCode ?? 'unknown status'}: ${body.message}`;
    }
    return `HTTP ${error.statusCode ?? 'unknown status'}`;
  }
  return errorMessage(error);
}

function isNotFound(error: unknown): boolean {
  return error instanceof k8s.HttpError && error.statusCode === 404;
}

export function isManifestObject(value: unknown): value is ManifestObject {
  if (typeof value !== 'object' || value === null) return false;
  if (!('apiVersion' in value) || typeof value.apiVersion !== 'string') return false;
  if (!('kind' in value) || typeof value.kind !== 'string') return false;
  if (!('metadata' in value) || typeof value.metadata !== 'object' || value.metadata === null) return false;
  return 'name' in value.metadata && typeof value.metadata.name === 'string';
}

/**
 * Parse a multi-document YAML (or JSON) manifest. Empty documents are
 * dropped; anything else lacking apiVersion, kind or metadata.name is an error.
 */
export function parseManifests(source: string, origin = 'manifest'): Result<ManifestObject[]> {
  let documents: unknown[];
  try {
    documents = yaml.loadAll(source);
  } catch (error) {
    return Failure(`${origin}: ${errorMessage(error)}`);
  }

  const manifests: ManifestObject[] = [];
  for (const [index, document] of documents.entries()) {
    if (document === null || document === undefined) continue;
    if (!isManifestObject(document)) {
      return Failure(`${origin}: document ${index + 1} is not a Kubernetes object`);
    }
    manifests.push(document);
  }
  return Success(manifests);
}

export function isPodReady(pod: k8s.V1Pod): boolean {
  return pod.status?.conditions?.some((c) => c.type === 'Ready' && c.status === 'True') ?? false;
}

export function summarizePods(pods: k8s.V1Pod[]): PodReadiness {
  const notReady = pods
    .filter((pod) => !isPodReady(pod))
    .map((pod) => pod.metadata?.name ?? '<unnamed>');
  return { total: pods.length, ready: pods.length - notReady.length, notReady };
}

/**
 * First LoadBalancer ingress address: the IP when set, otherwise the hostname
 */
export function loadBalancerAddress(service: k8s.V1Service): string | undefined {
  const ingress = service.status?.loadBalancer?.ingress?.[0];
  const ip = ingress?.ip?.trim();
  if (ip) return ip;
  const hostname = ingress?.hostname?.trim();
  return hostname ? hostname : undefined;
}

async function manifestFiles(path: string): Promise<string[]> {
  const info = await stat(path);
  if (info.isFile()) return [path];
  const entries = await readdir(path);
  return entries
    .filter((entry) => MANIFEST_EXTENSIONS.has(extname(entry)))
    .sort()
    .map((entry) => join(path, entry));
}

/**
 * Create a Kubernetes client with core operations
 */
export const createKubernetesClient = (logger: Logger, kubeconfig?: string): KubernetesClient => {
  const kc = new k8s.KubeConfig();

  if (kubeconfig) {
    kc.loadFromString(kubeconfig);
  } else {
    kc.loadFromDefault();
  }

  const coreApi = kc.makeApiClient(k8s.CoreV1Api);
  const objectApi = k8s.KubernetesObjectApi.makeApiClient(kc);

  async function applyObject(manifest: ManifestObject, namespace: string): Promise<AppliedResource> {
    const targetNamespace = manifest.metadata.namespace ?? namespace;
    const spec: ManifestObject = {
      ...manifest,
      metadata: {
        ...manifest.metadata,
        namespace: targetNamespace,
        annotations: {
          ...manifest.metadata.annotations,
          [LAST_APPLIED_ANNOTATION]: JSON.stringify(manifest),
        },
      },
    };

    const header = {
      apiVersion: spec.apiVersion,
      kind: spec.kind,
      metadata: { name: spec.metadata.name, namespace: targetNamespace },
    };

    try {
      await objectApi.read(header);
    } catch (error) {
      if (!isNotFound(error)) throw error;
      await objectApi.create(spec);
      return { kind: spec.kind, name: spec.metadata.name, action: 'created' };
    }
    await objectApi.patch(spec);
    return { kind: spec.kind, name: spec.metadata.name, action: 'configured' };
  }

  return {
    async ping(): Promise<Result<void>> {
      try {
        await coreApi.listNamespace();
        return Success(undefined);
      } catch (error) {
        logger.debug({ error: describeApiError(error) }, 'Cluster ping failed');
        return Failure(`Cluster unreachable: ${describeApiError(error)}`);
      }
    },

    async ensureNamespace(namespace: string): Promise<Result<'created' | 'exists'>> {
      try {
        await coreApi.readNamespace(namespace);
        return Success('exists');
      } catch (error) {
        if (!isNotFound(error)) {
          return Failure(`Failed to read namespace ${namespace}: ${describeApiError(error)}`);
        }
      }
      try {
        await coreApi.createNamespace({ metadata: { name: namespace } });
        logger.info({ namespace }, 'Namespace created');
        return Success('created');
      } catch (error) {
        return Failure(`Failed to create namespace ${namespace}: ${describeApiError(error)}`);
      }
    },

    async upsertSecret(
      namespace: string,
      name: string,
      data: Record<string, string>,
    ): Promise<Result<'created' | 'replaced'>> {
      const body: k8s.V1Secret = {
        apiVersion: 'v1',
        kind: 'Secret',
        type: 'Opaque',
        metadata: { name, namespace },
        stringData: data,
      };
      try {
        try {
          await coreApi.readNamespacedSecret(name, namespace);
        } catch (error) {
          if (!isNotFound(error)) throw error;
          await coreApi.createNamespacedSecret(namespace, body);
          return Success('created');
        }
        await coreApi.replaceNamespacedSecret(name, namespace, body);
        return Success('replaced');
      } catch (error) {
        return Failure(`Failed to write secret ${name}: ${describeApiError(error)}`);
      }
    },

    async applyManifests(path: string, namespace: string): Promise<Result<AppliedResource[]>> {
      let files: string[];
      try {
        files = await manifestFiles(path);
      } catch (error) {
        return Failure(`Cannot read manifests at ${path}: ${errorMessage(error)}`);
      }
      if (files.length === 0) {
        return Failure(`No manifest files found in ${path}`);
      }

      const applied: AppliedResource[] = [];
      for (const file of files) {
        let source: string;
        try {
          source = await readFile(file, 'utf-8');
        } catch (error) {
          return Failure(`Cannot read manifest ${file}: ${errorMessage(error)}`);
        }
        const parsed = parseManifests(source, file);
        if (!parsed.ok) return Failure(parsed.error);

        for (const manifest of parsed.value) {
          try {
            const resource = await applyObject(manifest, namespace);
            logger.debug({ ...resource, file }, 'Manifest applied');
            applied.push(resource);
          } catch (error) {
            return Failure(
              `Failed to apply ${manifest.kind}/${manifest.metadata.name} from ${file}: ${describeApiError(error)}`,
            );
          }
        }
      }
      return Success(applied);
    },

    async getPodReadiness(namespace: string, selector: string): Promise<Result<PodReadiness>> {
      try {
        const response = await coreApi.listNamespacedPod(
          namespace,
          undefined,
          undefined,
          undefined,
          undefined,
          selector,
        );
        return Success(summarizePods(response.body.items));
      } catch (error) {
        return Failure(`Failed to list pods (${selector}): ${describeApiError(error)}`);
      }
    },

    async getLoadBalancerAddress(
      namespace: string,
      service: string,
    ): Promise<Result<string | undefined>> {
      try {
        const response = await coreApi.readNamespacedService(service, namespace);
        return Success(loadBalancerAddress(response.body));
      } catch (error) {
        return Failure(`Failed to read service ${service}: ${describeApiError(error)}`);
      }
    },
  };
};
