import * as k8s from "@kubernetes/client-node";
import {
  ResourceConflictError,
  type WorkloadCluster,
  type WorkloadResource,
} from "../service/publisher.service.js";

// ApiException carries the HTTP status as `code`
function isAlreadyExists(error: unknown) {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === 409
  );
}

export class KubernetesCluster implements WorkloadCluster {
  private readonly apps: k8s.AppsV1Api;
  private readonly core: k8s.CoreV1Api;
  private readonly networking: k8s.NetworkingV1Api;

  constructor(kc: k8s.KubeConfig) {
    this.apps = kc.makeApiClient(k8s.AppsV1Api);
    this.core = kc.makeApiClient(k8s.CoreV1Api);
    this.networking = kc.makeApiClient(k8s.NetworkingV1Api);
  }

  /** In-cluster service account, or `$KUBECONFIG` / `~/.kube/config`. */
  static fromDefault() {
    const kc = new k8s.KubeConfig();
    kc.loadFromDefault();
    return new KubernetesCluster(kc);
  }

  async create(namespace: string, resource: WorkloadResource) {
    try {
      switch (resource.kind) {
        case "processGroup":
          await this.apps.createNamespacedDeployment({
            namespace,
            body: resource.manifest,
          });
          break;
        case "endpoint":
          await this.core.createNamespacedService({
            namespace,
            body: resource.manifest,
          });
          break;
        case "route":
          await this.networking.createNamespacedIngress({
            namespace,
            body: resource.manifest,
          });
          break;
      }
    } catch (error) {
      if (isAlreadyExists(error)) {
        throw new ResourceConflictError(
          resource.kind,
          resource.manifest.metadata?.name ?? "unknown",
        );
      }
      throw error;
    }
  }

  async replace(namespace: string, name: string, resource: WorkloadResource) {
    switch (resource.kind) {
      case "processGroup": {
        const current = await this.apps.readNamespacedDeployment({
          name,
          namespace,
        });
        await this.apps.replaceNamespacedDeployment({
          name,
          namespace,
          body: {
            ...resource.manifest,
            metadata: {
              ...resource.manifest.metadata,
              resourceVersion: current.metadata?.resourceVersion,
            },
          },
        });
        break;
      }
      case "endpoint": {
        const current = await this.core.readNamespacedService({
          name,
          namespace,
        });
        // Cluster IPs are immutable once allocated
        await this.core.replaceNamespacedService({
          name,
          namespace,
          body: {
            ...resource.manifest,
            metadata: {
              ...resource.manifest.metadata,
              resourceVersion: current.metadata?.resourceVersion,
            },
            spec: {
              ...resource.manifest.spec,
              clusterIP: current.spec?.clusterIP,
              clusterIPs: current.spec?.clusterIPs,
            },
          },
        });
        break;
      }
      case "route": {
        const current = await this.networking.readNamespacedIngress({
          name,
          namespace,
        });
        await this.networking.replaceNamespacedIngress({
          name,
          namespace,
          body: {
            ...resource.manifest,
            metadata: {
              ...resource.manifest.metadata,
              resourceVersion: current.metadata?.resourceVersion,
            },
          },
        });
        break;
      }
    }
  }
}
