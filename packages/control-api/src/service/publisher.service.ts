import type {
  V1Deployment,
  V1Ingress,
  V1Service,
} from "@kubernetes/client-node";
import { getLogger } from "../instrumentation.js";
import type { Deployment } from "../libs/db/schema.js";

export type WorkloadResource =
  | { kind: "processGroup"; manifest: V1Deployment }
  | { kind: "endpoint"; manifest: V1Service }
  | { kind: "route"; manifest: V1Ingress };

export type WorkloadResourceKind = WorkloadResource["kind"];

/**
 * Create/replace access to the three resource kinds making up a workload.
 * `create` must reject with `ResourceConflictError` when the resource
 * already exists.
 */
export interface WorkloadCluster {
  create(namespace: string, resource: WorkloadResource): Promise<void>;
  replace(
    namespace: string,
    name: string,
    resource: WorkloadResource,
  ): Promise<void>;
}

export class ResourceConflictError extends Error {
  constructor(
    readonly kind: WorkloadResourceKind,
    readonly resourceName: string,
  ) {
    super(`${kind} ${resourceName} already exists`);
    this.name = "ResourceConflictError";
  }
}

export class PublishError extends Error {
  constructor(
    readonly kind: WorkloadResourceKind,
    readonly resourceName: string,
    cause: unknown,
  ) {
    super(
      `Failed to apply ${kind} ${resourceName}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    );
    this.name = "PublishError";
  }
}

export interface WorkloadPublisherOptions {
  namespace: string;
  containerPort: number;
  servicePort?: number;
  env?: Record<string, string>;
}

export interface PublishedWorkload {
  name: string;
  namespace: string;
}

// Keyed by project so successive deployments update one workload
export function workloadName(projectId: string) {
  return `project-${projectId}`.toLowerCase();
}

export function buildProcessGroup(params: {
  name: string;
  namespace: string;
  image: string;
  containerPort: number;
  env: Record<string, string>;
  deploymentReference: string;
}): WorkloadResource {
  const labels = { app: params.name };
  return {
    kind: "processGroup",
    manifest: {
      apiVersion: "apps/v1",
      kind: "Deployment",
      metadata: {
        name: params.name,
        namespace: params.namespace,
        labels,
      },
      spec: {
        replicas: 1,
        selector: { matchLabels: labels },
        template: {
          metadata: {
            labels,
            annotations: {
              "slipway.dev/deployment": params.deploymentReference,
            },
          },
          spec: {
            containers: [
              {
                name: "app",
                image: params.image,
                ports: [{ containerPort: params.containerPort }],
                env: Object.entries(params.env).map(([name, value]) => ({
                  name,
                  value,
                })),
                resources: {
                  requests: { cpu: "100m", memory: "128Mi" },
                  limits: { cpu: "500m", memory: "512Mi" },
                },
              },
            ],
          },
        },
      },
    },
  };
}

export function buildEndpoint(params: {
  name: string;
  namespace: string;
  servicePort: number;
  containerPort: number;
}): WorkloadResource {
  return {
    kind: "endpoint",
    manifest: {
      apiVersion: "v1",
      kind: "Service",
      metadata: { name: params.name, namespace: params.namespace },
      spec: {
        selector: { app: params.name },
        ports: [{ port: params.servicePort, targetPort: params.containerPort }],
      },
    },
  };
}

export function buildRoute(params: {
  name: string;
  namespace: string;
  hostname: string;
  servicePort: number;
}): WorkloadResource {
  return {
    kind: "route",
    manifest: {
      apiVersion: "networking.k8s.io/v1",
      kind: "Ingress",
      metadata: { name: params.name, namespace: params.namespace },
      spec: {
        rules: [
          {
            host: params.hostname,
            http: {
              paths: [
                {
                  path: "/",
                  pathType: "Prefix",
                  backend: {
                    service: {
                      name: params.name,
                      port: { number: params.servicePort },
                    },
                  },
                },
              ],
            },
          },
        ],
      },
    },
  };
}

/**
 * Makes an image reachable at a hostname by applying a process group, an
 * internal endpoint and a routing rule, in that order. Each resource is
 * created, or replaced in place when it already exists. Nothing is rolled
 * back when a later resource fails.
 */
export class WorkloadPublisher {
  private readonly servicePort: number;

  constructor(
    private readonly cluster: WorkloadCluster,
    private readonly options: WorkloadPublisherOptions,
  ) {
    this.servicePort = options.servicePort ?? 80;
  }

  async publish(
    imageReference: string,
    hostname: string,
    deployment: Pick<Deployment, "projectId" | "reference">,
  ): Promise<PublishedWorkload> {
    const log = getLogger();
    const name = workloadName(deployment.projectId);
    const { namespace, containerPort } = this.options;

    log.info(
      `Publishing ${imageReference} as ${namespace}/${name} at ${hostname}`,
    );

    const resources = [
      buildProcessGroup({
        name,
        namespace,
        image: imageReference,
        containerPort,
        env: { PORT: String(containerPort), ...this.options.env },
        deploymentReference: deployment.reference,
      }),
      buildEndpoint({
        name,
        namespace,
        servicePort: this.servicePort,
        containerPort,
      }),
      buildRoute({ name, namespace, hostname, servicePort: this.servicePort }),
    ];

    for (const resource of resources) {
      await this.apply(namespace, name, resource);
    }

    return { name, namespace };
  }

  private async apply(
    namespace: string,
    name: string,
    resource: WorkloadResource,
  ) {
    const log = getLogger();

    try {
      await this.cluster.create(namespace, resource);
      log.info(`Created ${resource.kind} ${namespace}/${name}`);
      return;
    } catch (error) {
      if (!(error instanceof ResourceConflictError)) {
        throw new PublishError(resource.kind, name, error);
      }
    }

    try {
      await this.cluster.replace(namespace, name, resource);
      log.info(`Updated ${resource.kind} ${namespace}/${name}`);
    } catch (error) {
      throw new PublishError(resource.kind, name, error);
    }
  }
}
