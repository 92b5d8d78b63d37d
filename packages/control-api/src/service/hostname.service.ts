import { getLogger } from "../instrumentation.js";
import type { Project } from "../libs/db/schema.js";
import type { RecordStore } from "../libs/db/store.js";
import { toHostnameLabel, withSuffix } from "../utils/slug.js";
import { DeploymentNotFoundError } from "./deployment.service.js";
import { ProjectNotFoundError } from "./project.service.js";

export const DEFAULT_MAX_ATTEMPTS = 10_000;

export class HostnameAllocationExhaustedError extends Error {
  constructor(label: string, attempts: number) {
    super(`No free hostname for "${label}" after ${attempts} attempts`);
    this.name = "HostnameAllocationExhaustedError";
  }
}

export interface HostnameAllocatorOptions {
  baseDomain: string;
  publicUrlScheme?: "http" | "https";
  maxAttempts?: number;
}

export function hostnameLabelFor(
  project: Pick<Project, "slug" | "name" | "repoName">,
) {
  return (
    toHostnameLabel(project.slug) ||
    toHostnameLabel(project.name) ||
    toHostnameLabel(project.repoName) ||
    "deploy"
  );
}

/**
 * Gives each project one stable hostname. The first allocation derives it
 * from the project slug, probing `label`, `label-1`, `label-2`, ... for a
 * free name; every later allocation reuses the active row and only
 * repoints it at the new deployment.
 */
export class HostnameAllocator {
  private readonly maxAttempts: number;

  constructor(
    private readonly store: RecordStore,
    private readonly options: HostnameAllocatorOptions,
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  candidate(label: string, attempt: number) {
    return `${withSuffix(label, attempt)}.${this.options.baseDomain}`;
  }

  urlFor(hostname: string) {
    return `${this.options.publicUrlScheme ?? "http"}://${hostname}`;
  }

  async allocate(projectId: string, deploymentId: string): Promise<string> {
    const log = getLogger();

    return this.store.transaction(async (tx) => {
      const project = await tx.projects.findById(projectId);
      if (!project) {
        throw new ProjectNotFoundError(`Project ${projectId} not found`);
      }
      const deployment = await tx.deployments.findById(deploymentId);
      if (!deployment || deployment.projectId !== projectId) {
        throw new DeploymentNotFoundError(deploymentId);
      }

      const active = await tx.hostnames.findActiveByProject(projectId);
      if (active) {
        await tx.hostnames.deactivateByProject(projectId, active.id);
        await tx.hostnames.update(active.id, { deploymentId });
        await tx.deployments.update(deploymentId, {
          hostname: active.hostname,
        });
        log.info(
          `Reusing hostname ${active.hostname} for deployment ${deployment.reference}`,
        );
        return active.hostname;
      }

      const label = hostnameLabelFor(project);
      for (let attempt = 0; attempt <= this.maxAttempts; attempt++) {
        const hostname = this.candidate(label, attempt);
        const taken = await tx.hostnames.findByHostname(hostname);

        if (taken && taken.projectId !== projectId) {
          continue;
        }

        await tx.hostnames.deactivateByProject(projectId);
        if (taken) {
          // A name this project held before: take it back
          await tx.hostnames.update(taken.id, {
            deploymentId,
            isActive: true,
          });
        } else {
          await tx.hostnames.create({ hostname, projectId, deploymentId });
        }
        await tx.deployments.update(deploymentId, { hostname });

        log.info(
          `Allocated hostname ${hostname} to project ${project.slug} (deployment ${deployment.reference})`,
        );
        return hostname;
      }

      throw new HostnameAllocationExhaustedError(label, this.maxAttempts + 1);
    });
  }
}
