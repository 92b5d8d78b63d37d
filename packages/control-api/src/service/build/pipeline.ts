import { join } from "node:path";
import * as tmp from "tmp-promise";

import { getLogger } from "../../instrumentation.js";
import type { Deployment, Project } from "../../libs/db/schema.js";
import type { RecordStore } from "../../libs/db/store.js";
import type { KeyedMutex } from "../../utils/lock.js";
import { generateReference, REFERENCE_PREFIXES } from "../../utils/reference.js";
import {
  DeploymentNotFoundError,
  markDeploymentFailed,
  transitionDeployment,
} from "../deployment.service.js";
import type { HostnameAllocator } from "../hostname.service.js";
import { ProjectNotFoundError } from "../project.service.js";
import type { WorkloadPublisher } from "../publisher.service.js";
import { type BuildLogger, createBuildLogger } from "./logger.js";
import { resolveRecipe } from "./recipe.js";
import type { ImageBuilder, SourceFetcher } from "./types.js";
import type { DeploymentRunner } from "./worker-pool.js";

export interface PublishingOptions {
  allocator: HostnameAllocator;
  publisher: WorkloadPublisher;
  lock: KeyedMutex;
}

export interface BuildPipelineOptions {
  store: RecordStore;
  sourceFetcher: SourceFetcher;
  imageBuilder: ImageBuilder;
  /** Leave unset to stop after the image build. */
  publishing?: PublishingOptions;
  /** Parent directory of the per-build checkouts. */
  workRoot?: string;
  imageRegistry?: string;
}

export function imageTagFor(
  deployment: Pick<Deployment, "reference" | "commitSha">,
  registry?: string,
) {
  const tag = `deploy-${deployment.reference}:${deployment.commitSha.slice(0, 7)}`;
  return registry ? `${registry.replace(/\/+$/, "")}/${tag}` : tag;
}

export class BuildPipeline implements DeploymentRunner {
  constructor(private readonly options: BuildPipelineOptions) {}

  async run(deploymentId: string, signal?: AbortSignal) {
    const { store } = this.options;

    const deployment = await store.deployments.findById(deploymentId);
    if (!deployment) {
      throw new DeploymentNotFoundError(deploymentId);
    }
    const project = await store.projects.findById(deployment.projectId);
    if (!project) {
      throw new ProjectNotFoundError(`Project ${deployment.projectId} not found`);
    }

    const build = await store.builds.create({
      reference: generateReference(10, REFERENCE_PREFIXES.BUILD),
      deploymentId,
      startedAt: new Date(),
    });
    const logger = createBuildLogger(build.reference);
    logger.info(
      `Building ${project.repoOwner}/${project.repoName}@${deployment.commitSha} for deployment ${deployment.reference}`,
    );

    let imageTag: string;
    try {
      imageTag = await this.buildImage(project, deployment, logger, signal);
    } catch (error) {
      logger.error(`Build failed: ${errorMessage(error)}`);
      await store.builds.update(build.id, {
        status: "failed",
        logs: logger.toText(),
        completedAt: new Date(),
      });
      await markDeploymentFailed(store, deploymentId);
      throw error;
    }

    logger.info(`Image ${imageTag} ready`);
    await store.builds.update(build.id, {
      status: "success",
      logs: logger.toText(),
      completedAt: new Date(),
    });
    await transitionDeployment(store, deploymentId, "deploying", { imageTag });

    const { publishing } = this.options;
    if (!publishing) {
      getLogger().warn(
        `No publish target configured, deployment ${deployment.reference} stays deploying`,
      );
      return;
    }

    try {
      await publishing.lock.runExclusive(project.id, async () => {
        const hostname = await publishing.allocator.allocate(
          project.id,
          deploymentId,
        );
        const workload = await publishing.publisher.publish(imageTag, hostname, {
          projectId: project.id,
          reference: deployment.reference,
        });
        await transitionDeployment(store, deploymentId, "deployed", {
          workloadName: workload.name,
          workloadNamespace: workload.namespace,
        });
        getLogger().info(
          `Deployment ${deployment.reference} live at ${publishing.allocator.urlFor(hostname)}`,
        );
      });
    } catch (error) {
      logger.error(`Publish failed: ${errorMessage(error)}`);
      await store.builds.update(build.id, { logs: logger.toText() });
      await markDeploymentFailed(store, deploymentId);
      throw error;
    }
  }

  private async buildImage(
    project: Project,
    deployment: Deployment,
    logger: BuildLogger,
    signal?: AbortSignal,
  ) {
    const { sourceFetcher, imageBuilder, workRoot, imageRegistry } = this.options;

    return tmp.withDir(
      async (workDir) => {
        const sourceDir = join(workDir.path, "source");
        await sourceFetcher.fetch(
          {
            repoUrl: project.repoUrl,
            targetDir: sourceDir,
            branch: deployment.branch,
            commitSha: deployment.commitSha,
          },
          logger,
          signal,
        );

        const recipe = await resolveRecipe(sourceDir, logger);
        const imageTag = imageTagFor(deployment, imageRegistry);
        await imageBuilder.build(
          { contextDir: sourceDir, imageTag, recipeFile: recipe.file },
          logger,
          signal,
        );
        return imageTag;
      },
      { unsafeCleanup: true, tmpdir: workRoot, prefix: "build-" },
    );
  }
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
