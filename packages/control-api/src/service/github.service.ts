import { getLogger } from "../instrumentation.js";
import type { Deployment } from "../libs/db/schema.js";
import type { RecordStore } from "../libs/db/store.js";
import type { PushEvent } from "../schemas/github.js";
import type { BuildJobSink } from "./build/types.js";
import {
  createPendingDeployment,
  markDeploymentFailed,
} from "./deployment.service.js";
import {
  findProjectByRepository,
  ProjectNotFoundError,
} from "./project.service.js";

export type PushResult =
  | { status: "queued"; deployment: Deployment }
  | { status: "ignored"; reason: string };

/**
 * Turns a verified push into a pending deployment and hands its id to the
 * build queue.
 */
export class IngestionService {
  constructor(
    private readonly deps: { store: RecordStore; jobs: BuildJobSink },
  ) {}

  async handlePush(push: PushEvent): Promise<PushResult> {
    const { store, jobs } = this.deps;
    const log = getLogger();

    const project = await findProjectByRepository(
      store,
      push.repoOwner,
      push.repoName,
    );
    if (!project) {
      throw new ProjectNotFoundError(
        `No project registered for ${push.repoOwner}/${push.repoName}`,
      );
    }

    if (push.branch !== project.branch) {
      log.info(
        `Ignoring push to ${push.branch} on ${project.slug}, target branch is ${project.branch}`,
      );
      return {
        status: "ignored",
        reason: `Branch ${push.branch} is not the target branch ${project.branch}`,
      };
    }

    const deployment = await createPendingDeployment(store, {
      projectId: project.id,
      commitSha: push.commitSha,
      commitMessage: push.commitMessage,
      branch: push.branch,
    });

    try {
      jobs.enqueue(deployment.id);
    } catch (error) {
      log
        .withError(error)
        .error(`Could not enqueue deployment ${deployment.reference}`);
      await markDeploymentFailed(store, deployment.id);
      throw new Error(`Failed to enqueue deployment ${deployment.reference}`, {
        cause: error,
      });
    }

    log.info(
      `Queued deployment ${deployment.reference} for ${project.slug}@${push.commitSha.slice(0, 7)}`,
    );
    return { status: "queued", deployment };
  }
}
