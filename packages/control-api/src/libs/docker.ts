import { join } from "node:path";
import { execWithLogs } from "../utils/exec.js";
import type { BuildLogger } from "../service/build/logger.js";
import type { BuildImageParams, ImageBuilder } from "../service/build/types.js";

/** Builds images with the `docker` CLI, pushing them when asked to. */
export class DockerImageBuilder implements ImageBuilder {
  constructor(private readonly options: { push: boolean }) {}

  async build(
    { contextDir, imageTag, recipeFile }: BuildImageParams,
    logger: BuildLogger,
    signal?: AbortSignal,
  ) {
    logger.info(`Building image ${imageTag}`);
    await execWithLogs(
      "docker",
      ["build", "--tag", imageTag, "--file", join(contextDir, recipeFile), contextDir],
      logger,
      { signal },
    );

    if (this.options.push) {
      logger.info(`Pushing image ${imageTag}`);
      await execWithLogs("docker", ["push", imageTag], logger, { signal });
    }
  }
}
