import type { BuildLogger } from "./logger.js";

export interface FetchSourceParams {
  repoUrl: string;
  targetDir: string;
  branch: string;
  commitSha: string;
}

/** Obtains the sources of one commit with a single-branch shallow fetch. */
export interface SourceFetcher {
  fetch(
    params: FetchSourceParams,
    logger: BuildLogger,
    signal?: AbortSignal,
  ): Promise<void>;
}

export interface BuildImageParams {
  contextDir: string;
  imageTag: string;
  /** Recipe path relative to `contextDir`. */
  recipeFile: string;
}

/** Turns a source tree and a recipe into a tagged image. */
export interface ImageBuilder {
  build(
    params: BuildImageParams,
    logger: BuildLogger,
    signal?: AbortSignal,
  ): Promise<void>;
}

/** Receives deployment ids ready to be built. */
export interface BuildJobSink {
  enqueue(deploymentId: string): void;
}
