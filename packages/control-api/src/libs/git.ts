import { execWithLogs } from "../utils/exec.js";
import type { BuildLogger } from "../service/build/logger.js";
import type { FetchSourceParams, SourceFetcher } from "../service/build/types.js";

/** Fetches sources with the `git` CLI. */
export class GitSourceFetcher implements SourceFetcher {
  async fetch(
    { repoUrl, targetDir, branch, commitSha }: FetchSourceParams,
    logger: BuildLogger,
    signal?: AbortSignal,
  ) {
    logger.info(`Cloning ${repoUrl} (branch ${branch})`);
    await execWithLogs(
      "git",
      [
        "clone",
        "--depth",
        "1",
        "--single-branch",
        "--branch",
        branch,
        repoUrl,
        targetDir,
      ],
      logger,
      { signal },
    );

    const head = (
      await execWithLogs("git", ["rev-parse", "HEAD"], logger, {
        cwd: targetDir,
        signal,
      })
    ).trim();
    if (head === commitSha) {
      return;
    }

    // The branch moved on since the push, pin the pushed commit
    logger.info(`Checking out commit ${commitSha}`);
    await execWithLogs("git", ["fetch", "--depth", "1", "origin", commitSha], logger, {
      cwd: targetDir,
      signal,
    });
    await execWithLogs(
      "git",
      ["-c", "advice.detachedHead=false", "checkout", commitSha],
      logger,
      { cwd: targetDir, signal },
    );
  }
}
