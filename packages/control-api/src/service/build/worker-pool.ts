import type { ILogLayer } from "loglayer";

import { getLogger } from "../../instrumentation.js";
import type { RecordStore } from "../../libs/db/store.js";
import {
  DeploymentNotFoundError,
  InvalidTransitionError,
  isTerminalStatus,
  markDeploymentFailed,
  transitionDeployment,
} from "../deployment.service.js";
import { type BuildQueue, DequeueCancelledError } from "./queue.js";

/** Runs the build-and-publish steps for one deployment already in `building`. */
export interface DeploymentRunner {
  run(deploymentId: string, signal?: AbortSignal): Promise<void>;
}

export interface WorkerPoolOptions {
  queue: BuildQueue;
  store: RecordStore;
  pipeline: DeploymentRunner;
  size: number;
}

export class WorkerPool {
  private controller: AbortController | null = null;
  private workers: Promise<void>[] = [];
  private active = new Set<string>();

  constructor(private readonly options: WorkerPoolOptions) {
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new Error(`Worker pool size must be a positive integer, got ${options.size}`);
    }
  }

  get running() {
    return this.controller !== null;
  }

  /** Deployment ids currently held by a worker. */
  get activeJobs(): readonly string[] {
    return [...this.active];
  }

  start() {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.workers = Array.from({ length: this.options.size }, (_, index) =>
      this.loop(index + 1, controller.signal),
    );
    getLogger().info(`Started ${this.options.size} build workers`);
  }

  /**
   * Signals every worker and resolves once all of them have returned.
   * In-flight jobs see the same signal through the pipeline.
   */
  async stop() {
    const controller = this.controller;
    if (!controller) {
      return;
    }
    controller.abort(new Error("Worker pool stopping"));
    await Promise.all(this.workers);
    this.workers = [];
    this.controller = null;
    getLogger().info("Build workers stopped");
  }

  private async loop(workerId: number, signal: AbortSignal) {
    const log = getLogger().child().withContext({ worker: workerId });

    while (!signal.aborted) {
      let deploymentId: string;
      try {
        deploymentId = await this.options.queue.dequeue(signal);
      } catch (error) {
        if (error instanceof DequeueCancelledError) {
          break;
        }
        throw error;
      }

      this.active.add(deploymentId);
      try {
        await this.handle(deploymentId, signal, log);
      } finally {
        this.active.delete(deploymentId);
      }
    }

    log.debug("Worker exiting");
  }

  private async handle(
    deploymentId: string,
    signal: AbortSignal,
    log: ILogLayer,
  ) {
    const { store, pipeline } = this.options;

    try {
      await transitionDeployment(store, deploymentId, "building");
    } catch (error) {
      if (
        error instanceof InvalidTransitionError ||
        error instanceof DeploymentNotFoundError
      ) {
        log
          .withError(error)
          .warn(`Skipping deployment ${deploymentId}: cannot start building`);
        return;
      }
      log
        .withError(error)
        .error(`Deployment ${deploymentId} could not start building`);
      await this.fail(deploymentId, log);
      return;
    }

    try {
      await pipeline.run(deploymentId, signal);
    } catch (error) {
      log.withError(error).error(`Deployment ${deploymentId} failed`);
      await this.fail(deploymentId, log);
    }
  }

  // The pipeline marks its own step failures; only settle what it left active.
  private async fail(deploymentId: string, log: ILogLayer) {
    const { store } = this.options;
    try {
      const current = await store.deployments.findById(deploymentId);
      if (current && !isTerminalStatus(current.status)) {
        await markDeploymentFailed(store, deploymentId);
      }
    } catch (error) {
      log
        .withError(error)
        .error(`Could not mark deployment ${deploymentId} failed`);
    }
  }
}
