import { getLogger } from "../instrumentation.js";
import {
  type Deployment,
  type DeploymentStatus,
  deploymentStatusEnum,
} from "../libs/db/schema.js";
import type { DeploymentUpdate, RecordStore } from "../libs/db/store.js";
import { generateReference, REFERENCE_PREFIXES } from "../utils/reference.js";

export class DeploymentNotFoundError extends Error {
  constructor(deploymentId: string) {
    super(`Deployment ${deploymentId} not found`);
    this.name = "DeploymentNotFoundError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly deploymentId: string,
    readonly from: DeploymentStatus,
    readonly to: DeploymentStatus,
  ) {
    super(`Deployment ${deploymentId} cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}

// pending -> building -> deploying -> deployed, failed from any active state
export const DEPLOYMENT_TRANSITIONS: Readonly<
  Record<DeploymentStatus, readonly DeploymentStatus[]>
> = {
  pending: ["building", "failed"],
  building: ["deploying", "failed"],
  deploying: ["deployed", "failed"],
  deployed: [],
  failed: [],
};

export function isTerminalStatus(status: DeploymentStatus) {
  return DEPLOYMENT_TRANSITIONS[status].length === 0;
}

export function canTransition(from: DeploymentStatus, to: DeploymentStatus) {
  return DEPLOYMENT_TRANSITIONS[from].includes(to);
}

function legalSources(to: DeploymentStatus) {
  return deploymentStatusEnum.enumValues.filter((from) =>
    canTransition(from, to),
  );
}

/**
 * Moves a deployment to `to`, writing `input` alongside. The write only
 * happens while the stored status is a legal source for `to`.
 */
export async function transitionDeployment(
  store: RecordStore,
  deploymentId: string,
  to: DeploymentStatus,
  input?: DeploymentUpdate,
): Promise<Deployment> {
  const updated = await store.deployments.updateStatus(
    deploymentId,
    legalSources(to),
    to,
    input,
  );
  if (updated) {
    return updated;
  }

  const current = await store.deployments.findById(deploymentId);
  if (!current) {
    throw new DeploymentNotFoundError(deploymentId);
  }
  throw new InvalidTransitionError(deploymentId, current.status, to);
}

/**
 * Marks a deployment failed unless it already reached a terminal state.
 * Returns the failed deployment, or null when it was left untouched.
 */
export async function markDeploymentFailed(
  store: RecordStore,
  deploymentId: string,
): Promise<Deployment | null> {
  const failed = await store.deployments.updateStatus(
    deploymentId,
    legalSources("failed"),
    "failed",
  );
  if (!failed) {
    getLogger().warn(
      `Deployment ${deploymentId} was not marked failed: missing or already terminal`,
    );
  }
  return failed;
}

export async function createPendingDeployment(
  store: RecordStore,
  {
    projectId,
    commitSha,
    commitMessage,
    branch,
  }: {
    projectId: string;
    commitSha: string;
    commitMessage: string;
    branch: string;
  },
) {
  return store.deployments.create({
    reference: generateReference(10, REFERENCE_PREFIXES.DEPLOYMENT),
    projectId,
    commitSha,
    commitMessage,
    branch,
  });
}

export const DEFAULT_DEPLOYMENT_PAGE = 50;

export async function listDeployments(
  store: RecordStore,
  { ownerId, limit = DEFAULT_DEPLOYMENT_PAGE }: { ownerId?: string; limit?: number } = {},
) {
  return store.deployments.list({ ownerId, limit });
}

export async function getDeploymentWithBuild(
  store: RecordStore,
  deploymentId: string,
) {
  const deployment = await store.deployments.findById(deploymentId);
  if (!deployment) {
    throw new DeploymentNotFoundError(deploymentId);
  }
  const build = await store.builds.findByDeploymentId(deploymentId);
  return { ...deployment, build };
}
