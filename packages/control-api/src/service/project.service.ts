import { getLogger } from "../instrumentation.js";
import type { Project } from "../libs/db/schema.js";
import type { RecordStore } from "../libs/db/store.js";
import {
  parseRepositoryUrl,
  slugify,
  toHostnameLabel,
  withSuffix,
} from "../utils/slug.js";

const MAX_SLUG_ATTEMPTS = 100;

export class ProjectNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProjectNotFoundError";
  }
}

export class ProjectConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProjectConflictError";
  }
}

export class InvalidProjectError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidProjectError";
  }
}

export interface RegisterProjectInput {
  ownerId: string;
  name: string;
  slug?: string;
  repoUrl: string;
  repoOwner?: string;
  repoName?: string;
  branch?: string;
}

// Repository coordinates are matched case-insensitively
function normalizeCoordinate(value: string) {
  return value.trim().toLowerCase();
}

/**
 * Registers the repository as a project, or re-links the existing project
 * of that repository to `ownerId`.
 */
export async function registerProject(
  store: RecordStore,
  input: RegisterProjectInput,
): Promise<{ project: Project; created: boolean }> {
  const log = getLogger();

  const parsed = parseRepositoryUrl(input.repoUrl);
  const owner = input.repoOwner ?? parsed?.owner;
  const name = input.repoName ?? parsed?.name;
  if (!owner || !name) {
    throw new InvalidProjectError(
      `Cannot determine repository owner and name from ${input.repoUrl}`,
    );
  }
  const repoOwner = normalizeCoordinate(owner);
  const repoName = normalizeCoordinate(name);

  const existing = await store.projects.findByRepository(repoOwner, repoName);
  if (existing) {
    if (existing.ownerId === input.ownerId) {
      return { project: existing, created: false };
    }
    const linked = await linkProject(store, existing.id, input.ownerId);
    return { project: linked, created: false };
  }

  const base = (input.slug && toHostnameLabel(input.slug)) || slugify(input.name);
  for (let attempt = 0; attempt < MAX_SLUG_ATTEMPTS; attempt++) {
    const slug = withSuffix(base, attempt);
    if (await store.projects.findBySlug(slug)) {
      continue;
    }

    const project = await store.projects.create({
      ownerId: input.ownerId,
      name: input.name,
      slug,
      repoOwner,
      repoName,
      repoUrl: input.repoUrl,
      branch: input.branch ?? "main",
    });
    log.info(`Registered project ${project.slug} for ${repoOwner}/${repoName}`);
    return { project, created: true };
  }

  throw new ProjectConflictError(`No free slug derived from "${base}"`);
}

export async function linkProject(
  store: RecordStore,
  projectId: string,
  ownerId: string,
) {
  const project = await store.projects.update(projectId, { ownerId });
  if (!project) {
    throw new ProjectNotFoundError(`Project ${projectId} not found`);
  }
  getLogger().info(`Linked project ${project.slug} to owner ${ownerId}`);
  return project;
}

export async function getProject(store: RecordStore, projectId: string) {
  const project = await store.projects.findById(projectId);
  if (!project) {
    throw new ProjectNotFoundError(`Project ${projectId} not found`);
  }
  const hostname = await store.hostnames.findActiveByProject(projectId);
  return { ...project, hostname: hostname?.hostname ?? null };
}

/** Projects, newest first, each with its active hostname. */
export async function listProjects(
  store: RecordStore,
  filter: { ownerId?: string } = {},
) {
  const projects = await store.projects.list(filter);
  return Promise.all(
    projects.map(async (project) => {
      const hostname = await store.hostnames.findActiveByProject(project.id);
      return { ...project, hostname: hostname?.hostname ?? null };
    }),
  );
}

export async function listProjectDeployments(
  store: RecordStore,
  projectId: string,
) {
  const project = await store.projects.findById(projectId);
  if (!project) {
    throw new ProjectNotFoundError(`Project ${projectId} not found`);
  }
  return store.deployments.listByProject(projectId);
}

export async function findProjectByRepository(
  store: RecordStore,
  owner: string,
  name: string,
) {
  return store.projects.findByRepository(
    normalizeCoordinate(owner),
    normalizeCoordinate(name),
  );
}
