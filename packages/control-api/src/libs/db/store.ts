import type {
  Build,
  Deployment,
  DeploymentStatus,
  Hostname,
  Project,
} from "./schema.js";

export type CreateProjectInput = Pick<
  Project,
  "ownerId" | "name" | "slug" | "repoOwner" | "repoName" | "repoUrl" | "branch"
>;
export type ProjectUpdate = Partial<Pick<Project, "ownerId" | "name" | "branch">>;

export type CreateDeploymentInput = Pick<
  Deployment,
  "reference" | "projectId" | "commitSha" | "commitMessage" | "branch"
>;
export type DeploymentUpdate = Partial<
  Pick<
    Deployment,
    "hostname" | "imageTag" | "workloadName" | "workloadNamespace"
  >
>;

export type CreateBuildInput = Pick<
  Build,
  "reference" | "deploymentId" | "startedAt"
>;
export type BuildUpdate = Partial<
  Pick<Build, "status" | "logs" | "completedAt">
>;

export type CreateHostnameInput = Pick<
  Hostname,
  "hostname" | "projectId" | "deploymentId"
>;
export type HostnameUpdate = Partial<
  Pick<Hostname, "deploymentId" | "isActive">
>;

export interface ProjectFilter {
  ownerId?: string;
}

export interface DeploymentFilter {
  /** Only deployments of projects owned by this owner. */
  ownerId?: string;
  limit: number;
}

export interface ProjectRepository {
  create(input: CreateProjectInput): Promise<Project>;
  /** Newest first. */
  list(filter?: ProjectFilter): Promise<Project[]>;
  findById(id: string): Promise<Project | null>;
  findBySlug(slug: string): Promise<Project | null>;
  findByRepository(owner: string, name: string): Promise<Project | null>;
  update(id: string, input: ProjectUpdate): Promise<Project | null>;
}

export interface DeploymentRepository {
  create(input: CreateDeploymentInput): Promise<Deployment>;
  findById(id: string): Promise<Deployment | null>;
  /** Newest first. */
  list(filter: DeploymentFilter): Promise<Deployment[]>;
  /** Newest first. */
  listByProject(projectId: string): Promise<Deployment[]>;
  update(id: string, input: DeploymentUpdate): Promise<Deployment | null>;
  /**
   * Compare-and-set status change: the row is only written while its
   * current status is one of `from`. Returns null when nothing matched.
   */
  updateStatus(
    id: string,
    from: readonly DeploymentStatus[],
    to: DeploymentStatus,
    input?: DeploymentUpdate,
  ): Promise<Deployment | null>;
}

export interface BuildRepository {
  create(input: CreateBuildInput): Promise<Build>;
  findByDeploymentId(deploymentId: string): Promise<Build | null>;
  update(id: string, input: BuildUpdate): Promise<Build | null>;
}

export interface HostnameRepository {
  create(input: CreateHostnameInput): Promise<Hostname>;
  findActiveByProject(projectId: string): Promise<Hostname | null>;
  findByHostname(hostname: string): Promise<Hostname | null>;
  listByProject(projectId: string): Promise<Hostname[]>;
  update(id: string, input: HostnameUpdate): Promise<Hostname | null>;
  /** Deactivates every active row of the project except `exceptId`. */
  deactivateByProject(projectId: string, exceptId?: string): Promise<number>;
}

export interface RecordStore {
  readonly projects: ProjectRepository;
  readonly deployments: DeploymentRepository;
  readonly builds: BuildRepository;
  readonly hostnames: HostnameRepository;
  transaction<T>(fn: (store: RecordStore) => Promise<T>): Promise<T>;
}
