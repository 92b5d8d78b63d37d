import { and, desc, eq, inArray, ne } from "drizzle-orm";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import * as schema from "./schema.js";
import {
  buildSchema,
  deploymentSchema,
  hostnameSchema,
  projectSchema,
} from "./schema.js";
import type { DeploymentStatus } from "./schema.js";
import type {
  BuildRepository,
  BuildUpdate,
  CreateBuildInput,
  CreateDeploymentInput,
  CreateHostnameInput,
  CreateProjectInput,
  DeploymentFilter,
  DeploymentRepository,
  DeploymentUpdate,
  HostnameRepository,
  HostnameUpdate,
  ProjectFilter,
  ProjectRepository,
  ProjectUpdate,
  RecordStore,
} from "./store.js";

// Both the root database and a transaction handle
type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

function firstOrThrow<T>(rows: T[], entity: string): T {
  const [row] = rows;
  if (!row) {
    throw new Error(`Failed to create ${entity} record`);
  }
  return row;
}

class DrizzleProjectRepository implements ProjectRepository {
  constructor(private readonly db: Executor) {}

  async create(input: CreateProjectInput) {
    const rows = await this.db.insert(projectSchema).values(input).returning();
    return firstOrThrow(rows, "project");
  }

  async list(filter: ProjectFilter = {}) {
    return this.db.query.projectSchema.findMany({
      where: filter.ownerId
        ? eq(projectSchema.ownerId, filter.ownerId)
        : undefined,
      orderBy: desc(projectSchema.createdAt),
    });
  }

  async findById(id: string) {
    const project = await this.db.query.projectSchema.findFirst({
      where: eq(projectSchema.id, id),
    });
    return project ?? null;
  }

  async findBySlug(slug: string) {
    const project = await this.db.query.projectSchema.findFirst({
      where: eq(projectSchema.slug, slug),
    });
    return project ?? null;
  }

  async findByRepository(owner: string, name: string) {
    const project = await this.db.query.projectSchema.findFirst({
      where: and(
        eq(projectSchema.repoOwner, owner),
        eq(projectSchema.repoName, name),
      ),
    });
    return project ?? null;
  }

  async update(id: string, input: ProjectUpdate) {
    const [project] = await this.db
      .update(projectSchema)
      .set(input)
      .where(eq(projectSchema.id, id))
      .returning();
    return project ?? null;
  }
}

class DrizzleDeploymentRepository implements DeploymentRepository {
  constructor(private readonly db: Executor) {}

  async create(input: CreateDeploymentInput) {
    const rows = await this.db
      .insert(deploymentSchema)
      .values({ ...input, status: "pending" })
      .returning();
    return firstOrThrow(rows, "deployment");
  }

  async findById(id: string) {
    const deployment = await this.db.query.deploymentSchema.findFirst({
      where: eq(deploymentSchema.id, id),
    });
    return deployment ?? null;
  }

  async list({ ownerId, limit }: DeploymentFilter) {
    return this.db.query.deploymentSchema.findMany({
      where: ownerId
        ? inArray(
            deploymentSchema.projectId,
            this.db
              .select({ id: projectSchema.id })
              .from(projectSchema)
              .where(eq(projectSchema.ownerId, ownerId)),
          )
        : undefined,
      orderBy: desc(deploymentSchema.createdAt),
      limit,
    });
  }

  async listByProject(projectId: string) {
    return this.db.query.deploymentSchema.findMany({
      where: eq(deploymentSchema.projectId, projectId),
      orderBy: desc(deploymentSchema.createdAt),
    });
  }

  async update(id: string, input: DeploymentUpdate) {
    const [deployment] = await this.db
      .update(deploymentSchema)
      .set(input)
      .where(eq(deploymentSchema.id, id))
      .returning();
    return deployment ?? null;
  }

  async updateStatus(
    id: string,
    from: readonly DeploymentStatus[],
    to: DeploymentStatus,
    input: DeploymentUpdate = {},
  ) {
    const [deployment] = await this.db
      .update(deploymentSchema)
      .set({ ...input, status: to })
      .where(
        and(
          eq(deploymentSchema.id, id),
          inArray(deploymentSchema.status, [...from]),
        ),
      )
      .returning();
    return deployment ?? null;
  }
}

class DrizzleBuildRepository implements BuildRepository {
  constructor(private readonly db: Executor) {}

  async create(input: CreateBuildInput) {
    const rows = await this.db
      .insert(buildSchema)
      .values({ ...input, status: "building" })
      .returning();
    return firstOrThrow(rows, "build");
  }

  async findByDeploymentId(deploymentId: string) {
    const build = await this.db.query.buildSchema.findFirst({
      where: eq(buildSchema.deploymentId, deploymentId),
    });
    return build ?? null;
  }

  async update(id: string, input: BuildUpdate) {
    const [build] = await this.db
      .update(buildSchema)
      .set(input)
      .where(eq(buildSchema.id, id))
      .returning();
    return build ?? null;
  }
}

class DrizzleHostnameRepository implements HostnameRepository {
  constructor(private readonly db: Executor) {}

  async create(input: CreateHostnameInput) {
    const rows = await this.db
      .insert(hostnameSchema)
      .values({ ...input, isActive: true })
      .returning();
    return firstOrThrow(rows, "hostname");
  }

  async findActiveByProject(projectId: string) {
    const hostname = await this.db.query.hostnameSchema.findFirst({
      where: and(
        eq(hostnameSchema.projectId, projectId),
        eq(hostnameSchema.isActive, true),
      ),
    });
    return hostname ?? null;
  }

  async findByHostname(hostname: string) {
    const row = await this.db.query.hostnameSchema.findFirst({
      where: eq(hostnameSchema.hostname, hostname),
    });
    return row ?? null;
  }

  async listByProject(projectId: string) {
    return this.db.query.hostnameSchema.findMany({
      where: eq(hostnameSchema.projectId, projectId),
    });
  }

  async update(id: string, input: HostnameUpdate) {
    const [hostname] = await this.db
      .update(hostnameSchema)
      .set(input)
      .where(eq(hostnameSchema.id, id))
      .returning();
    return hostname ?? null;
  }

  async deactivateByProject(projectId: string, exceptId?: string) {
    const rows = await this.db
      .update(hostnameSchema)
      .set({ isActive: false })
      .where(
        and(
          eq(hostnameSchema.projectId, projectId),
          eq(hostnameSchema.isActive, true),
          exceptId ? ne(hostnameSchema.id, exceptId) : undefined,
        ),
      )
      .returning({ id: hostnameSchema.id });
    return rows.length;
  }
}

export class DrizzleRecordStore implements RecordStore {
  readonly projects: ProjectRepository;
  readonly deployments: DeploymentRepository;
  readonly builds: BuildRepository;
  readonly hostnames: HostnameRepository;

  constructor(private readonly db: Executor) {
    this.projects = new DrizzleProjectRepository(db);
    this.deployments = new DrizzleDeploymentRepository(db);
    this.builds = new DrizzleBuildRepository(db);
    this.hostnames = new DrizzleHostnameRepository(db);
  }

  async transaction<T>(fn: (store: RecordStore) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => fn(new DrizzleRecordStore(tx)));
  }
}
