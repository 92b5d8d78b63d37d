import { relations, sql } from "drizzle-orm";
import {
  boolean,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";
import { timestamps } from "./columns.helpers.js";

export const projectSchema = pgTable(
  "project",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    // Account reference owned by the surrounding auth system
    ownerId: text("owner_id").notNull(),
    name: text("name").notNull(),
    slug: text("slug").notNull().unique(),
    repoOwner: text("repo_owner").notNull(),
    repoName: text("repo_name").notNull(),
    repoUrl: text("repo_url").notNull(),
    branch: text("branch").notNull().default("main"),
    ...timestamps,
  },
  (table) => ({
    repositoryIdx: uniqueIndex("project_repository_idx").on(
      table.repoOwner,
      table.repoName,
    ),
  }),
);

export const projectRelations = relations(projectSchema, ({ many }) => ({
  deployments: many(deploymentSchema),
  hostnames: many(hostnameSchema),
}));

export const deploymentStatusEnum = pgEnum("deployment_status", [
  "pending",
  "building",
  "deploying",
  "deployed",
  "failed",
]);

export const deploymentSchema = pgTable("deployment", {
  id: uuid("id").primaryKey().defaultRandom(),
  reference: text("reference").notNull().unique(),
  projectId: uuid("project_id")
    .references(() => projectSchema.id, { onDelete: "cascade" })
    .notNull(),
  status: deploymentStatusEnum("status").notNull().default("pending"),
  commitSha: text("commit_sha").notNull(),
  commitMessage: text("commit_message").notNull().default(""),
  branch: text("branch").notNull(),
  // Always the project's active hostname, never unique per deployment
  hostname: text("hostname"),
  imageTag: text("image_tag"),
  workloadName: text("workload_name"),
  workloadNamespace: text("workload_namespace"),
  ...timestamps,
});

export const deploymentRelations = relations(
  deploymentSchema,
  ({ one }) => ({
    project: one(projectSchema, {
      fields: [deploymentSchema.projectId],
      references: [projectSchema.id],
    }),
    build: one(buildSchema),
  }),
);

export const buildStatusEnum = pgEnum("build_status", [
  "building",
  "success",
  "failed",
]);

export const buildSchema = pgTable("build", {
  id: uuid("id").primaryKey().defaultRandom(),
  reference: text("reference").notNull().unique(),
  deploymentId: uuid("deployment_id")
    .references(() => deploymentSchema.id, { onDelete: "cascade" })
    .notNull()
    .unique(),
  status: buildStatusEnum("status").notNull().default("building"),
  logs: text("logs").notNull().default(""),
  startedAt: timestamp("started_at", { withTimezone: true }),
  completedAt: timestamp("completed_at", { withTimezone: true }),
  ...timestamps,
});

export const buildRelations = relations(buildSchema, ({ one }) => ({
  deployment: one(deploymentSchema, {
    fields: [buildSchema.deploymentId],
    references: [deploymentSchema.id],
  }),
}));

export const hostnameSchema = pgTable(
  "hostname",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    hostname: text("hostname").notNull().unique(),
    projectId: uuid("project_id")
      .references(() => projectSchema.id, { onDelete: "cascade" })
      .notNull(),
    deploymentId: uuid("deployment_id")
      .references(() => deploymentSchema.id)
      .notNull(),
    isActive: boolean("is_active").notNull().default(true),
    ...timestamps,
  },
  // At most one active hostname per project
  (table) => ({
    projectActiveIdx: uniqueIndex("hostname_project_active_idx")
      .on(table.projectId)
      .where(sql`${table.isActive} = true`),
  }),
);

export const hostnameRelations = relations(hostnameSchema, ({ one }) => ({
  project: one(projectSchema, {
    fields: [hostnameSchema.projectId],
    references: [projectSchema.id],
  }),
  deployment: one(deploymentSchema, {
    fields: [hostnameSchema.deploymentId],
    references: [deploymentSchema.id],
  }),
}));

export type Project = typeof projectSchema.$inferSelect;
export type NewProject = typeof projectSchema.$inferInsert;
export type Deployment = typeof deploymentSchema.$inferSelect;
export type NewDeployment = typeof deploymentSchema.$inferInsert;
export type DeploymentStatus = (typeof deploymentStatusEnum.enumValues)[number];
export type Build = typeof buildSchema.$inferSelect;
export type BuildStatus = (typeof buildStatusEnum.enumValues)[number];
export type Hostname = typeof hostnameSchema.$inferSelect;
