export { type BuildLogger, createBuildLogger } from "./logger.js";
export { BuildPipeline, type BuildPipelineOptions, imageTagFor } from "./pipeline.js";
export { BuildQueue, DequeueCancelledError } from "./queue.js";
export { RECIPE_FILE, RecipeNotFoundError, resolveRecipe } from "./recipe.js";
export type { ImageBuilder, SourceFetcher, BuildJobSink } from "./types.js";
export { type DeploymentRunner, WorkerPool } from "./worker-pool.js";
