import { access, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { BuildLogger } from "./logger.js";

export const RECIPE_FILE = "Dockerfile";

export type RecipeSource = "explicit" | "node" | "python" | "go";

export interface Recipe {
  source: RecipeSource;
  /** Path relative to the source root. */
  file: string;
}

export class RecipeNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecipeNotFoundError";
  }
}

const NODE_RECIPE = `FROM node:20-alpine
WORKDIR /app
COPY package*.json ./
RUN npm install
COPY . .
RUN npm run build --if-present
ENV PORT=8080
EXPOSE 8080
CMD ["npm", "start"]
`;

const PYTHON_RECIPE = `FROM python:3.12-slim
WORKDIR /app
COPY requirements.txt .
RUN pip install --no-cache-dir -r requirements.txt
COPY . .
ENV PORT=8080
EXPOSE 8080
CMD ["python", "app.py"]
`;

const GO_RECIPE = `FROM golang:1.22-alpine AS builder
WORKDIR /app
COPY go.* ./
RUN go mod download
COPY . .
RUN go build -o app .

FROM alpine:3.20
RUN apk --no-cache add ca-certificates
WORKDIR /app
COPY --from=builder /app/app .
ENV PORT=8080
EXPOSE 8080
CMD ["./app"]
`;

// Checked in order, first match wins
export const PROJECT_MARKERS: ReadonlyArray<{
  marker: string;
  source: Exclude<RecipeSource, "explicit">;
  recipe: string;
}> = [
  { marker: "package.json", source: "node", recipe: NODE_RECIPE },
  { marker: "requirements.txt", source: "python", recipe: PYTHON_RECIPE },
  { marker: "go.mod", source: "go", recipe: GO_RECIPE },
];

async function exists(path: string) {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Picks the build recipe of a checked-out source tree. An explicit
 * Dockerfile always wins; otherwise one is generated from the first
 * project-type marker found.
 */
export async function resolveRecipe(
  sourceDir: string,
  logger: BuildLogger,
): Promise<Recipe> {
  if (await exists(join(sourceDir, RECIPE_FILE))) {
    logger.info(`Using ${RECIPE_FILE} provided by the repository`);
    return { source: "explicit", file: RECIPE_FILE };
  }

  for (const { marker, source, recipe } of PROJECT_MARKERS) {
    if (await exists(join(sourceDir, marker))) {
      logger.info(`Detected ${source} project (${marker}), generating ${RECIPE_FILE}`);
      await writeFile(join(sourceDir, RECIPE_FILE), recipe, "utf-8");
      return { source, file: RECIPE_FILE };
    }
  }

  throw new RecipeNotFoundError(
    `Could not detect project type: no ${RECIPE_FILE} and none of ${PROJECT_MARKERS.map(
      (m) => m.marker,
    ).join(", ")} found`,
  );
}
