import readline from "node:readline";
import { execa } from "execa";
import type { BuildLogger } from "../service/build/logger.js";

type ExecOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
};

// Hide credentials embedded in clone URLs
export function redact(value: string) {
  return value.replace(/\/\/[^@/\s]+@/g, "//***@");
}

export async function execWithLogs(
  file: string,
  args: string[],
  logger: BuildLogger,
  options: ExecOptions = {},
): Promise<string> {
  const command = redact([file, ...args].join(" "));
  logger.info(`Executing: ${command}`);

  try {
    const subprocess = execa(file, args, {
      stdio: ["ignore", "pipe", "pipe"],
      cwd: options.cwd,
      env: options.env,
      signal: options.signal,
    });

    const handleLine = (stream: "stdout" | "stderr", line: string) => {
      const logLevel = stream === "stdout" ? "info" : "warn";
      logger[logLevel](redact(line));
    };

    if (subprocess.stdout) {
      const rlStdout = readline.createInterface({ input: subprocess.stdout });
      rlStdout.on("line", (line) => handleLine("stdout", line));
    }

    if (subprocess.stderr) {
      const rlStderr = readline.createInterface({ input: subprocess.stderr });
      rlStderr.on("line", (line) => handleLine("stderr", line));
    }

    const result = await subprocess;
    return result.stdout;
  } catch (error: unknown) {
    if (
      error &&
      typeof error === "object" &&
      "exitCode" in error &&
      typeof error.exitCode === "number"
    ) {
      logger.error(`Command failed with exit code ${error.exitCode}: ${command}`);
      throw new Error(`${command} exited with code ${error.exitCode}`, {
        cause: error,
      });
    }
    logger.error(
      `Command failed: ${error instanceof Error ? error.message : String(error)}`,
    );
    throw error;
  }
}
