import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { ExecutionError } from "../errors.js";
import { errorMessage, logInfo } from "../observability/logger.js";

const execFileAsync = promisify(execFile);
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

export interface ToolCommand {
  binary: string;
  binaryArgs: string[];
  timeoutMs: number;
}

export interface ToolResult {
  stdout: string;
  stderr: string;
}

function failureDetails(error: unknown): { stderr: string; exitCode: number | null } {
  if (typeof error !== "object" || error === null) {
    return { stderr: "", exitCode: null };
  }
  const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr : "";
  const exitCode = "code" in error && typeof error.code === "number" ? error.code : null;
  return { stderr, exitCode };
}

/**
 * Runs one infrastructure tool subcommand inside a workspace directory with
 * the inherited process environment, capturing both output streams.
 */
export class WorkspaceExecutor {
  constructor(private readonly command: ToolCommand) {}

  async run(step: string, args: string[], cwd: string): Promise<ToolResult> {
    const startedAt = Date.now();
    try {
      const { stdout, stderr } = await execFileAsync(this.command.binary, [...this.command.binaryArgs, ...args], {
        cwd,
        env: process.env,
        timeout: this.command.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES
      });
      logInfo("workspace step completed", { data: { step, cwd, duration_ms: Date.now() - startedAt } });
      return { stdout, stderr };
    } catch (error) {
      const { stderr, exitCode } = failureDetails(error);
      const label = exitCode === null ? `${step} failed` : `${step} failed with exit code ${exitCode}`;
      throw new ExecutionError(label, {
        stderr: stderr.trim() ? stderr : errorMessage(error),
        exitCode,
        cause: error
      });
    }
  }
}
