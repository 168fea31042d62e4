import { spawn } from "node:child_process";

export interface RunCommandResult {
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  /** Written to the child's stdin, which is then closed. */
  input?: string;
}

const STDERR_TAIL_LINES = 20;

function tail(text: string, lines: number): string {
  return text.trim().split("\n").slice(-lines).join("\n");
}

export class CommandError extends Error {
  readonly command: string;
  readonly args: string[];
  /** `null` when the process never started or was killed by a signal. */
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(params: {
    command: string;
    args: string[];
    exitCode: number | null;
    stderr: string;
    cause?: unknown;
  }) {
    const reason = params.exitCode === null ? "could not be run" : `exited with code ${params.exitCode}`;
    const detail = tail(params.stderr, STDERR_TAIL_LINES);
    super(
      `Command ${reason}: ${params.command} ${params.args.join(" ")}${detail ? `\n${detail}` : ""}`,
      { cause: params.cause },
    );
    this.name = "CommandError";
    this.command = params.command;
    this.args = params.args;
    this.exitCode = params.exitCode;
    this.stderr = params.stderr;
  }

  get notFound(): boolean {
    return this.exitCode === null && this.cause instanceof Error && "code" in this.cause && this.cause.code === "ENOENT";
  }
}

export function runCommand(
  command: string,
  args: string[],
  cwd: string,
  options: RunCommandOptions = {},
): Promise<RunCommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      stdio: [options.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    child.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString("utf8");
    });

    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString("utf8");
    });

    child.on("error", (error) => {
      reject(new CommandError({ command, args, exitCode: null, stderr, cause: error }));
    });

    child.on("close", (code) => {
      if (code === 0) {
        resolve({ stdout, stderr });
        return;
      }

      reject(new CommandError({ command, args, exitCode: code, stderr }));
    });

    if (options.input !== undefined) {
      child.stdin?.end(options.input, "utf8");
    }
  });
}
