import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export class CommandError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string
  ) {
    super(`Command failed (${command}): code=${exitCode}\nSTDERR: ${stderr}`);
    this.name = "CommandError";
  }
}

function errorField(err: unknown, key: "stdout" | "stderr" | "code"): unknown {
  return typeof err === "object" && err !== null && key in err
    ? Reflect.get(err, key)
    : undefined;
}

export async function runCommand(
  command: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number; env?: Record<string, string> }
): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      encoding: "utf8",
      // yt-dlp's single-JSON dump easily exceeds the 1 MiB default
      maxBuffer: 64 * 1024 * 1024,
    });
    return { stdout, stderr, exitCode: 0 };
  } catch (err) {
    const code = errorField(err, "code");
    const stderr = errorField(err, "stderr");
    const exitCode = typeof code === "number" ? code : 1;
    const detail =
      typeof stderr === "string" && stderr
        ? stderr
        : err instanceof Error
          ? err.message
          : String(err);
    throw new CommandError(`${command} ${args.join(" ")}`, exitCode, detail);
  }
}
