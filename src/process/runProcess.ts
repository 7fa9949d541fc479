import { spawn } from "child_process";

export type ProcessResult = {
  code: number;
  stdout: Buffer;
  stderr: string;
};

export type RunProcessOptions = {
  timeoutMs: number;
  input?: string;
  signal?: AbortSignal;
  cwd?: string;
};

export type ProcessRunner = (command: string, args: string[], options: RunProcessOptions) => Promise<ProcessResult>;

export const runProcess: ProcessRunner = (command, args, options) => {
  return new Promise<ProcessResult>((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new Error(`${command} aborted before start`));
      return;
    }

    const child = spawn(command, args, {
      cwd: options.cwd ?? process.cwd(),
      env: process.env,
      stdio: ["pipe", "pipe", "pipe"]
    });

    const stdout: Buffer[] = [];
    let stderr = "";
    let killedByTimeout = false;
    let killedByAbort = false;

    const timer = setTimeout(() => {
      killedByTimeout = true;
      child.kill("SIGKILL");
    }, options.timeoutMs);

    const onAbort = () => {
      killedByAbort = true;
      child.kill("SIGKILL");
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    child.stdout.on("data", (chunk: Buffer | string) => {
      stdout.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    });

    child.stderr.on("data", (chunk: Buffer | string) => {
      stderr += chunk.toString();
    });

    child.on("error", (error) => {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      reject(error);
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      if (killedByTimeout) {
        reject(new Error(`${command} timed out after ${options.timeoutMs}ms`));
        return;
      }
      if (killedByAbort) {
        reject(new Error(`${command} aborted`));
        return;
      }
      resolve({
        code: code ?? 1,
        stdout: Buffer.concat(stdout),
        stderr
      });
    });

    child.stdin.on("error", (error) => {
      console.warn(`[process] ${command} stdin closed early: ${error.message}`);
    });
    child.stdin.end(options.input ?? "", "utf-8");
  });
};
