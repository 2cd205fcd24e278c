import { spawn } from "node:child_process";

export type CommandResult = {
  exitCode: number | null;
  signal: string | null;
  /** stdout and stderr, interleaved in arrival order. */
  output: string;
};

export type OutputListener = (line: string, stream: "stdout" | "stderr") => void;

/** Runs one shell command; injectable so the executor can be driven without processes. */
export type CommandRunner = (command: string, cwd: string, onLine?: OutputListener) => Promise<CommandResult>;

/** Cap on captured output kept for the report. */
export const MAX_CAPTURED_OUTPUT = 1024 * 1024;

/**
 * Run `command` through the platform shell in `cwd`, streaming output line by
 * line to `onLine` and capturing it. Resolves with the exit status; rejects
 * only when the process cannot be spawned.
 */
export const runShellCommand: CommandRunner = (command, cwd, onLine) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, { cwd, shell: true });
    child.stdin.end();

    let output = "";
    const pending = { stdout: "", stderr: "" };

    const capture = (chunk: string): void => {
      if (output.length < MAX_CAPTURED_OUTPUT) {
        output += chunk.slice(0, MAX_CAPTURED_OUTPUT - output.length);
      }
    };

    const feed = (stream: "stdout" | "stderr") => (text: string) => {
      capture(text);
      const lines = (pending[stream] + text).split(/\r?\n/);
      pending[stream] = lines.pop() ?? "";
      for (const line of lines) onLine?.(line, stream);
    };

    // Decoding on the stream keeps characters split across reads intact.
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", feed("stdout"));
    child.stderr.on("data", feed("stderr"));

    child.on("error", reject);
    child.on("close", (code, signal) => {
      for (const stream of ["stdout", "stderr"] as const) {
        if (pending[stream].length > 0) onLine?.(pending[stream], stream);
      }
      resolve({ exitCode: code, signal: signal ?? null, output });
    });
  });
