import { createInterface, type Interface } from "node:readline/promises";
import { spawn } from "node:child_process";
import { InterruptedError, type InterruptReason } from "./errors.js";

export type Prompt = {
  ask(question: string): Promise<string>;
  close(): void;
};

export type ConsolePromptOptions = {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Defaults to whether output is a TTY. */
  terminal?: boolean;
};

function isAbortError(err: unknown) {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * One readline interface for the whole run, opened on the first question.
 * Ctrl-C or the end of input while a question is open rejects it with
 * InterruptedError; so does every later question.
 */
export function createConsolePrompt(options: ConsolePromptOptions = {}): Prompt {
  const { input = process.stdin, output = process.stdout, terminal } = options;

  let rl: Interface | null = null;
  let pending: ((err: Error) => void) | null = null;
  let interrupted: InterruptedError | null = null;
  let closing = false;

  function open() {
    const iface = createInterface({ input, output, terminal });
    let reason: InterruptReason = "input-closed";

    iface.on("SIGINT", () => {
      reason = "SIGINT";
      iface.close();
    });
    iface.on("close", () => {
      rl = null;
      if (closing) return;
      interrupted = new InterruptedError(reason);
      pending?.(interrupted);
    });
    return iface;
  }

  return {
    ask(question) {
      if (interrupted) return Promise.reject(interrupted);
      const iface = (rl ??= open());

      return new Promise<string>((resolve, reject) => {
        pending = reject;
        void iface
          .question(question)
          .then(resolve, (err: unknown) => {
            reject(isAbortError(err) ? new InterruptedError("SIGINT") : err);
          })
          .finally(() => {
            pending = null;
          });
      });
    },
    close() {
      closing = true;
      rl?.close();
      rl = null;
      closing = false;
    },
  };
}

export type FileOpener = (file: string) => Promise<void>;

export function viewerCommand(
  file: string,
  platform: NodeJS.Platform = process.platform,
): [string, string[]] | null {
  if (platform === "darwin") return ["open", [file]];
  if (platform === "win32") return ["cmd", ["/c", "start", "", file]];
  if (platform === "linux" || platform === "freebsd" || platform === "openbsd") {
    return ["xdg-open", [file]];
  }
  return null;
}

/** Hands the file to the desktop's default PDF viewer without waiting for it. */
export const openInViewer: FileOpener = (file) =>
  new Promise((resolve, reject) => {
    const command = viewerCommand(file);
    if (!command) {
      reject(new Error(`Unsupported platform for opening files: ${process.platform}`));
      return;
    }
    const child = spawn(command[0], command[1], { detached: true, stdio: "ignore" });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
