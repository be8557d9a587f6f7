import { execFile } from "node:child_process";
import * as os from "node:os";

/** Hands a file or folder to the desktop's default handler. */
export interface Opener {
  open(target: string): Promise<void>;
}

export interface OpenCommand {
  command: string;
  args: string[];
  /** Non-zero exit codes that still mean the target was handed over */
  successCodes: number[];
}

export function openCommandFor(platform: NodeJS.Platform, target: string): OpenCommand {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [target], successCodes: [] };
    case "win32":
      // No cmd.exe in between: it would re-parse `&`, `|` and `^` in the path.
      // explorer.exe exits with 1 even when it opened the target.
      return { command: "explorer.exe", args: [target], successCodes: [1] };
    default:
      return { command: "xdg-open", args: [target], successCodes: [] };
  }
}

export interface RunOptions {
  successCodes?: readonly number[];
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunOptions,
) => Promise<void>;

export function runCommand(
  command: string,
  args: string[],
  options?: RunOptions,
): Promise<void> {
  return new Promise((resolve, reject) => {
    execFile(command, args, { windowsHide: true }, (error, _stdout, stderr) => {
      if (error) {
        if (typeof error.code === "number" && options?.successCodes?.includes(error.code)) {
          resolve();
          return;
        }
        const detail = typeof stderr === "string" ? stderr.trim() : "";
        reject(new Error(detail || error.message, { cause: error }));
        return;
      }
      resolve();
    });
  });
}

export class SystemOpener implements Opener {
  readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;

  constructor(options?: { platform?: NodeJS.Platform; run?: CommandRunner }) {
    this.platform = options?.platform ?? os.platform();
    this.run = options?.run ?? runCommand;
  }

  async open(target: string): Promise<void> {
    const { command, args, successCodes } = openCommandFor(this.platform, target);
    await this.run(command, args, { successCodes });
  }
}
