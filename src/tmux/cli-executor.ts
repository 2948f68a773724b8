import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { parseSessionTree, SESSION_TREE_FMT } from "./parser.js";
import { TmuxCommandError, errorMessage, type TmuxGateway } from "./types.js";
import type { TmuxSessionState } from "../types/model.js";
import { isInsideTmux, withoutTmuxEnv } from "../util/env.js";
import type { Logger } from "../util/file-logger.js";

const execFileAsync = promisify(execFile);

export interface TmuxCliExecutorOptions {
  socketName?: string;
  socketPath?: string;
  tmuxBinary?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export interface TmuxCommand {
  file: string;
  args: string[];
}

const isNoServerRunningError = (message: string): boolean =>
  /no server running|no sessions|failed to connect to server|error connecting to .*no such file or directory/i.test(
    message
  );

const failureDetail = (error: unknown): string => {
  if (error instanceof Error && "stderr" in error && typeof error.stderr === "string") {
    const stderr = error.stderr.trim();
    if (stderr) {
      return stderr;
    }
  }
  return errorMessage(error).trim();
};

export class TmuxCliExecutor implements TmuxGateway {
  private readonly tmuxBinary: string;
  private readonly tmuxArgsPrefix: string[];
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly traceTmux: boolean;

  public constructor(options: TmuxCliExecutorOptions = {}) {
    if (options.socketName && options.socketPath) {
      throw new Error("tmux socketName and socketPath are mutually exclusive");
    }

    this.tmuxBinary = options.tmuxBinary ?? "tmux";
    this.tmuxArgsPrefix = options.socketPath
      ? ["-S", options.socketPath]
      : options.socketName
        ? ["-L", options.socketName]
        : [];
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.logger = options.logger;
    this.traceTmux = process.env.MUXTREE_TRACE_TMUX === "1";
  }

  private async runTmux(args: string[], failure: string): Promise<string> {
    const finalArgs = [...this.tmuxArgsPrefix, ...args];
    if (this.traceTmux) {
      this.logger?.log("[tmux]", this.tmuxBinary, finalArgs.join(" "));
    }
    try {
      const { stdout } = await execFileAsync(this.tmuxBinary, finalArgs, {
        timeout: this.timeoutMs,
        env: withoutTmuxEnv(process.env)
      });
      return stdout;
    } catch (error) {
      throw new TmuxCommandError(`${failure}: ${failureDetail(error)}`, finalArgs);
    }
  }

  public async isAvailable(): Promise<boolean> {
    try {
      await execFileAsync(this.tmuxBinary, ["-V"], { timeout: this.timeoutMs });
      return true;
    } catch (error) {
      this.logger?.error("tmux is not available", error);
      return false;
    }
  }

  public async listSessionTree(): Promise<TmuxSessionState[]> {
    let output: string;
    try {
      output = await this.runTmux(["list-panes", "-a", "-F", SESSION_TREE_FMT], "tmux error");
    } catch (error) {
      if (isNoServerRunningError(errorMessage(error))) {
        return [];
      }
      throw error;
    }

    if (!output.trim()) {
      return [];
    }
    return parseSessionTree(output);
  }

  public async createSession(name: string): Promise<void> {
    await this.runTmux(["new-session", "-d", "-s", name], "Failed to create session");
  }

  public async renameSession(oldName: string, newName: string): Promise<void> {
    await this.runTmux(["rename-session", "-t", oldName, newName], "Failed to rename session");
  }

  public async killSession(name: string): Promise<void> {
    await this.runTmux(["kill-session", "-t", name], "Failed to kill session");
  }

  /**
   * Command that hands the terminal to tmux. Inside an existing tmux client
   * the target is switched to instead of nesting a second client.
   */
  public attachCommand(target: string, env: NodeJS.ProcessEnv = process.env): TmuxCommand {
    const verb = isInsideTmux(env) ? "switch-client" : "attach-session";
    return {
      file: this.tmuxBinary,
      args: [...this.tmuxArgsPrefix, verb, "-t", target]
    };
  }
}
