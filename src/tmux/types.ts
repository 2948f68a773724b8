import type { TmuxSessionState } from "../types/model.js";

export interface TmuxGateway {
  listSessionTree(): Promise<TmuxSessionState[]>;
  createSession(name: string): Promise<void>;
  renameSession(oldName: string, newName: string): Promise<void>;
  killSession(name: string): Promise<void>;
  isAvailable(): Promise<boolean>;
}

export class TmuxCommandError extends Error {
  public constructor(
    message: string,
    public readonly args: readonly string[]
  ) {
    super(message);
    this.name = "TmuxCommandError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
