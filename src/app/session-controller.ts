import { EventEmitter } from "node:events";
import type { KeyPress } from "./keys.js";
import type { AppAction, SessionApp } from "./session-app.js";

export type LoopOutcome = { type: "quit" } | { type: "attach"; target: string };

/**
 * Run loop around {@link SessionApp}. Key presses and housekeeping ticks
 * share one promise chain, so the core never sees interleaved mutations.
 * Emits `finished` with the {@link LoopOutcome} once the user quits or
 * picks an attach target; later work is dropped.
 */
export class SessionController extends EventEmitter {
  private queue: Promise<void> = Promise.resolve();
  private pendingTick: Promise<void> | null = null;
  private finishedWith: LoopOutcome | null = null;

  public constructor(private readonly app: SessionApp) {
    super();
  }

  public get outcome(): LoopOutcome | null {
    return this.finishedWith;
  }

  public pressKey(key: KeyPress): Promise<void> {
    return this.enqueue(async () => {
      const action = await this.app.handleKey(key);
      await this.apply(action);
    });
  }

  /** At most one tick waits in the queue; extra calls share it. */
  public tick(): Promise<void> {
    if (this.pendingTick) {
      return this.pendingTick;
    }
    const tick = this.enqueue(() => this.app.tick()).finally(() => {
      this.pendingTick = null;
    });
    this.pendingTick = tick;
    return tick;
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    this.queue = this.queue
      .then(async () => {
        if (this.finishedWith) {
          return;
        }
        await task();
      })
      .catch((error: unknown) => {
        this.app.reportFailure("session task failed", error);
      });
    return this.queue;
  }

  private async apply(action: AppAction): Promise<void> {
    switch (action.type) {
      case "quit":
        this.finish({ type: "quit" });
        return;
      case "attach":
        this.finish({ type: "attach", target: action.target });
        return;
      case "refresh":
        await this.app.refresh();
        return;
      case "none":
        return;
    }
  }

  private finish(outcome: LoopOutcome): void {
    this.finishedWith = outcome;
    this.emit("finished", outcome);
  }
}
