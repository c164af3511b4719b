/**
 * Channel Pump
 * Queues channel events and exposes a single wait primitive bounded by a deadline and an interrupt signal
 */

import type { CommandChannel } from "../transport/types.js";

export type PumpEvent =
  | { type: "data"; chunk: Buffer }
  | { type: "exit"; code: number | null }
  | { type: "end" }
  | { type: "close" };

export type WaitOutcome =
  | { kind: "ready"; events: PumpEvent[] }
  | { kind: "timeout" }
  | { kind: "interrupted" };

export class ChannelPump {
  private queue: PumpEvent[] = [];
  private wake: (() => void) | undefined;
  private exitStatus: number | null | undefined;
  private detached = false;

  constructor(channel: CommandChannel) {
    channel.onData((chunk) => this.push({ type: "data", chunk }));
    channel.onExit((code) => {
      this.exitStatus = code;
      this.push({ type: "exit", code });
    });
    channel.onEnd(() => this.push({ type: "end" }));
    channel.onClose(() => this.push({ type: "close" }));
  }

  /**
   * Last exit status reported by the remote side, including events not consumed yet
   */
  public get lastExitStatus(): number | null | undefined {
    return this.exitStatus;
  }

  /**
   * Stop queueing events of a channel left running remotely; the exit status is still recorded
   */
  public detach(): void {
    this.detached = true;
    this.queue = [];
  }

  /**
   * Wait until at least one event is queued, the deadline passes or the signal aborts.
   * Every queued event is returned at once.
   */
  public async wait(deadline?: number, signal?: AbortSignal): Promise<WaitOutcome> {
    // timers may fire slightly early, so never report a timeout before the deadline
    while (this.queue.length === 0 && !signal?.aborted && (deadline === undefined || Date.now() < deadline)) {
      await new Promise<void>((resolve) => {
        let timer: NodeJS.Timeout | undefined;
        const finish = (): void => {
          if (timer !== undefined) {
            clearTimeout(timer);
          }
          signal?.removeEventListener("abort", finish);
          this.wake = undefined;
          resolve();
        };

        this.wake = finish;
        if (deadline !== undefined) {
          timer = setTimeout(finish, Math.max(0, deadline - Date.now()));
        }
        signal?.addEventListener("abort", finish, { once: true });
      });
    }

    if (signal?.aborted) {
      return { kind: "interrupted" };
    }
    if (this.queue.length > 0) {
      return { kind: "ready", events: this.queue.splice(0) };
    }
    return { kind: "timeout" };
  }

  private push(event: PumpEvent): void {
    if (this.detached) {
      return;
    }
    this.queue.push(event);
    this.wake?.();
  }
}
