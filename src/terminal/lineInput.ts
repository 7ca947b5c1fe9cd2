import * as readline from "node:readline";

export type LineEvent = "line" | "eof" | "interrupted";

/**
 * Lines from stdin as discrete events. Lines typed before anyone is waiting
 * are queued, so an early Enter is not lost between prompts.
 */
export class LineInput {
  private readonly rl: readline.Interface;
  private readonly queued: string[] = [];
  private waiter?: (event: "line" | "eof") => void;
  private closed = false;

  constructor(input: NodeJS.ReadableStream) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.rl.on("line", (line) => {
      const waiter = this.takeWaiter();
      if (waiter) {
        waiter("line");
      } else {
        this.queued.push(line);
      }
    });
    this.rl.once("close", () => {
      this.closed = true;
      this.takeWaiter()?.("eof");
    });
  }

  /** True once input has closed and every queued line was consumed. */
  get ended(): boolean {
    return this.closed && this.queued.length === 0;
  }

  next(signal?: AbortSignal): Promise<LineEvent> {
    if (signal?.aborted) return Promise.resolve("interrupted");
    if (this.queued.length > 0) {
      this.queued.shift();
      return Promise.resolve("line");
    }
    if (this.closed) return Promise.resolve("eof");

    return new Promise<LineEvent>((resolve) => {
      const onAbort = (): void => {
        this.waiter = undefined;
        resolve("interrupted");
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiter = (event) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(event);
      };
    });
  }

  close(): void {
    this.rl.close();
  }

  private takeWaiter(): ((event: "line" | "eof") => void) | undefined {
    const waiter = this.waiter;
    this.waiter = undefined;
    return waiter;
  }
}
