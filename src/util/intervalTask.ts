import type { Logger } from "../observability/logger";
import { errorMessage } from "../errors";

/**
 * Background loop on a timer that never keeps the process alive. A tick is
 * skipped while the previous one is still running.
 */
export class IntervalTask {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  public constructor(
    private readonly name: string,
    private readonly intervalMs: number,
    private readonly task: () => Promise<unknown>,
    private readonly log: Logger
  ) {}

  public start(): void {
    if (this.timer || this.intervalMs <= 0) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref();
    this.log.debug({ msg: `${this.name} started`, intervalMs: this.intervalMs });
  }

  private tick(): void {
    if (this.inFlight) return;
    this.inFlight = this.task()
      .then(
        () => undefined,
        (err: unknown) => {
          this.log.error({ msg: `${this.name} failed`, err: errorMessage(err) });
        }
      )
      .finally(() => {
        this.inFlight = null;
      });
  }

  /** Stops the timer and waits for a tick that is already running. */
  public async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) await this.inFlight;
  }
}
