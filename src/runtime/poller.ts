import { type Sleep, sleep as defaultSleep } from "../core/clock";

/**
 * One observation of a polled resource. `ok: false` means the observation
 * itself failed (transport hiccup), not that the resource is unhealthy.
 */
export type PollObservation<T> =
  | { ok: true; done: true; value: T }
  | { ok: true; done: false; message: string }
  | { ok: false; message: string };

export type PollCheck<T> = () => Promise<PollObservation<T>>;

export type PollOutcome<T> =
  | { kind: "done"; value: T; polls: number }
  | { kind: "timeout"; polls: number; last: string }
  | { kind: "escalated"; polls: number; streak: number; last: string };

export interface PollerOptions {
  intervalMs: number;
  /** Upper bound on total waiting; polls = ceil(timeoutMs / intervalMs). */
  timeoutMs: number;
  /** Consecutive failed observations that abort the wait. */
  escalationThreshold?: number;
  sleep?: Sleep;
  onObservation?: (poll: number, message: string) => void;
}

/** Polls on a fixed interval up to a bounded number of polls. */
export class Poller {
  private readonly sleep: Sleep;
  private readonly escalationThreshold: number;

  constructor(private readonly options: PollerOptions) {
    if (!(options.intervalMs > 0) || !(options.timeoutMs > 0)) {
      throw new Error("poll interval and timeout must be positive");
    }
    this.sleep = options.sleep ?? defaultSleep;
    this.escalationThreshold = options.escalationThreshold ?? 3;
  }

  get maxPolls(): number {
    return Math.max(1, Math.ceil(this.options.timeoutMs / this.options.intervalMs));
  }

  async run<T>(check: PollCheck<T>): Promise<PollOutcome<T>> {
    let failureStreak = 0;
    let last = "no observation";

    for (let poll = 1; poll <= this.maxPolls; poll += 1) {
      let observation: PollObservation<T>;
      try {
        observation = await check();
      } catch (error) {
        observation = {
          ok: false,
          message: error instanceof Error ? error.message : "poll check failed",
        };
      }

      if (observation.ok && observation.done) {
        return { kind: "done", value: observation.value, polls: poll };
      }

      last = observation.message;
      this.options.onObservation?.(poll, last);
      if (observation.ok) {
        failureStreak = 0;
      } else {
        failureStreak += 1;
        if (failureStreak >= this.escalationThreshold) {
          return { kind: "escalated", polls: poll, streak: failureStreak, last };
        }
      }

      if (poll < this.maxPolls) {
        await this.sleep(this.options.intervalMs);
      }
    }

    return { kind: "timeout", polls: this.maxPolls, last };
  }
}
