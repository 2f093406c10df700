import { sleep as defaultSleep, type Clock, type Sleep } from '../utils/async';
import { Semaphore } from '../utils/concurrency';

interface HostState {
  mutex: Semaphore;
  lastCompletedAt: number | null;
}

/**
 * Serializes requests per host and keeps at least `minIntervalMs` between the
 * completion of one request and the start of the next, whatever the outcome.
 */
export class PolitenessGate {
  private readonly hosts = new Map<string, HostState>();
  private readonly clock: Clock;
  private readonly sleep: Sleep;

  constructor(
    private readonly minIntervalMs: number,
    options: { clock?: Clock; sleep?: Sleep } = {},
  ) {
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run<T>(host: string, task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const state = this.stateFor(host);
    return await state.mutex.run(async () => {
      if (state.lastCompletedAt !== null) {
        const waitMs = state.lastCompletedAt + this.minIntervalMs - this.clock();
        if (waitMs > 0) {
          await this.sleep(waitMs, signal);
        }
      }
      try {
        return await task();
      } finally {
        state.lastCompletedAt = this.clock();
      }
    }, signal);
  }

  private stateFor(host: string): HostState {
    const existing = this.hosts.get(host);
    if (existing) return existing;
    const created: HostState = { mutex: new Semaphore(1), lastCompletedAt: null };
    this.hosts.set(host, created);
    return created;
  }
}
