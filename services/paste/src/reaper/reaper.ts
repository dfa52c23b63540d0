import type { FastifyBaseLogger } from 'fastify';
import { systemClock } from '../clock';
import { deserializeRecord } from '../records/codec';
import { isReapable } from '../policy/lifecycle';
import type { PasteStore } from '../contracts/pasteStore';
import type { Clock, Nanos, PasteId } from '../types';

export type ReaperLogger = Pick<FastifyBaseLogger, 'info' | 'warn' | 'error'>;

export interface ReaperOptions {
  store: PasteStore;
  logger: ReaperLogger;
  intervalMs: number;
  /** How long an expired paste is kept (and answered with 410) before removal. */
  grace: Nanos;
  clock?: Clock;
}

/**
 * Background sweep that deletes pastes expired for longer than the grace period.
 * Scans under a read snapshot, then removes everything it found in one write.
 */
export class Reaper {
  private readonly store: PasteStore;
  private readonly logger: ReaperLogger;
  private readonly intervalMs: number;
  private readonly grace: Nanos;
  private readonly clock: Clock;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  constructor(opts: ReaperOptions) {
    this.store = opts.store;
    this.logger = opts.logger;
    this.intervalMs = opts.intervalMs;
    this.grace = opts.grace;
    this.clock = opts.clock ?? systemClock;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.timer.unref();
  }

  /** Stops the timer and waits for a sweep that is already under way. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) await this.running;
  }

  async sweep(now: Nanos = this.clock()): Promise<PasteId[]> {
    const doomed = await this.store.view(async (tx) => {
      const ids: PasteId[] = [];
      await tx.forEach((id, raw) => {
        if (!raw) return;
        try {
          if (isReapable(deserializeRecord(id, raw), now, this.grace)) ids.push(id);
        } catch (err) {
          this.logger.warn({ err, id }, 'Reaper skipped unreadable record');
        }
      });
      return ids;
    });

    if (doomed.length === 0) return doomed;

    await this.store.update(async (tx) => {
      for (const id of doomed) tx.delete(id);
    });
    this.logger.info({ count: doomed.length }, 'Reaper removed expired pastes');
    return doomed;
  }

  private tick() {
    // a slow sweep must not overlap with the next one
    if (this.running) return;
    this.running = this.sweep()
      .then(() => undefined)
      .catch((err) => {
        this.logger.error({ err }, 'Reaper sweep failed');
      })
      .finally(() => {
        this.running = null;
      });
  }
}
