export type SendFn = (data: string) => Promise<void>;

type QueueItem = {
  readonly label: string;
  readonly data: string;
};

export type OutboundQueueOptions = {
  readonly send: SendFn;
  readonly onSendError: (error: Error, label: string) => void;
};

/**
 * Single writer for a socket: callers enqueue and return immediately, one drain
 * loop performs the writes strictly in enqueue order.
 */
export class OutboundQueue {
  private readonly queue: QueueItem[] = [];
  private draining = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  public constructor(private readonly opts: OutboundQueueOptions) {}

  public get size(): number {
    return this.queue.length;
  }

  /** Returns false when the queue no longer accepts writes. */
  public push(label: string, data: string): boolean {
    if (this.closed) return false;
    this.queue.push({ label, data });
    void this.drain();
    return true;
  }

  /** Resolves once everything queued so far has been handed to the socket. */
  public whenIdle(): Promise<void> {
    if (!this.draining && this.queue.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /** Stops accepting writes and drops what is still queued. */
  public close(): number {
    this.closed = true;
    const dropped = this.queue.length;
    this.queue.length = 0;
    if (!this.draining) this.notifyIdle();
    return dropped;
  }

  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;
    try {
      while (!this.closed && this.queue.length > 0) {
        const next = this.queue.shift();
        if (!next) break;
        try {
          await this.opts.send(next.data);
        } catch (error) {
          this.opts.onSendError(error instanceof Error ? error : new Error(String(error)), next.label);
        }
      }
    } finally {
      this.draining = false;
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
