/**
 * Cooperative cancellation.
 *
 * The source owns the right to cancel; everything downstream only sees the
 * token and checks it at its own checkpoint boundaries.
 */

export type CancellationListener = (reason: string) => void;

export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  readonly reason: string | null;
  /** Returns a function that removes the listener */
  onCancellationRequested(listener: CancellationListener): () => void;
}

class SourceToken implements CancellationToken {
  constructor(private readonly source: CancellationSource) {}

  get isCancellationRequested(): boolean {
    return this.source.reason !== null;
  }

  get reason(): string | null {
    return this.source.reason;
  }

  onCancellationRequested(listener: CancellationListener): () => void {
    return this.source.subscribe(listener);
  }
}

export class CancellationSource {
  private cancelledWith: string | null = null;
  private readonly listeners = new Set<CancellationListener>();

  readonly token: CancellationToken = new SourceToken(this);

  get reason(): string | null {
    return this.cancelledWith;
  }

  get isCancelled(): boolean {
    return this.cancelledWith !== null;
  }

  /**
   * Request cancellation. Later calls keep the first reason.
   */
  cancel(reason = "cancelled"): void {
    if (this.cancelledWith !== null) return;
    this.cancelledWith = reason;
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      listener(reason);
    }
  }

  subscribe(listener: CancellationListener): () => void {
    if (this.cancelledWith !== null) {
      listener(this.cancelledWith);
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

/** A token that is never cancelled. */
export const NEVER_CANCELLED: CancellationToken = new CancellationSource().token;
