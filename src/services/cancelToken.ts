import { ConversionCancelledError } from '../errors';

type CancelListener = (reason: string) => void;

/**
 * Cooperative cancellation flag handed to a conversion engine. It can be
 * set once; engines poll `isCancelled` (or subscribe) at their checkpoints.
 */
export class CancelToken {
  private cancelledReason?: string;
  private readonly listeners = new Set<CancelListener>();

  get isCancelled(): boolean {
    return this.cancelledReason !== undefined;
  }

  get reason(): string | undefined {
    return this.cancelledReason;
  }

  /** Returns false when the token was already set. */
  cancel(reason = 'Cancelled by request.'): boolean {
    if (this.cancelledReason !== undefined) {
      return false;
    }

    this.cancelledReason = reason;
    for (const listener of this.listeners) {
      listener(reason);
    }
    this.listeners.clear();
    return true;
  }

  onCancel(listener: CancelListener): () => void {
    if (this.cancelledReason !== undefined) {
      listener(this.cancelledReason);
      return () => undefined;
    }

    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  throwIfCancelled(): void {
    if (this.cancelledReason !== undefined) {
      throw new ConversionCancelledError(this.cancelledReason);
    }
  }
}
