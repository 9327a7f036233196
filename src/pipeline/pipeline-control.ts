type Listener = (reason: string) => void;

export interface CancelSignal {
  readonly cancelled: boolean;
  readonly signal: AbortSignal;
  onCancel(listener: Listener): () => void;
}

export class PipelineControl implements CancelSignal {
  private controller = new AbortController();
  private listeners = new Set<Listener>();

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(reason = 'cancelled'): void {
    if (this.cancelled) {
      return;
    }
    this.controller.abort(reason);
    for (const listener of this.listeners) {
      listener(reason);
    }
  }

  reset(): void {
    this.controller = new AbortController();
  }

  onCancel(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}
