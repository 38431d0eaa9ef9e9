import { AsyncValue } from "./async_value.js";
import { Signal, type SignalOptions } from "./signal.js";

export interface SourceObserver<T> {
  next(value: T): void;
  error(err: unknown): void;
  complete(): void;
}

export interface Subscription {
  unsubscribe(): void;
}

/** Minimal push source. RxJS observables satisfy it as is. */
export interface Subscribable<T> {
  subscribe(observer: SourceObserver<T>): Subscription;
}

/**
 * Signal mirroring a push source. Source errors become an error state and
 * do not end the signal.
 */
export class StreamSignal<T> extends Signal<AsyncValue<T>> {
  private subscription: Subscription | null = null;
  private generation = 0;
  private completed = false;

  constructor(
    private readonly source: Subscribable<T>,
    options?: SignalOptions<AsyncValue<T>>
  ) {
    super(AsyncValue.initial<T>(), options);
    this.resubscribe();
  }

  /** False once the source completed or the signal was disposed. */
  get isListening() {
    return this.subscription !== null && !this.completed;
  }

  resubscribe() {
    this.subscription?.unsubscribe();
    this.subscription = null;
    this.completed = false;
    const generation = ++this.generation;
    // 舊訂閱若還在送值，一律忽略
    const live = () => generation === this.generation && !this.isDisposed;
    // 已經是 Loading 也要再通知一次
    this.storeAlways(AsyncValue.loading());
    this.subscription = this.source.subscribe({
      next: (value) => {
        if (live()) this.emit(AsyncValue.data(value));
      },
      error: (err) => {
        if (live()) this.emit(AsyncValue.error(err));
      },
      complete: () => {
        if (live()) this.completed = true;
      },
    });
  }

  dispose() {
    // 先取消上游，再關閉自己的通道
    this.subscription?.unsubscribe();
    this.subscription = null;
    super.dispose();
  }
}
