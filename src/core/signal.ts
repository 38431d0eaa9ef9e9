import { SignalDisposedError, rethrowAll } from "./errors.js";

export type Comparator<T> = (a: T, b: T) => boolean;
const defaultEquals = Object.is;

export type Unsubscribe = () => void;
export type Listener<T> = (value: T) => void;

export interface SignalObserver<T> {
  next(value: T): void;
  /** Called once when the signal is disposed. */
  complete?(): void;
}

export interface SubscribeOptions {
  /** Deliver the current value to this observer first, then future changes. */
  immediate?: boolean;
}

export interface SignalOptions<T> {
  equals?: Comparator<T>;
}

/** What a consumer needs from any signal: read it and observe it. */
export interface Observable<T> {
  readonly value: T;
  subscribe(observer: Listener<T> | SignalObserver<T>, options?: SubscribeOptions): Unsubscribe;
}

/** Anything a node owns and has to release on teardown. */
export interface Releasable {
  dispose(): void;
}

type Entry<T> = { observer: SignalObserver<T> };

function toObserver<T>(observer: Listener<T> | SignalObserver<T>): SignalObserver<T> {
  return typeof observer === "function" ? { next: observer } : observer;
}

/**
 * Raw state + notification channel. Signal extends this; ReadableSignal only wraps it.
 */
export abstract class BaseSignal<T> implements Observable<T>, Releasable {
  protected current: T;
  private readonly equals: Comparator<T>;
  // 每次 subscribe 都是新的 entry，同一個函式訂閱兩次會收到兩次
  private readonly entries = new Set<Entry<T>>();
  private readonly queue: T[] = [];
  private delivering = false;
  private cursor = 0;
  private disposed = false;
  private view: ReadableSignal<T> | undefined;

  constructor(initial: T, options: SignalOptions<T> = {}) {
    this.current = initial;
    this.equals = options.equals ?? defaultEquals;
  }

  get value(): T {
    return this.current;
  }

  get isDisposed() {
    return this.disposed;
  }

  /** The read-only counterpart handed out to consumers. */
  get readable(): ReadableSignal<T> {
    return (this.view ??= new ReadableSignal(this));
  }

  get observerCount() {
    return this.entries.size;
  }

  subscribe(
    observer: Listener<T> | SignalObserver<T>,
    options: SubscribeOptions = {}
  ): Unsubscribe {
    const entry: Entry<T> = { observer: toObserver(observer) };
    if (this.disposed) {
      entry.observer.complete?.();
      return () => {};
    }
    this.entries.add(entry);
    // 派發中加入：排隊中的值會送到，最後一個就是目前值，不必重播
    const pending = this.delivering && this.cursor < this.queue.length - 1;
    if (options.immediate && !pending) entry.observer.next(this.current);
    return () => {
      this.entries.delete(entry);
    };
  }

  /**
   * Stores `next` and notifies when it differs from the current value.
   * Returns whether anything changed.
   */
  protected store(next: T): boolean {
    if (this.disposed) throw new SignalDisposedError();
    if (this.equals(this.current, next)) return false;
    this.storeAlways(next);
    return true;
  }

  /** Stores and delivers `next` without the equality check. */
  protected storeAlways(next: T) {
    if (this.disposed) throw new SignalDisposedError();
    this.current = next;
    this.deliver(next);
  }

  /**
   * Every live observer gets every value. An observer that throws does not
   * stop the fan-out; its error is rethrown to the writer afterwards.
   */
  private deliver(value: T) {
    this.queue.push(value);
    // 派發中又寫入：先排隊，等這一輪 fan-out 結束再送，維持發出順序
    if (this.delivering) return;
    this.delivering = true;
    const errors: unknown[] = [];
    try {
      for (this.cursor = 0; this.cursor < this.queue.length; this.cursor++) {
        const item = this.queue[this.cursor];
        for (const entry of Array.from(this.entries)) {
          if (!this.entries.has(entry)) continue;
          try {
            entry.observer.next(item);
          } catch (e) {
            errors.push(e);
          }
        }
      }
    } finally {
      this.queue.length = 0;
      this.cursor = 0;
      this.delivering = false;
    }
    rethrowAll(errors, "Several signal observers threw");
  }

  dispose() {
    if (this.disposed) return;
    this.disposed = true;
    const entries = Array.from(this.entries);
    this.entries.clear();
    for (const entry of entries) entry.observer.complete?.();
  }
}

/**
 * Read-only view over a signal. Two views over the same source are equal.
 */
export class ReadableSignal<T> implements Observable<T> {
  constructor(private readonly source: BaseSignal<T>) {}

  get value(): T {
    return this.source.value;
  }

  get isDisposed() {
    return this.source.isDisposed;
  }

  subscribe(observer: Listener<T> | SignalObserver<T>, options?: SubscribeOptions) {
    return this.source.subscribe(observer, options);
  }

  equals(other: unknown): boolean {
    return other instanceof ReadableSignal && other.source === this.source;
  }
}

export class Signal<T> extends BaseSignal<T> {
  constructor(initial: T, options?: SignalOptions<T>) {
    super(initial, options);
  }

  get value(): T {
    return this.current;
  }

  set value(next: T) {
    this.emit(next);
  }

  emit(next: T) {
    this.store(next);
  }

  update(fn: (prev: T) => T) {
    this.store(fn(this.current));
  }
}

export class NullableSignal<T> extends Signal<T | undefined> {
  constructor(initial?: T, options?: SignalOptions<T | undefined>) {
    super(initial, options);
  }
}
