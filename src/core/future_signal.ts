import { AsyncValue } from "./async_value.js";
import { log } from "./devtools/log.js";
import { Signal, type SignalOptions } from "./signal.js";

/**
 * Signal driven by a one-shot async producer.
 *
 * ```ts
 * const user = new FutureSignal(() => api.loadUser(id));
 * await user.fetch(); // loading -> data | error
 * ```
 */
export class FutureSignal<T> extends Signal<AsyncValue<T>> {
  private ticket = 0;

  constructor(
    private readonly producer: () => Promise<T>,
    options?: SignalOptions<AsyncValue<T>>
  ) {
    super(AsyncValue.initial<T>(), options);
  }

  /** Never rejects: failures become an error state. Only the latest call may write its result. */
  async fetch(): Promise<void> {
    if (this.isDisposed) {
      log("signal", "fetch on disposed future ignored");
      return;
    }
    const ticket = ++this.ticket;
    this.emit(AsyncValue.loading());
    let next: AsyncValue<T>;
    try {
      next = AsyncValue.data(await this.producer());
    } catch (e) {
      next = AsyncValue.error(e);
    }
    if (ticket !== this.ticket) return; // 已被較新的 fetch 取代
    if (this.isDisposed) {
      log("signal", "future settled after dispose, result dropped");
      return;
    }
    this.emit(next);
  }
}
