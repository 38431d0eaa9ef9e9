import { log } from "./devtools/log.js";
import { BridgeStateError } from "./errors.js";
import type { Node, NodeType } from "./node.js";
import type { Scope } from "./scope.js";
import {
  BaseSignal,
  type Observable,
  type Releasable,
  type Signal,
  type SignalOptions,
  type Unsubscribe,
} from "./signal.js";

export type BridgeState = "unconnected" | "connected" | "disposed";

/** What a node needs from a bridge: connect on attach, release on dispose. */
export interface Bridge extends Releasable {
  readonly state: BridgeState;
  connect(scope: Scope): void;
  /** Back to unconnected; used when the owning node fails to attach. */
  disconnect(): void;
}

/**
 * Signal whose value comes from a signal owned by another node.
 * The parent node is resolved when the owning node attaches to a scope.
 */
export abstract class BaseBridgeSignal<N extends Node, S, V>
  extends BaseSignal<V | undefined>
  implements Bridge
{
  private status: BridgeState = "unconnected";
  private parentNode: N | null = null;
  private unsubscribe: Unsubscribe | null = null;

  protected constructor(
    readonly parent: NodeType<N>,
    options?: SignalOptions<V | undefined>
  ) {
    super(undefined, options);
  }

  get state(): BridgeState {
    return this.status;
  }

  protected abstract source(node: N): Observable<S>;
  protected abstract derive(parentValue: S): V | undefined;

  connect(scope: Scope) {
    if (this.status !== "unconnected") {
      throw new BridgeStateError(`Bridge to "${this.parent.key}" cannot connect while ${this.status}`);
    }
    const node = scope.find(this.parent);
    const source = this.source(node);
    this.parentNode = node;
    this.status = "connected";
    // 先送出目前值，之後每次父 signal 變化都同步重算
    this.unsubscribe = source.subscribe(
      {
        next: (value) => this.store(this.derive(value)),
        complete: () => {
          this.unsubscribe = null;
          log("bridge", `source of bridge to ${this.parent.key} closed, keeping last value`);
        },
      },
      { immediate: true }
    );
    log("bridge", `connected to ${this.parent.key}`);
  }

  disconnect() {
    if (this.status !== "connected") return;
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.parentNode = null;
    this.status = "unconnected";
  }

  /** The resolved parent node; throws unless connected. */
  protected connectedParent(): N {
    if (this.status !== "connected" || this.parentNode === null) {
      throw new BridgeStateError(`Bridge to "${this.parent.key}" is ${this.status}`);
    }
    return this.parentNode;
  }

  dispose() {
    if (this.status === "disposed") return;
    this.status = "disposed";
    this.unsubscribe?.();
    this.unsubscribe = null;
    super.dispose();
  }
}

export interface BridgeOptions<N extends Node, V> extends SignalOptions<V | undefined> {
  parent: NodeType<N>;
  select: (node: N) => Signal<V>;
}

/**
 * Mirrors a parent node's signal without transformation. Writes go straight
 * back to the parent signal.
 *
 * ```ts
 * readonly age = this.registerSignal(
 *   new BridgeSignal({ parent: FormNode.type, select: (form) => form.age })
 * );
 * ```
 */
export class BridgeSignal<N extends Node, V> extends BaseBridgeSignal<N, V, V> {
  private readonly select: (node: N) => Signal<V>;

  constructor({ parent, select, ...options }: BridgeOptions<N, V>) {
    super(parent, options);
    this.select = select;
  }

  protected source(node: N) {
    return this.select(node);
  }

  protected derive(parentValue: V) {
    return parentValue;
  }

  get value(): V {
    return this.select(this.connectedParent()).value;
  }

  set value(next: V) {
    this.emit(next);
  }

  emit(next: V) {
    this.select(this.connectedParent()).value = next;
  }
}

export interface TransformBridgeOptions<N extends Node, S, V>
  extends SignalOptions<V | undefined> {
  parent: NodeType<N>;
  select: (node: N) => Observable<S>;
  /** Parent value to local value. Without it the bridge holds undefined. */
  transform?: (value: S) => V | undefined;
  /** Folds a local write back into the parent node. */
  update: (node: N, value: V | undefined) => void;
}

/**
 * Derives a value of a different type from a parent node's signal.
 * Reads run through `transform`, writes through `update`; the two need not
 * be inverses and a write never touches the local value directly.
 *
 * ```ts
 * readonly order = this.registerSignal(
 *   new TransformBridgeSignal({
 *     parent: OrdersNode.type,
 *     select: (orders) => orders.list,
 *     transform: (list) => list.find((o) => o.id === this.id),
 *     update: (orders, order) => order && orders.replace(order),
 *   })
 * );
 * ```
 */
export class TransformBridgeSignal<N extends Node, S, V> extends BaseBridgeSignal<N, S, V> {
  private readonly select: (node: N) => Observable<S>;
  private readonly transform: ((value: S) => V | undefined) | undefined;
  private readonly update: (node: N, value: V | undefined) => void;

  constructor({ parent, select, transform, update, ...options }: TransformBridgeOptions<N, S, V>) {
    super(parent, options);
    this.select = select;
    this.transform = transform;
    this.update = update;
  }

  protected source(node: N) {
    return this.select(node);
  }

  protected derive(parentValue: S) {
    return this.transform?.(parentValue);
  }

  get value(): V | undefined {
    if (this.state === "disposed") {
      throw new BridgeStateError(`Bridge to "${this.parent.key}" is disposed`);
    }
    return this.current;
  }

  set value(next: V | undefined) {
    this.emit(next);
  }

  emit(next: V | undefined) {
    this.update(this.connectedParent(), next);
  }
}
