import { BaseBridgeSignal, type Bridge } from "./bridge_signal.js";
import { log } from "./devtools/log.js";
import { NodeLifecycleError } from "./errors.js";
import type { Scope } from "./scope.js";
import { NullableSignal, Signal, type ReadableSignal, type Releasable } from "./signal.js";

/**
 * Compile-time tag of a node kind. The registry keys on `key` and narrows
 * with `owns`, so it never has to look at constructors.
 */
export interface NodeType<N extends Node> {
  readonly key: string;
  owns(node: Node): node is N;
}

export function nodeType<N extends Node>(key: string): NodeType<N> {
  const type: NodeType<N> = {
    key,
    owns: (node: Node): node is N => node.type === type,
  };
  return type;
}

export type NodeState = "created" | "attached" | "ready" | "disposed";

/**
 * Owner of signals and bridges.
 *
 * created -> attached (scope registers it, bridges connect, onInit)
 *         -> ready    (host's first commit, onReady)
 *         -> disposed (bridges, then signals, then onDispose)
 *
 * If you need loading/error state use {@link NodeInterface}.
 */
export abstract class Node {
  abstract readonly type: NodeType<Node>;

  private lifecycle: NodeState = "created";
  private owner: Scope | null = null;
  private initialized = false;
  private readonly bridges: Bridge[] = [];
  private readonly signals: Releasable[] = [];

  get state(): NodeState {
    return this.lifecycle;
  }

  get isAttached() {
    return this.lifecycle === "attached" || this.lifecycle === "ready";
  }

  /** The scope this node lives in; only a relation, the scope owns the node. */
  get scope(): Scope | null {
    return this.owner;
  }

  get signalCount() {
    return this.signals.length;
  }

  get bridgeCount() {
    return this.bridges.length;
  }

  protected registerSignal<S extends Releasable>(signal: S): S {
    this.assertNotDisposed("register a signal on");
    if (signal instanceof BaseBridgeSignal) this.addBridge(signal);
    this.signals.push(signal);
    return signal;
  }

  protected registerBridges(...bridges: Bridge[]) {
    this.assertNotDisposed("register bridges on");
    for (const bridge of bridges) this.addBridge(bridge);
  }

  private addBridge(bridge: Bridge) {
    this.bridges.push(bridge);
    if (this.owner && this.isAttached) bridge.connect(this.owner);
  }

  hasSignal(signal: Releasable) {
    return this.signals.includes(signal);
  }

  /**
   * Called by the scope when registering. Connects pending bridges in order.
   * If one of them fails, the ones already connected are disconnected again
   * and the node stays `created`, so it can be registered later.
   */
  attach(scope: Scope) {
    if (this.lifecycle !== "created") {
      throw new NodeLifecycleError(`Node "${this.type.key}" was already attached (${this.lifecycle})`);
    }
    this.owner = scope;
    const connected: Bridge[] = [];
    try {
      for (const bridge of this.bridges) {
        bridge.connect(scope); // 找到父 Node 並訂閱
        connected.push(bridge);
      }
    } catch (e) {
      for (const bridge of connected) bridge.disconnect();
      this.owner = null;
      throw e;
    }
    this.lifecycle = "attached";
    log("node", `${this.type.key} attached to ${scope.label}`);
  }

  /** Called by the scope right after it stored the node. */
  init() {
    if (this.lifecycle !== "attached") {
      throw new NodeLifecycleError(`Cannot init node "${this.type.key}" in state ${this.lifecycle}`);
    }
    if (this.initialized) {
      throw new NodeLifecycleError(`Node "${this.type.key}" was already initialized`);
    }
    this.initialized = true;
    this.onInit();
  }

  /** Called by the host once, after its first commit following attachment. */
  markReady() {
    if (this.lifecycle === "disposed") return;
    if (this.lifecycle !== "attached") {
      throw new NodeLifecycleError(`Cannot mark node "${this.type.key}" ready in state ${this.lifecycle}`);
    }
    this.lifecycle = "ready";
    this.onReady();
  }

  dispose() {
    if (this.lifecycle === "disposed") return;
    this.lifecycle = "disposed";
    for (const bridge of this.bridges) bridge.dispose();
    for (const signal of this.signals) signal.dispose();
    this.onDispose();
    log("node", `${this.type.key} and signals disposed`);
  }

  /** First entry point; the scope is available and bridges are connected. */
  protected onInit() {}

  /** After the host's first commit. */
  protected onReady() {}

  /** When the host tears the node down. */
  protected onDispose() {}

  private assertNotDisposed(action: string) {
    if (this.lifecycle === "disposed") {
      throw new NodeLifecycleError(`Cannot ${action} disposed node "${this.type.key}"`);
    }
  }
}

export interface LoadingOptions {
  /** Toggle a loading flag around the operation. Default true. */
  invokeLoading?: boolean;
  /** Use `fullScreenLoading` instead of `isLoading`. Default false. */
  fullScreen?: boolean;
}

/**
 * Node with loading and error state.
 *
 * ```ts
 * class OrdersNode extends NodeInterface {
 *   readonly type = OrdersNode.type;
 *   save(order: Order) {
 *     return this.loading(() => api.save(order), { fullScreen: true });
 *   }
 * }
 * ```
 */
export abstract class NodeInterface extends Node {
  private readonly loadingFlag = this.registerSignal(new Signal(false));
  private readonly fullScreenFlag = this.registerSignal(new Signal(false));
  private readonly lastError = this.registerSignal(new NullableSignal<unknown>());

  get isLoading(): ReadableSignal<boolean> {
    return this.loadingFlag.readable;
  }

  get fullScreenLoading(): ReadableSignal<boolean> {
    return this.fullScreenFlag.readable;
  }

  get error(): ReadableSignal<unknown> {
    return this.lastError.readable;
  }

  /**
   * Runs `operation` with a loading flag raised. A failure is published on
   * `error` and rethrown to the caller.
   */
  async loading<T>(
    operation: Promise<T> | (() => Promise<T>),
    { invokeLoading = true, fullScreen = false }: LoadingOptions = {}
  ): Promise<T> {
    const flag = fullScreen ? this.fullScreenFlag : this.loadingFlag;
    if (invokeLoading) flag.value = true;
    try {
      return await (typeof operation === "function" ? operation() : operation);
    } catch (e) {
      if (!this.lastError.isDisposed) this.lastError.emit(e);
      throw e;
    } finally {
      // Node 可能在等待期間被 dispose
      if (invokeLoading && !flag.isDisposed) flag.value = false;
    }
  }

  protected clearError() {
    this.lastError.emit(undefined);
  }
}
