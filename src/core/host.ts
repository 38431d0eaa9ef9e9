import type { Node, NodeType } from "./node.js";
import { Scope } from "./scope.js";
import type { Listener, Observable, Unsubscribe } from "./signal.js";

// UI 層（React / Vue adapter）只透過這幾個函式碰核心

export function createScope(parent: Scope | null = null, label?: string) {
  return new Scope({ parent, label });
}

export function destroyScope(scope: Scope) {
  scope.dispose();
}

export function attachNode<N extends Node>(scope: Scope, node: N): N {
  return scope.register(node);
}

export function detachNode(scope: Scope, node: Node) {
  scope.unregister(node);
}

/** Call once, after the host's first commit following attachNode. */
export function signalReady(node: Node) {
  node.markReady();
}

export function subscribe<T>(signal: Observable<T>, onChange: Listener<T>): Unsubscribe {
  return signal.subscribe(onChange);
}

export function unsubscribe(handle: Unsubscribe) {
  handle();
}

export function resolve<N extends Node>(scope: Scope, type: NodeType<N>): N {
  return scope.find(type);
}
