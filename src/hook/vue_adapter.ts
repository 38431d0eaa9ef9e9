import { customRef, inject, onMounted, onUnmounted, provide, type InjectionKey, type Ref } from "vue";
import {
  attachNode,
  createScope,
  destroyScope,
  detachNode,
  resolve,
  signalReady,
  subscribe,
  unsubscribe,
} from "../core/host.js";
import type { Node, NodeType } from "../core/node.js";
import type { Scope } from "../core/scope.js";
import type { Observable } from "../core/signal.js";

export const ScopeKey: InjectionKey<Scope> = Symbol("scope");

/** Creates a scope under the injected one (if any) and provides it to descendants. */
export function provideScope(label?: string): Scope {
  const scope = createScope(inject(ScopeKey, null), label);
  provide(ScopeKey, scope);
  onUnmounted(() => destroyScope(scope));
  return scope;
}

export function useScope(): Scope {
  const scope = inject(ScopeKey, null);
  if (!scope) throw new Error("No scope provided above this component. Call provideScope() in an ancestor.");
  return scope;
}

function bindNode<N extends Node>(scope: Scope, node: N): N {
  attachNode(scope, node);
  onMounted(() => signalReady(node));
  onUnmounted(() => {
    if (scope.get(node.type) === node) detachNode(scope, node);
  });
  return node;
}

/**
 * Registers a node for this component's lifetime. Call inside setup().
 * Pass the scope from provideScope() when both happen in the same component,
 * since inject() only sees what ancestors provided.
 */
export function provideNode<N extends Node>(create: () => N, scope: Scope = useScope()): N {
  return bindNode(scope, create());
}

export function provideNodes(factories: ReadonlyArray<() => Node>, scope: Scope = useScope()): Node[] {
  return factories.map((create) => bindNode(scope, create()));
}

export function useNode<N extends Node>(type: NodeType<N>): N {
  return resolve(useScope(), type);
}

/** Read-only Vue ref that follows a signal until the component unmounts. */
export function useSignalRef<T>(signal: Observable<T>): Readonly<Ref<T>> {
  let stop = () => {};
  const r = customRef<T>((track, trigger) => {
    stop = subscribe(signal, () => trigger());
    return {
      get: () => {
        track();
        return signal.value;
      },
      set: () => {
        throw new Error("Signal refs are read-only; write through the owning node.");
      },
    };
  });
  onUnmounted(() => unsubscribe(stop));
  return r;
}
