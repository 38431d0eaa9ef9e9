import {
  createContext,
  useCallback,
  useContext,
  useEffect,
  useLayoutEffect,
  useRef,
  useState,
  useSyncExternalStore,
  type ReactNode,
} from "react";
import {
  attachNode,
  createScope,
  destroyScope,
  detachNode,
  resolve,
  signalReady,
  subscribe,
} from "../core/host.js";
import type { Node, NodeType } from "../core/node.js";
import type { Scope } from "../core/scope.js";
import type { Observable } from "../core/signal.js";

const ScopeContext = createContext<Scope | null>(null);

export function useScope(): Scope {
  const scope = useContext(ScopeContext);
  if (!scope) throw new Error("No ScopeProvider found above this component.");
  return scope;
}

/** Nearest node of `type`, walking up through enclosing scopes. */
export function useNode<N extends Node>(type: NodeType<N>): N {
  return resolve(useScope(), type);
}

export function useSignalValue<T>(signal: Observable<T>): T {
  const subscribeSignal = useCallback(
    (notify: () => void) => subscribe(signal, () => notify()),
    [signal]
  );
  const getSnapshot = () => signal.value;
  return useSyncExternalStore(subscribeSignal, getSnapshot, getSnapshot);
}

export function ScopeProvider({ label, children }: { label?: string; children?: ReactNode }) {
  const parent = useContext(ScopeContext);
  const [scope, setScope] = useState<Scope | null>(null);

  // layout 階段建立，子元件第一次 render 前 scope 已存在
  useLayoutEffect(() => {
    const next = createScope(parent, label);
    setScope(next);
    return () => destroyScope(next);
  }, [parent, label]);

  if (!scope || scope.isDisposed) return null;
  return <ScopeContext.Provider value={scope}>{children}</ScopeContext.Provider>;
}

export type NodeProviderProps<N extends Node> =
  | { create: () => N; render?: (node: N) => ReactNode; children?: ReactNode }
  | { nodes: ReadonlyArray<() => Node>; children?: ReactNode };

type Provided<N extends Node> = { all: Node[]; first: N | null };

/**
 * Creates nodes, registers them in the enclosing scope, marks them ready
 * after the first commit and disposes them on unmount.
 */
export function NodeProvider<N extends Node>(props: NodeProviderProps<N>) {
  const scope = useScope();
  const [provided, setProvided] = useState<Provided<N> | null>(null);
  // 只在掛載時讀一次 factory，之後的 props 變化不重建 node
  const propsRef = useRef(props);

  useLayoutEffect(() => {
    const initial = propsRef.current;
    const attached: Node[] = [];
    let first: N | null = null;
    try {
      if ("create" in initial) {
        first = attachNode(scope, initial.create());
        attached.push(first);
      } else {
        for (const create of initial.nodes) attached.push(attachNode(scope, create()));
      }
    } catch (e) {
      release(scope, attached);
      throw e;
    }
    setProvided({ all: attached, first });
    return () => release(scope, attached);
  }, [scope]);

  useEffect(() => {
    if (!provided) return;
    // StrictMode 重掛時舊的 node 已被釋放
    for (const node of provided.all) if (node.state === "attached") signalReady(node);
  }, [provided]);

  if (!provided) return null;
  if ("render" in props && props.render && provided.first) {
    return <>{props.render(provided.first)}</>;
  }
  return <>{props.children}</>;
}

function release(scope: Scope, nodes: Node[]) {
  for (const node of nodes) {
    // scope 可能已經先被拆掉並處理過 node
    if (scope.get(node.type) === node) detachNode(scope, node);
  }
}

export type SignalBuilderProps<N extends Node, S> = {
  node: NodeType<N>;
  select: (node: N) => Observable<S>;
  render: (value: S) => ReactNode;
};

/** Re-renders `render` whenever the selected signal changes. */
export function SignalBuilder<N extends Node, S>({ node, select, render }: SignalBuilderProps<N, S>) {
  const value = useSignalValue(select(useNode(node)));
  return <>{render(value)}</>;
}
