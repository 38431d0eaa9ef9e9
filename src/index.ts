export {
  Signal,
  NullableSignal,
  ReadableSignal,
  BaseSignal,
  type Observable,
  type SignalObserver,
  type SignalOptions,
  type SubscribeOptions,
  type Listener,
  type Unsubscribe,
  type Comparator,
  type Releasable,
} from "./core/signal.js";
export {
  AsyncValue,
  type AsyncData,
  type AsyncError,
  type AsyncLoading,
  type AsyncHandlers,
} from "./core/async_value.js";
export { FutureSignal } from "./core/future_signal.js";
export {
  StreamSignal,
  type Subscribable,
  type SourceObserver,
  type Subscription,
} from "./core/stream_signal.js";
export {
  BaseBridgeSignal,
  BridgeSignal,
  TransformBridgeSignal,
  type Bridge,
  type BridgeState,
  type BridgeOptions,
  type TransformBridgeOptions,
} from "./core/bridge_signal.js";
export {
  Node,
  NodeInterface,
  nodeType,
  type NodeType,
  type NodeState,
  type LoadingOptions,
} from "./core/node.js";
export { Scope, NodeRegistry, type ScopeOptions } from "./core/scope.js";
export {
  createScope,
  destroyScope,
  attachNode,
  detachNode,
  signalReady,
  subscribe,
  unsubscribe,
  resolve,
} from "./core/host.js";
export {
  ConfigurationError,
  DuplicateNodeError,
  NodeNotFoundError,
  NodeLifecycleError,
  ScopeDisposedError,
  SignalDisposedError,
  BridgeStateError,
} from "./core/errors.js";
export { enableLogging, disableLogging, isLogging, type LogSink, type LogArea } from "./core/devtools/log.js";
export { inspectNode, inspectScope, visibleNodes, logInspect, toMermaid } from "./core/devtools/inspect.js";
