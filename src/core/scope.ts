import { log } from "./devtools/log.js";
import { DuplicateNodeError, NodeNotFoundError, ScopeDisposedError, rethrowAll } from "./errors.js";
import type { Node, NodeType } from "./node.js";

/** One node per node type, for a single scope level. */
export class NodeRegistry {
  private readonly nodes = new Map<string, Node>();

  get size() {
    return this.nodes.size;
  }

  has(type: NodeType<Node>) {
    return this.nodes.has(type.key);
  }

  /** Throws when the node's key is already taken. */
  assertVacant(node: Node) {
    if (this.nodes.has(node.type.key)) throw new DuplicateNodeError(node.type.key);
  }

  add(node: Node) {
    this.assertVacant(node);
    this.nodes.set(node.type.key, node);
  }

  get<N extends Node>(type: NodeType<N>): N | undefined {
    const node = this.nodes.get(type.key);
    return node && type.owns(node) ? node : undefined;
  }

  remove(node: Node) {
    if (this.nodes.get(node.type.key) !== node) return false;
    return this.nodes.delete(node.type.key);
  }

  values(): Node[] {
    return Array.from(this.nodes.values());
  }

  clear() {
    this.nodes.clear();
  }
}

export interface ScopeOptions {
  parent?: Scope | null;
  label?: string;
}

let seq = 0;

/**
 * Hierarchical node registry bound to a subtree of the host UI.
 * Lookups that miss at this level continue in the parent scope.
 */
export class Scope {
  readonly parent: Scope | null;
  readonly label: string;
  private readonly registry = new NodeRegistry();
  private readonly children = new Set<Scope>();
  private disposed = false;

  constructor({ parent = null, label }: ScopeOptions = {}) {
    this.parent = parent;
    this.label = label ?? `scope#${++seq}`;
    if (parent) {
      if (parent.isDisposed) throw new ScopeDisposedError(parent.label);
      parent.children.add(this);
    }
    log("scope", `${this.label} created${parent ? ` under ${parent.label}` : ""}`);
  }

  get isDisposed() {
    return this.disposed;
  }

  get depth(): number {
    return this.parent ? this.parent.depth + 1 : 0;
  }

  get nodes(): Node[] {
    return this.registry.values();
  }

  get childScopes(): Scope[] {
    return Array.from(this.children);
  }

  createChild(label?: string) {
    return new Scope({ parent: this, label });
  }

  /** Attaches the node (connecting its bridges), stores it, then runs its onInit. */
  register<N extends Node>(node: N): N {
    if (this.disposed) throw new ScopeDisposedError(this.label);
    this.registry.assertVacant(node);
    node.attach(this);
    this.registry.add(node);
    node.init();
    return node;
  }

  /** Removes the node and runs its full disposal. */
  unregister(target: Node | NodeType<Node>) {
    const node = "owns" in target ? this.registry.get(target) : target;
    if (!node || !this.registry.remove(node)) {
      const key = "owns" in target ? target.key : target.type.key;
      throw new NodeNotFoundError(key, `scope "${this.label}"`);
    }
    node.dispose();
  }

  /** This level only. */
  get<N extends Node>(type: NodeType<N>): N | undefined {
    return this.registry.get(type);
  }

  has(type: NodeType<Node>) {
    return this.registry.has(type);
  }

  /** This level, then every ancestor up to the root. */
  find<N extends Node>(type: NodeType<N>): N {
    for (let scope: Scope | null = this; scope; scope = scope.parent) {
      const node = scope.get(type);
      if (node) return node;
    }
    throw new NodeNotFoundError(type.key);
  }

  /**
   * Disposes child scopes, then every node here (no order between siblings).
   * A failing node or child does not stop the rest; failures are rethrown
   * once the scope is fully torn down.
   */
  dispose() {
    if (this.disposed) return;
    this.disposed = true;
    const errors: unknown[] = [];
    for (const child of Array.from(this.children)) {
      try {
        child.dispose();
      } catch (e) {
        errors.push(e);
      }
    }
    for (const node of this.registry.values()) {
      try {
        node.dispose();
      } catch (e) {
        errors.push(e);
      }
    }
    this.registry.clear();
    this.parent?.children.delete(this);
    log("scope", `${this.label} disposed`);
    rethrowAll(errors, `Disposing scope "${this.label}" failed`);
  }
}
