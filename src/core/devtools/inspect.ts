import type { Node, NodeState } from "../node.js";
import type { Scope } from "../scope.js";

export type NodeSnapshot = {
  key: string;
  state: NodeState;
  signals: number;
  bridges: number;
};

export type ScopeSnapshot = {
  label: string;
  depth: number;
  parent: string | null;
  nodes: NodeSnapshot[];
  children: string[];
};

export function inspectNode(node: Node): NodeSnapshot {
  return {
    key: node.type.key,
    state: node.state,
    signals: node.signalCount,
    bridges: node.bridgeCount,
  };
}

// 單一 scope 的扁平快照（不遞迴）
export function inspectScope(scope: Scope): ScopeSnapshot {
  return {
    label: scope.label,
    depth: scope.depth,
    parent: scope.parent?.label ?? null,
    nodes: scope.nodes.map(inspectNode),
    children: scope.childScopes.map((c) => c.label),
  };
}

/** Every node reachable from `scope` by walking up to the root, nearest first. */
export function visibleNodes(scope: Scope) {
  const rows: Array<NodeSnapshot & { scope: string }> = [];
  const seen = new Set<string>();
  for (let s: Scope | null = scope; s; s = s.parent) {
    for (const node of s.nodes) {
      // 近的 scope 會遮住祖先同型別的 node
      if (seen.has(node.type.key)) continue;
      seen.add(node.type.key);
      rows.push({ ...inspectNode(node), scope: s.label });
    }
  }
  return rows;
}

export function logInspect(scope: Scope) {
  const snap = inspectScope(scope);
  console.log(
    `[inspect] ${snap.label}  depth=${snap.depth}  parent=${snap.parent ?? "(none)"}  children=${snap.children.length}`
  );
  if (snap.nodes.length) {
    console.table(snap.nodes);
  } else {
    console.log("  nodes (none)");
  }
}

/** Scope tree as Mermaid, for docs. */
export function toMermaid(root: Scope) {
  const lines = ["graph TD"];
  const id = (s: Scope) => s.label.replace(/[^a-zA-Z0-9_]/g, "_");
  const walk = (s: Scope) => {
    const keys = s.nodes.map((n) => n.type.key).join(", ");
    lines.push(`  ${id(s)}["${s.label}${keys ? `: ${keys}` : ""}"]`);
    for (const child of s.childScopes) {
      lines.push(`  ${id(s)} --> ${id(child)}`);
      walk(child);
    }
  };
  walk(root);
  return lines.join("\n");
}
