import { describe, it, expect, vi } from 'vitest';
import { BridgeSignal, TransformBridgeSignal } from '../src/core/bridge_signal.js';
import { Node, NodeInterface, nodeType, type NodeType } from '../src/core/node.js';
import { Scope } from '../src/core/scope.js';
import { Signal } from '../src/core/signal.js';
import { NodeLifecycleError, NodeNotFoundError } from '../src/core/errors.js';
import { enableLogging } from '../src/core/devtools/log.js';
import { FormNode, OrdersNode, ProfileNode, type Order } from './fixtures.js';

/** Two bridges to FormNode and three plain signals; reports every release into `events`. */
class AuditNode extends Node {
  static readonly type: NodeType<AuditNode> = nodeType<AuditNode>('audit');
  readonly type = AuditNode.type;

  readonly a = this.registerSignal(new Signal(1));
  readonly ageBridge = this.registerSignal(
    new BridgeSignal({ parent: FormNode.type, select: (form) => form.age })
  );
  readonly b = this.registerSignal(new Signal('b'));
  readonly nameBridge = this.registerSignal(
    new TransformBridgeSignal<FormNode, string, string>({
      parent: FormNode.type,
      select: (form) => form.name,
      transform: (name) => name.toUpperCase(),
      update: (form, name) => {
        if (name) form.name.value = name.toLowerCase();
      },
    })
  );
  readonly c = this.registerSignal(new Signal(false));

  constructor(private readonly events: string[]) {
    super();
  }

  track() {
    const entries = [
      ['signal:a', this.a],
      ['bridge:age', this.ageBridge],
      ['signal:b', this.b],
      ['bridge:name', this.nameBridge],
      ['signal:c', this.c],
    ] as const;
    for (const [label, signal] of entries) {
      signal.subscribe({ next: () => {}, complete: () => this.events.push(label) });
    }
  }

  protected onDispose() {
    this.events.push('onDispose');
  }
}

class LateBridgeNode extends Node {
  static readonly type: NodeType<LateBridgeNode> = nodeType<LateBridgeNode>('late');
  readonly type = LateBridgeNode.type;

  addAgeBridge() {
    const bridge = new BridgeSignal({ parent: FormNode.type, select: (form) => form.age });
    this.registerBridges(bridge);
    return bridge;
  }

  addSignal() {
    return this.registerSignal(new Signal(0));
  }
}

/** Bridges to FormNode first, then to OrdersNode. */
class SummaryNode extends Node {
  static readonly type: NodeType<SummaryNode> = nodeType<SummaryNode>('summary');
  readonly type = SummaryNode.type;

  readonly age = this.registerSignal(
    new BridgeSignal({ parent: FormNode.type, select: (form) => form.age })
  );
  readonly count = this.registerSignal(
    new TransformBridgeSignal<OrdersNode, Order[], number>({
      parent: OrdersNode.type,
      select: (orders) => orders.list,
      transform: (list) => list.length,
      update: () => {},
    })
  );
}

class TaskNode extends NodeInterface {
  static readonly type: NodeType<TaskNode> = nodeType<TaskNode>('task');
  readonly type = TaskNode.type;

  reset() {
    this.clearError();
  }
}

function setup() {
  const scope = new Scope({ label: 'root' });
  const form = scope.register(new FormNode());
  return { scope, form };
}

describe('Node: attach and init', () => {
  it('runs onInit after the bridges present at registration are connected', () => {
    const { scope } = setup();
    const profile = scope.register(new ProfileNode());

    expect(profile.hooks).toEqual(['init:connected:30']);
    expect(profile.state).toBe('attached');
    expect(profile.scope).toBe(scope);
  });

  it('fails when attached twice', () => {
    const { scope, form } = setup();
    expect(() => form.attach(scope)).toThrowError(NodeLifecycleError);
    expect(() => form.attach(new Scope())).toThrowError(/already attached/);
  });

  it('rolls back connected bridges when a later bridge cannot connect', () => {
    const { scope, form } = setup();
    const summary = new SummaryNode();

    expect(() => scope.register(summary)).toThrowError(NodeNotFoundError);

    expect(form.age.observerCount).toBe(0);
    expect(summary.age.state).toBe('unconnected');
    expect(summary.count.state).toBe('unconnected');
    expect(summary.state).toBe('created');
    expect(summary.scope).toBeNull();
    expect(scope.has(SummaryNode.type)).toBe(false);

    // 補上缺的父 Node 後可以再註冊
    scope.register(new OrdersNode());
    scope.register(summary);
    expect(summary.age.value).toBe(30);
    expect(summary.count.value).toBe(2);
    expect(form.age.observerCount).toBe(1);
  });

  it('runs onInit only once', () => {
    const { scope } = setup();
    const profile = scope.register(new ProfileNode());

    expect(() => profile.init()).toThrowError('Node "profile" was already initialized');
    expect(profile.hooks).toEqual(['init:connected:30']);
  });

  it('connects bridges registered after attachment immediately', () => {
    const { scope, form } = setup();
    const late = scope.register(new LateBridgeNode());

    const bridge = late.addAgeBridge();
    expect(bridge.state).toBe('connected');
    expect(bridge.value).toBe(30);

    form.age.value = 31;
    expect(bridge.value).toBe(31);
    expect(late.bridgeCount).toBe(1);
  });

  it('leaves bridges unconnected until the node is attached', () => {
    const { scope } = setup();
    const late = new LateBridgeNode();
    const bridge = late.addAgeBridge();
    expect(bridge.state).toBe('unconnected');

    scope.register(late);
    expect(bridge.state).toBe('connected');
  });
});

describe('Node: ready', () => {
  it('runs onReady once, only after attachment', () => {
    const { scope } = setup();
    const profile = new ProfileNode();
    expect(() => profile.markReady()).toThrowError(/ready in state created/);

    scope.register(profile);
    profile.markReady();
    expect(profile.state).toBe('ready');
    expect(profile.hooks).toEqual(['init:connected:30', 'ready']);

    expect(() => profile.markReady()).toThrowError(NodeLifecycleError);
  });

  it('ignores markReady after dispose', () => {
    const { scope } = setup();
    const profile = scope.register(new ProfileNode());
    scope.unregister(profile);

    expect(() => profile.markReady()).not.toThrow();
    expect(profile.state).toBe('disposed');
    expect(profile.hooks).toEqual(['init:connected:30', 'dispose:disposed']);
  });
});

describe('Node: dispose', () => {
  it('releases bridges, then signals, then runs onDispose', () => {
    const { scope, form } = setup();
    const events: string[] = [];
    const audit = scope.register(new AuditNode(events));
    audit.track();
    expect(form.age.observerCount).toBe(1);
    expect(form.name.observerCount).toBe(1);

    audit.dispose();

    expect(events).toEqual([
      'bridge:age',
      'bridge:name',
      'signal:a',
      'signal:b',
      'signal:c',
      'onDispose',
    ]);
    // 父 signal 上的訂閱已取消
    expect(form.age.observerCount).toBe(0);
    expect(form.name.observerCount).toBe(0);
  });

  it('counts bridges among its signals', () => {
    const audit = new AuditNode([]);
    expect(audit.signalCount).toBe(5);
    expect(audit.bridgeCount).toBe(2);
    expect(audit.hasSignal(audit.b)).toBe(true);
    expect(audit.hasSignal(new Signal(0))).toBe(false);
  });

  it('is idempotent', () => {
    const events: string[] = [];
    const audit = new AuditNode(events);
    audit.dispose();
    audit.dispose();
    expect(events).toEqual(['onDispose']);
  });

  it('refuses new signals once disposed', () => {
    const late = new LateBridgeNode();
    late.dispose();
    expect(() => late.addSignal()).toThrowError(/Cannot register a signal on disposed node "late"/);
    expect(() => late.addAgeBridge()).toThrowError(NodeLifecycleError);
  });

  it('logs the disposal', () => {
    const lines: string[] = [];
    enableLogging((line) => lines.push(line));
    new LateBridgeNode().dispose();
    expect(lines).toEqual(['[node] late and signals disposed']);
  });
});

describe('NodeInterface.loading', () => {
  it('toggles isLoading, records the error and rethrows it', async () => {
    const task = new TaskNode();
    const seen: boolean[] = [];
    task.isLoading.subscribe((v) => seen.push(v), { immediate: true });
    const failure = new Error('E');

    await expect(
      task.loading(() => Promise.reject(failure), { invokeLoading: true, fullScreen: false })
    ).rejects.toBe(failure);

    expect(seen).toEqual([false, true, false]);
    expect(task.error.value).toBe(failure);
    expect(task.fullScreenLoading.value).toBe(false);
  });

  it('uses fullScreenLoading instead of isLoading when asked', async () => {
    const task = new TaskNode();
    const full: boolean[] = [];
    const normal = vi.fn();
    task.fullScreenLoading.subscribe((v) => full.push(v));
    task.isLoading.subscribe(normal);

    const result = await task.loading(Promise.resolve('ok'), { fullScreen: true });

    expect(result).toBe('ok');
    expect(full).toEqual([true, false]);
    expect(normal).not.toHaveBeenCalled();
    expect(task.error.value).toBeUndefined();
  });

  it('leaves the flags alone when invokeLoading is false', async () => {
    const task = new TaskNode();
    const spy = vi.fn();
    task.isLoading.subscribe(spy);
    task.fullScreenLoading.subscribe(spy);

    await expect(task.loading(async () => 42, { invokeLoading: false })).resolves.toBe(42);
    expect(spy).not.toHaveBeenCalled();
  });

  it('shows loading while the operation is pending', async () => {
    const task = new TaskNode();
    let finish: () => void = () => {};
    const op = new Promise<void>((resolve) => {
      finish = () => resolve();
    });

    const run = task.loading(op);
    expect(task.isLoading.value).toBe(true);

    finish();
    await run;
    expect(task.isLoading.value).toBe(false);
  });

  it('rethrows the failure but skips its writes once the node is disposed', async () => {
    const task = new TaskNode();
    let fail = (_err: unknown) => {};
    const op = new Promise<void>((_resolve, reject) => {
      fail = reject;
    });

    const run = task.loading(op);
    task.dispose();
    const failure = new Error('late');
    fail(failure);

    await expect(run).rejects.toBe(failure);
    expect(task.isLoading.value).toBe(true);
    expect(task.error.value).toBeUndefined();
  });

  it('clearError() resets the error signal', async () => {
    const task = new TaskNode();
    await task.loading(Promise.reject(new Error('x'))).catch(() => {});
    expect(task.error.value).toBeInstanceOf(Error);

    task.reset();
    expect(task.error.value).toBeUndefined();
  });
});
