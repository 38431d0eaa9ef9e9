import { BridgeSignal, TransformBridgeSignal } from '../src/core/bridge_signal.js';
import { NodeInterface, nodeType, type NodeType } from '../src/core/node.js';
import { Signal } from '../src/core/signal.js';

export class FormNode extends NodeInterface {
  static readonly type: NodeType<FormNode> = nodeType<FormNode>('form');
  readonly type = FormNode.type;

  readonly age = this.registerSignal(new Signal(30));
  readonly name = this.registerSignal(new Signal('ada'));
}

export type Order = { id: number; total: number };

export class OrdersNode extends NodeInterface {
  static readonly type: NodeType<OrdersNode> = nodeType<OrdersNode>('orders');
  readonly type = OrdersNode.type;

  readonly list = this.registerSignal(
    new Signal<Order[]>([
      { id: 1, total: 10 },
      { id: 2, total: 20 },
    ])
  );

  replace(order: Order) {
    this.list.value = this.list.value.map((o) => (o.id === order.id ? order : o));
  }
}

/** Follows one order of OrdersNode; writes replace that order. */
export class OrderDetailNode extends NodeInterface {
  static readonly type: NodeType<OrderDetailNode> = nodeType<OrderDetailNode>('order-detail');
  readonly type = OrderDetailNode.type;

  readonly order: TransformBridgeSignal<OrdersNode, Order[], Order>;

  constructor(readonly orderId: number) {
    super();
    this.order = this.registerSignal(
      new TransformBridgeSignal<OrdersNode, Order[], Order>({
        parent: OrdersNode.type,
        select: (orders) => orders.list,
        transform: (list) => list.find((o) => o.id === orderId),
        update: (orders, order) => {
          if (order) orders.replace(order);
        },
      })
    );
  }
}

/** Mirrors FormNode.age and records its lifecycle hooks. */
export class ProfileNode extends NodeInterface {
  static readonly type: NodeType<ProfileNode> = nodeType<ProfileNode>('profile');
  readonly type = ProfileNode.type;

  readonly hooks: string[] = [];
  readonly age = this.registerSignal(
    new BridgeSignal({ parent: FormNode.type, select: (form) => form.age })
  );

  protected onInit() {
    this.hooks.push(`init:${this.age.state}:${this.age.value}`);
  }

  protected onReady() {
    this.hooks.push('ready');
  }

  protected onDispose() {
    this.hooks.push(`dispose:${this.age.state}`);
  }
}
