/** Programming errors: wrong wiring between nodes, scopes and bridges. Never retried. */
export class ConfigurationError extends Error {
  name = "ConfigurationError";
}

export class DuplicateNodeError extends ConfigurationError {
  name = "DuplicateNodeError";

  constructor(readonly key: string) {
    super(
      `Node of type "${key}" already exists in this scope. ` +
        "Use a nested scope if you need a separate instance."
    );
  }
}

export class NodeNotFoundError extends ConfigurationError {
  name = "NodeNotFoundError";

  constructor(readonly key: string, where = "any scope") {
    super(
      `Node of type "${key}" was not found in ${where}. ` +
        "Make sure it is registered before it is looked up."
    );
  }
}

export class NodeLifecycleError extends ConfigurationError {
  name = "NodeLifecycleError";
}

export class ScopeDisposedError extends ConfigurationError {
  name = "ScopeDisposedError";

  constructor(label: string) {
    super(`Scope "${label}" is disposed`);
  }
}

export class SignalDisposedError extends Error {
  name = "SignalDisposedError";

  constructor() {
    super("Cannot write to a disposed signal");
  }
}

export class BridgeStateError extends Error {
  name = "BridgeStateError";
}

/** Throws the only error as is, several as one AggregateError. */
export function rethrowAll(errors: unknown[], message: string) {
  if (errors.length === 1) throw errors[0];
  if (errors.length > 1) throw new AggregateError(errors, message);
}
