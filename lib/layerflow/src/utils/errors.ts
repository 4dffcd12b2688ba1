/**
 * Plain representation of an engine error, safe to post across a worker
 * boundary or to store next to a node record
 */
export interface SerializedError {
  readonly name: string;
  readonly message: string;
  readonly nodeIdentifier?: string;
  readonly cause?: {
    readonly name: string;
    readonly message: string;
  };
}

/**
 * Base class of every error raised by the engine
 */
export class FlowError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'FlowError';

    // For ES5 compatibility
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Converts error to object for serialization
   */
  toJSON(): SerializedError {
    return { name: this.name, message: this.message };
  }
}

/**
 * Wrong direction, same-kind pairing, plugs of one node, or a composite plug
 * paired with a scalar one. Raised at authoring time, never during evaluation.
 */
export class InvalidConnectionError extends FlowError {
  constructor(
    message: string,
    public readonly source?: string,
    public readonly target?: string
  ) {
    super(message);
    this.name = 'InvalidConnectionError';
  }
}

/**
 * Input plug already receives a connection
 */
export class PlugAlreadyConnectedError extends FlowError {
  constructor(
    public readonly plug: string,
    public readonly existing: string
  ) {
    super(`Input '${plug}' is already connected to '${existing}'; disconnect it first`);
    this.name = 'PlugAlreadyConnectedError';
  }
}

export class NotConnectedError extends FlowError {
  constructor(
    public readonly source: string,
    public readonly target: string
  ) {
    super(`'${source}' is not connected to '${target}'`);
    this.name = 'NotConnectedError';
  }
}

/**
 * The dependency graph over a graph's members is not acyclic
 */
export class CycleDetectedError extends FlowError {
  constructor(public readonly nodeIdentifiers: readonly string[]) {
    super(`Cycle detected between nodes: ${nodeIdentifiers.join(' -> ')}`);
    this.name = 'CycleDetectedError';
  }
}

/**
 * Error raised while evaluating a node
 *
 * Wraps whatever `compute` threw, tagged with the identifier of the node,
 * so the caller of an evaluator can tell which node failed.
 */
export class EvaluationError extends FlowError {
  /**
   * Identifier of node where error occurred
   */
  public readonly nodeIdentifier: string;

  constructor(nodeIdentifier: string, message: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'EvaluationError';
    this.nodeIdentifier = nodeIdentifier;

    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  /**
   * Wraps an error thrown by `compute`
   */
  static fromCause(nodeIdentifier: string, cause: unknown): EvaluationError {
    const error = cause instanceof Error ? cause : new Error(getErrorMessage(cause));
    return new EvaluationError(
      nodeIdentifier,
      `Evaluation of node '${nodeIdentifier}' failed: ${error.message}`,
      error
    );
  }

  public override toString(): string {
    return `[EvaluationError in ${this.nodeIdentifier}] ${this.message}`;
  }

  /**
   * Original error, if exists
   */
  get originalError(): Error | undefined {
    return isError(this.cause) ? this.cause : undefined;
  }

  override toJSON(): SerializedError {
    const original = this.originalError;
    return {
      name: this.name,
      message: this.message,
      nodeIdentifier: this.nodeIdentifier,
      cause: original ? { name: original.name, message: original.message } : undefined,
    };
  }
}

/**
 * Unresolvable type reference, missing record field, value that is not
 * JSON-compatible, or a record whose plugs do not fit the target node
 */
export class SerializationError extends FlowError {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(path ? `${message} (at ${path})` : message);
    this.name = 'SerializationError';
  }
}

/**
 * Authoring-time misuse of a graph or node: duplicate names, unknown plugs,
 * promoting a plug twice
 */
export class GraphError extends FlowError {
  constructor(message: string) {
    super(message);
    this.name = 'GraphError';
  }
}

/**
 * Worker crashed, timed out, or the pool was terminated with tasks pending
 */
export class WorkerPoolError extends FlowError {
  constructor(
    message: string,
    public readonly taskId?: string
  ) {
    super(message);
    this.name = 'WorkerPoolError';
  }
}

/**
 * Checks if object is one of the engine errors
 */
export function isFlowError(error: unknown): error is FlowError {
  return error instanceof FlowError;
}

export function isEvaluationError(error: unknown): error is EvaluationError {
  return error instanceof EvaluationError;
}

/**
 * Type guard for standard Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Safely extracts error message from unknown error type
 * @param error Error of unknown type
 * @returns Error message string
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Converts any thrown value into its serialized form
 */
export function serializeError(error: unknown): SerializedError {
  if (isFlowError(error)) {
    return error.toJSON();
  }
  if (isError(error)) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: getErrorMessage(error) };
}

/**
 * Rebuilds an error received from a worker. Evaluation and serialization
 * errors keep their class so callers can branch on them.
 */
export function deserializeError(data: SerializedError): Error {
  switch (data.name) {
    case 'EvaluationError': {
      const cause = data.cause ? Object.assign(new Error(data.cause.message), { name: data.cause.name }) : undefined;
      return new EvaluationError(data.nodeIdentifier ?? 'unknown', data.message, cause);
    }
    case 'SerializationError':
      return new SerializationError(data.message);
    default:
      return Object.assign(new Error(data.message), { name: data.name });
  }
}
