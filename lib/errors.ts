// Error taxonomy for the graph engine.
// Caller mistakes throw; empty-but-valid answers are returned as values.

export type GraphEngineErrorCode =
  | 'UNKNOWN_NODE'
  | 'EMPTY_GRAPH'
  | 'INVALID_WEIGHT'
  | 'INVALID_TIMESTAMP'
  | 'INVALID_CONFIG';

export class GraphEngineError extends Error {
  readonly code: GraphEngineErrorCode;

  constructor(code: GraphEngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownNodeError extends GraphEngineError {
  readonly nodeId: string;

  constructor(nodeId: string) {
    super('UNKNOWN_NODE', `Unknown node "${nodeId}"`);
    this.nodeId = nodeId;
  }
}

export class EmptyGraphError extends GraphEngineError {
  constructor(operation: string) {
    super('EMPTY_GRAPH', `${operation} requires a graph with at least one node`);
  }
}

export class InvalidWeightError extends GraphEngineError {
  readonly weight: number;

  constructor(weight: number) {
    super('INVALID_WEIGHT', `Edge weight must be a positive integer, got ${weight}`);
    this.weight = weight;
  }
}

export class InvalidTimestampError extends GraphEngineError {
  constructor(value: unknown, message = `Unparseable timestamp "${String(value)}"`) {
    super('INVALID_TIMESTAMP', message);
  }
}

export class ConfigurationError extends GraphEngineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid engine configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
