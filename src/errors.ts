export type RecordKind = 'payload' | 'event' | 'player' | 'match' | 'lineup';

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly cause?: unknown
  ) {
    super(`${message} (${url})`);
    this.name = 'ParseError';
  }
}

export class SchemaError extends Error {
  constructor(
    public readonly kind: RecordKind,
    public readonly field: string,
    public readonly matchId: number | null,
    detail: string
  ) {
    super(`Invalid ${kind} record for match ${matchId ?? '?'}: ${field} ${detail}`);
    this.name = 'SchemaError';
  }
}

export class NavigationError extends Error {
  constructor(
    message: string,
    public readonly available: string[] = []
  ) {
    super(available.length > 0 ? `${message}. Available: ${available.join(', ')}` : message);
    this.name = 'NavigationError';
  }
}

export class SinkError extends Error {
  constructor(
    public readonly table: string,
    public readonly matchId: number,
    public readonly cause?: unknown
  ) {
    super(`Failed to upsert ${table} for match ${matchId}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'SinkError';
  }
}
