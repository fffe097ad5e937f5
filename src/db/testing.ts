import type { BindVariable } from "../engine/types.js";
import type { ConnectionProvider, DatabaseSession, ProcedureOutcome, QueryOutcome } from "./ConnectionProvider.js";

export interface RecordedCall {
  kind: "query" | "execute";
  /** Batch text for `query`, procedure name for `execute`. */
  text: string;
  bindings: BindVariable[];
  database?: string;
}

type Scripted<T> = T | Error;

/**
 * In-process ConnectionProvider that records every statement and replays
 * queued outcomes in order. An empty queue answers with no result sets.
 */
export class FakeConnectionProvider implements ConnectionProvider {
  readonly calls: RecordedCall[] = [];
  readonly acquisitions: { database?: string; environment?: string }[] = [];
  released = 0;

  private readonly queryOutcomes: Scripted<QueryOutcome>[] = [];
  private readonly procedureOutcomes: Scripted<ProcedureOutcome>[] = [];
  private acquireError?: Error;

  queueQuery(outcome: Scripted<Partial<QueryOutcome>>): this {
    this.queryOutcomes.push(
      outcome instanceof Error ? outcome : { recordsets: [], rowsAffected: [], ...outcome }
    );
    return this;
  }

  queueProcedure(outcome: Scripted<Partial<ProcedureOutcome>>): this {
    this.procedureOutcomes.push(
      outcome instanceof Error
        ? outcome
        : { recordsets: [], rowsAffected: [], returnValue: 0, output: {}, ...outcome }
    );
    return this;
  }

  failAcquire(error: Error): this {
    this.acquireError = error;
    return this;
  }

  async acquire(database?: string, environment?: string): Promise<DatabaseSession> {
    this.acquisitions.push({ database, environment });
    if (this.acquireError) {
      throw this.acquireError;
    }
    return new FakeSession(this, database);
  }

  nextQuery(): QueryOutcome {
    return settle(this.queryOutcomes.shift(), { recordsets: [], rowsAffected: [] });
  }

  nextProcedure(): ProcedureOutcome {
    return settle(this.procedureOutcomes.shift(), { recordsets: [], rowsAffected: [], returnValue: 0, output: {} });
  }
}

function settle<T>(scripted: Scripted<T> | undefined, fallback: T): T {
  if (scripted instanceof Error) {
    throw scripted;
  }
  return scripted ?? fallback;
}

class FakeSession implements DatabaseSession {
  constructor(
    private readonly provider: FakeConnectionProvider,
    readonly database?: string
  ) {}

  async query(text: string, bindings: BindVariable[] = []): Promise<QueryOutcome> {
    this.provider.calls.push({ kind: "query", text, bindings, database: this.database });
    return this.provider.nextQuery();
  }

  async execute(procedure: string, bindings: BindVariable[] = []): Promise<ProcedureOutcome> {
    this.provider.calls.push({ kind: "execute", text: procedure, bindings, database: this.database });
    return this.provider.nextProcedure();
  }

  async release(): Promise<void> {
    this.provider.released++;
  }
}
