import type { BindVariable, Row } from "../engine/types.js";

export interface QueryOutcome {
  recordsets: Row[][];
  rowsAffected: number[];
}

export interface ProcedureOutcome extends QueryOutcome {
  returnValue: unknown;
  /** Output parameter values keyed by driver name (no `@`). */
  output: Record<string, unknown>;
}

/**
 * One invocation's hold on a database connection. Statements run
 * sequentially; `release` must be called on every exit path.
 */
export interface DatabaseSession {
  readonly database?: string;
  query(text: string, bindings?: BindVariable[]): Promise<QueryOutcome>;
  execute(procedure: string, bindings?: BindVariable[]): Promise<ProcedureOutcome>;
  release(): Promise<void>;
}

export interface ConnectionProvider {
  acquire(database?: string, environment?: string): Promise<DatabaseSession>;
}

/** Runs `work` with a session from `provider` and releases it afterwards, whatever happens. */
export async function withSession<T>(
  provider: ConnectionProvider,
  target: { database?: string; environment?: string },
  work: (session: DatabaseSession) => Promise<T>
): Promise<T> {
  const session = await provider.acquire(target.database, target.environment);
  try {
    return await work(session);
  } finally {
    await session.release();
  }
}
