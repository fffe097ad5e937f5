import { randomUUID } from "crypto";
import type { AuditLogger } from "../audit/AuditLogger.js";
import type { EnvironmentConfig, EnvironmentManager } from "../config/EnvironmentManager.js";
import type { ConnectionProvider } from "../db/ConnectionProvider.js";
import { failed, type OperationResult } from "../engine/OperationResult.js";
import { AccessDeniedError, errorMessage } from "../errors/ToolError.js";
import type { SqlTool, ToolContext } from "./SqlTool.js";

export type EnvironmentRegistry = Pick<EnvironmentManager, "getEnvironment" | "isDatabaseAllowed">;

export interface ToolRunnerOptions {
  environments: EnvironmentRegistry;
  provider: ConnectionProvider;
  auditLogger: AuditLogger;
  sessionId?: string;
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {};
}

/** Throws AccessDeniedError when the environment's governance refuses the tool. */
export function checkToolPolicy(tool: SqlTool<unknown>, env: EnvironmentConfig): void {
  if (env.deniedTools?.includes(tool.name)) {
    throw new AccessDeniedError(`Tool '${tool.name}' is explicitly denied in environment '${env.name}'.`);
  }

  if (env.allowedTools && env.allowedTools.length > 0 && !env.allowedTools.includes(tool.name)) {
    throw new AccessDeniedError(
      `Tool '${tool.name}' is not permitted in environment '${env.name}'. Allowed tools: ${env.allowedTools.join(", ")}.`
    );
  }

  if (env.readonly && tool.mutates) {
    throw new AccessDeniedError(`Environment '${env.name}' is read-only. Tool '${tool.name}' cannot be executed.`);
  }
}

/**
 * The boundary every MCP call passes through: resolves the target
 * environment, applies its tool policy, runs the tool and writes one audit
 * entry. Always resolves to an envelope.
 */
export class ToolRunner {
  readonly sessionId: string;

  constructor(private readonly options: ToolRunnerOptions) {
    this.sessionId = options.sessionId ?? randomUUID();
  }

  async run(tool: SqlTool<unknown>, rawArgs: unknown): Promise<OperationResult> {
    const startTime = Date.now();
    const args = asRecord(rawArgs);
    const requestedEnvironment = typeof args.environment === "string" ? args.environment : undefined;

    let env: EnvironmentConfig | undefined;
    let result: OperationResult;
    try {
      env = this.options.environments.getEnvironment(requestedEnvironment);
      checkToolPolicy(tool, env);
      result = await tool.run(args, this.contextFor(env));
    } catch (error) {
      console.error(`${tool.name} refused: ${errorMessage(error)}`);
      result = failed(error);
    }

    this.options.auditLogger.logToolInvocation(tool.name, args, result, Date.now() - startTime, {
      sessionId: this.sessionId,
      environment: env?.name ?? requestedEnvironment,
      auditLevel: env?.auditLevel,
    });

    return result;
  }

  private contextFor(env: EnvironmentConfig): ToolContext {
    const { environments, provider } = this.options;
    return {
      provider,
      environment: env.name,
      maxRowsDefault: env.maxRowsDefault,
      accessLevel: env.accessLevel ?? "database",
      isDatabaseAllowed: (database) => environments.isDatabaseAllowed(env.name, database),
    };
  }
}
