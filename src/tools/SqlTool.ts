import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { z } from "zod";
import { withSession, type ConnectionProvider, type DatabaseSession } from "../db/ConnectionProvider.js";
import { failed, type OperationResult } from "../engine/OperationResult.js";
import { InvalidArgumentsError, errorMessage } from "../errors/ToolError.js";
import type { AccessCheck } from "../config/EnvironmentManager.js";

export interface ToolContext {
  provider: ConnectionProvider;
  /** Resolved environment name the call runs against. */
  environment: string;
  maxRowsDefault?: number;
  accessLevel?: "server" | "database";
  isDatabaseAllowed?: (database: string) => AccessCheck;
}

/**
 * An MCP tool backed by SQL Server. Subclasses declare the advertised
 * JSON schema, a zod schema that narrows the raw arguments, and `execute`.
 */
export abstract class SqlTool<TArgs> {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly inputSchema: Tool["inputSchema"];
  abstract readonly annotations: NonNullable<Tool["annotations"]>;
  protected abstract readonly argsSchema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;

  /** Changes data or schema; hidden in read-only mode. */
  get mutates(): boolean {
    return this.annotations.readOnlyHint !== true;
  }

  protected abstract execute(args: TArgs, context: ToolContext): Promise<OperationResult>;

  async run(rawArgs: unknown, context: ToolContext): Promise<OperationResult> {
    try {
      const parsed = this.argsSchema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`);
        throw new InvalidArgumentsError(`Invalid arguments for ${this.name}: ${issues.join("; ")}`);
      }
      return await this.execute(parsed.data, context);
    } catch (error) {
      console.error(`${this.name} failed: ${errorMessage(error)}`);
      return failed(error);
    }
  }

  protected withSession<T>(
    context: ToolContext,
    database: string | undefined,
    work: (session: DatabaseSession) => Promise<T>
  ): Promise<T> {
    return withSession(context.provider, { database, environment: context.environment }, work);
  }

  definition(): Tool {
    return {
      name: this.name,
      description: this.description,
      inputSchema: {
        ...this.inputSchema,
        properties: { ...this.inputSchema.properties, environment: environmentProperty },
      },
      annotations: this.annotations,
    };
  }
}

export const databaseProperty = {
  type: "string",
  description:
    "Optional database name. If not specified, uses the environment's default database. Other databases require server-level access.",
};

export const environmentProperty = {
  type: "string",
  description: "Target environment name (optional, uses default if not specified)",
};
