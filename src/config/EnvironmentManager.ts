import * as fs from "fs";
import * as path from "path";
import { InteractiveBrowserCredential } from "@azure/identity";
import sql from "mssql";
import { z } from "zod";
import type { ConnectionProvider, DatabaseSession } from "../db/ConnectionProvider.js";
import { MssqlSession } from "../db/MssqlSession.js";
import { AccessDeniedError, NotFoundError } from "../errors/ToolError.js";

const auditLevelSchema = z.enum(["none", "basic", "verbose"]);
const authModeSchema = z.enum(["sql", "windows", "aad"]);

const environmentSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  server: z.string().min(1),
  database: z.string().min(1),
  port: z.number().int().positive().optional(),
  authMode: authModeSchema.default("aad"),
  username: z.string().optional(),
  password: z.string().optional(),
  domain: z.string().optional(),
  trustServerCertificate: z.boolean().optional(),
  connectionTimeout: z.number().positive().optional(),

  // Governance controls
  readonly: z.boolean().optional(),
  allowedTools: z.array(z.string()).optional(),
  deniedTools: z.array(z.string()).optional(),
  maxRowsDefault: z.number().int().positive().optional(),
  auditLevel: auditLevelSchema.optional(),

  // Server-level access controls
  accessLevel: z.enum(["server", "database"]).optional(),
  allowedDatabases: z.union([z.array(z.string()), z.literal("*")]).optional(),
  deniedDatabases: z.array(z.string()).optional(),
});

const environmentsFileSchema = z.object({
  defaultEnvironment: z.string().optional(),
  environments: z.array(environmentSchema).min(1),
});

export type AuditLevel = z.infer<typeof auditLevelSchema>;
export type AuthMode = z.infer<typeof authModeSchema>;
export type EnvironmentConfig = z.infer<typeof environmentSchema>;
export type EnvironmentsConfig = z.infer<typeof environmentsFileSchema>;

export interface AccessCheck {
  allowed: boolean;
  reason?: string;
}

/**
 * Resolves secret placeholders in the format ${secret:NAME}
 * from environment variables.
 */
export function resolveSecrets(value: string | undefined, env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (!value) return value;

  const secretPattern = /\$\{secret:([^}]+)\}/g;
  return value.replace(secretPattern, (match, secretName: string) => {
    const envValue = env[secretName];
    if (envValue === undefined) {
      console.warn(`Secret '${secretName}' not found in environment variables`);
      return match;
    }
    return envValue;
  });
}

function resolveSecretsInConfig(config: EnvironmentConfig): EnvironmentConfig {
  return {
    ...config,
    server: resolveSecrets(config.server) ?? config.server,
    database: resolveSecrets(config.database) ?? config.database,
    username: resolveSecrets(config.username),
    password: resolveSecrets(config.password),
    domain: resolveSecrets(config.domain),
  };
}

function parseInteger(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

interface CachedPool {
  pool: sql.ConnectionPool;
  expiresOn?: Date;
}

export type PoolOpener = (config: sql.config) => Promise<sql.ConnectionPool>;

const openPool: PoolOpener = (config) => new sql.ConnectionPool(config).connect();

/**
 * Named connection targets with their governance policy. Also the production
 * ConnectionProvider: one pool per (environment, database) pair.
 */
export class EnvironmentManager implements ConnectionProvider {
  private readonly environments: Map<string, EnvironmentConfig>;
  private defaultEnvironment?: string;
  private readonly connections: Map<string, CachedPool>;
  /** Pools being opened; concurrent callers for the same key share one. */
  private readonly opening: Map<string, Promise<sql.ConnectionPool>>;

  constructor(
    configPath?: string,
    private readonly open: PoolOpener = openPool
  ) {
    this.environments = new Map();
    this.connections = new Map();
    this.opening = new Map();

    if (configPath) {
      this.loadFromFile(configPath);
    } else {
      this.loadFromEnvVars();
    }
  }

  private loadFromFile(configPath: string): void {
    const resolvedPath = path.resolve(configPath);
    if (!fs.existsSync(resolvedPath)) {
      console.warn(`Environment config file not found at ${resolvedPath}, falling back to env vars`);
      this.loadFromEnvVars();
      return;
    }

    let config: EnvironmentsConfig;
    try {
      config = environmentsFileSchema.parse(JSON.parse(fs.readFileSync(resolvedPath, "utf-8")));
    } catch (error) {
      console.error(`Failed to load environment config from ${resolvedPath}: ${error}`);
      this.loadFromEnvVars();
      return;
    }

    this.defaultEnvironment = config.defaultEnvironment;
    for (const env of config.environments) {
      this.environments.set(env.name, resolveSecretsInConfig(env));
    }
    console.error(`Loaded ${this.environments.size} environment(s) from ${resolvedPath}`);
  }

  private loadFromEnvVars(): void {
    const server = process.env.SERVER_NAME;
    const database = process.env.DATABASE_NAME;

    if (!server || !database) {
      throw new Error(
        "No environment config file provided and SERVER_NAME/DATABASE_NAME env vars not set"
      );
    }

    const authMode = authModeSchema.safeParse(process.env.SQL_AUTH_MODE?.toLowerCase());

    this.environments.set("default", {
      name: "default",
      server,
      database,
      port: parseInteger(process.env.SQL_PORT),
      authMode: authMode.success ? authMode.data : "aad",
      username: process.env.SQL_USERNAME,
      password: process.env.SQL_PASSWORD,
      domain: process.env.SQL_DOMAIN,
      trustServerCertificate: process.env.TRUST_SERVER_CERTIFICATE?.toLowerCase() === "true",
      connectionTimeout: parseInteger(process.env.CONNECTION_TIMEOUT) ?? 30,
      readonly: process.env.READONLY === "true",
    });
    this.defaultEnvironment = "default";
    console.error("Loaded default environment from environment variables");
  }

  getEnvironment(name?: string): EnvironmentConfig {
    const targetName = name || this.defaultEnvironment || "default";
    const env = this.environments.get(targetName);

    if (!env) {
      throw new NotFoundError(
        `Environment '${targetName}' not found. Available: ${Array.from(this.environments.keys()).join(", ")}`
      );
    }

    return env;
  }

  listEnvironments(): EnvironmentConfig[] {
    return Array.from(this.environments.values());
  }

  /**
   * Database-level environments may only touch their configured database.
   * Server-level environments consult deniedDatabases, then allowedDatabases.
   */
  isDatabaseAllowed(environmentName: string | undefined, databaseName: string): AccessCheck {
    const env = this.getEnvironment(environmentName);
    const accessLevel = env.accessLevel ?? "database";

    if (accessLevel === "database") {
      if (!sameName(databaseName, env.database)) {
        return {
          allowed: false,
          reason: `Environment '${env.name}' has database-level access and is restricted to database '${env.database}'. Cannot access '${databaseName}'.`,
        };
      }
      return { allowed: true };
    }

    if ((env.deniedDatabases ?? []).some((db) => sameName(db, databaseName))) {
      return {
        allowed: false,
        reason: `Database '${databaseName}' is in the denied list for environment '${env.name}'.`,
      };
    }

    const allowedDatabases = env.allowedDatabases;
    if (allowedDatabases === undefined || allowedDatabases === "*" || allowedDatabases.length === 0) {
      return { allowed: true };
    }

    if (!allowedDatabases.some((db) => sameName(db, databaseName))) {
      return {
        allowed: false,
        reason: `Database '${databaseName}' is not in the allowed list for environment '${env.name}'. Allowed: ${allowedDatabases.join(", ")}.`,
      };
    }

    return { allowed: true };
  }

  async acquire(database?: string, environment?: string): Promise<DatabaseSession> {
    const env = this.getEnvironment(environment);
    if (database) {
      const check = this.isDatabaseAllowed(env.name, database);
      if (!check.allowed) {
        throw new AccessDeniedError(check.reason ?? `Access to database '${database}' is not allowed.`);
      }
    }
    const pool = await this.getConnection(env.name, database);
    return new MssqlSession(pool, database ?? env.database);
  }

  async getConnection(environmentName?: string, database?: string): Promise<sql.ConnectionPool> {
    const env = this.getEnvironment(environmentName);
    const targetDatabase = database ?? env.database;
    const cacheKey = `${env.name}/${targetDatabase.toLowerCase()}`;
    const cached = this.connections.get(cacheKey);

    // Reuse unless the AAD token is within two minutes of expiry
    if (
      cached &&
      cached.pool.connected &&
      (!cached.expiresOn || cached.expiresOn > new Date(Date.now() + 2 * 60 * 1000))
    ) {
      return cached.pool;
    }

    const pending = this.opening.get(cacheKey);
    if (pending) {
      return pending;
    }

    const opened = this.replacePool(env, targetDatabase, cacheKey, cached).finally(() => {
      this.opening.delete(cacheKey);
    });
    this.opening.set(cacheKey, opened);
    return opened;
  }

  private async replacePool(
    env: EnvironmentConfig,
    database: string,
    cacheKey: string,
    stale: CachedPool | undefined
  ): Promise<sql.ConnectionPool> {
    const { config, expiresOn } = await this.createSqlConfig(env, database);

    if (stale?.pool.connected) {
      await stale.pool.close();
    }

    const pool = await this.open(config);
    this.connections.set(cacheKey, { pool, expiresOn });

    return pool;
  }

  private async createSqlConfig(
    env: EnvironmentConfig,
    database: string
  ): Promise<{ config: sql.config; expiresOn?: Date }> {
    const baseConfig = {
      server: env.server,
      database,
      port: env.port,
      connectionTimeout: (env.connectionTimeout || 30) * 1000,
    };

    if (env.authMode === "sql") {
      if (!env.username || !env.password) {
        throw new Error(`Environment '${env.name}' requires username and password for SQL auth`);
      }

      return {
        config: {
          ...baseConfig,
          user: env.username,
          password: env.password,
          options: {
            encrypt: false,
            trustServerCertificate: env.trustServerCertificate ?? false,
          },
        },
      };
    }

    if (env.authMode === "windows") {
      if (!env.username || !env.password) {
        throw new Error(
          `Environment '${env.name}' requires username and password for Windows auth`
        );
      }

      return {
        config: {
          ...baseConfig,
          options: {
            encrypt: false,
            trustServerCertificate: env.trustServerCertificate ?? false,
          },
          authentication: {
            type: "ntlm",
            options: {
              userName: env.username,
              password: env.password,
              domain: env.domain || "",
            },
          },
        },
      };
    }

    // Azure AD auth
    const credential = new InteractiveBrowserCredential({
      redirectUri: "http://localhost",
    });
    const accessToken = await credential.getToken("https://database.windows.net/.default");

    if (!accessToken?.token) {
      throw new Error(`Failed to acquire Azure AD token for environment '${env.name}'`);
    }

    return {
      config: {
        ...baseConfig,
        options: {
          encrypt: true,
          trustServerCertificate: env.trustServerCertificate ?? false,
        },
        authentication: {
          type: "azure-active-directory-access-token",
          options: {
            token: accessToken.token,
          },
        },
      },
      expiresOn: accessToken.expiresOnTimestamp
        ? new Date(accessToken.expiresOnTimestamp)
        : new Date(Date.now() + 30 * 60 * 1000),
    };
  }

  async closeAll(): Promise<void> {
    await Promise.allSettled(this.opening.values());
    for (const [name, { pool }] of this.connections.entries()) {
      if (pool.connected) {
        await pool.close();
        console.error(`Closed connection pool '${name}'`);
      }
    }
    this.connections.clear();
  }
}

let environmentManager: EnvironmentManager | undefined;

export function getEnvironmentManager(): EnvironmentManager {
  if (!environmentManager) {
    environmentManager = new EnvironmentManager(process.env.ENVIRONMENTS_CONFIG_PATH);
  }
  return environmentManager;
}
