import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import sql from "mssql";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AccessDeniedError } from "../errors/ToolError.js";
import { EnvironmentManager, resolveSecrets, type PoolOpener } from "./EnvironmentManager.js";

let tempDir: string;

function writeConfig(config: unknown): string {
  const configPath = path.join(tempDir, "environments.json");
  fs.writeFileSync(configPath, JSON.stringify(config));
  return configPath;
}

const environments = {
  defaultEnvironment: "dev",
  environments: [
    {
      name: "dev",
      server: "localhost",
      database: "AppDb",
      authMode: "sql",
      username: "app",
      password: "${secret:TEST_DB_PASSWORD}",
    },
    {
      name: "warehouse",
      server: "dw.internal",
      database: "Warehouse",
      accessLevel: "server",
      allowedDatabases: ["Warehouse", "Staging"],
      deniedDatabases: ["Staging"],
      readonly: true,
    },
    {
      name: "sandbox",
      server: "sandbox.internal",
      database: "Sandbox",
      accessLevel: "server",
      allowedDatabases: "*",
    },
  ],
};

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "mssql-routine-env-"));
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("resolveSecrets", () => {
  it("substitutes placeholders from the environment", () => {
    expect(resolveSecrets("pw=${secret:DB_PW};", { DB_PW: "test-secret" })).toBe("pw=test-secret;");
  });

  it("leaves unknown placeholders in place", () => {
    expect(resolveSecrets("${secret:MISSING}", {})).toBe("${secret:MISSING}");
  });
});

describe("EnvironmentManager", () => {
  it("loads environments from a file and resolves secrets", () => {
    vi.stubEnv("TEST_DB_PASSWORD", "test-secret");
    const manager = new EnvironmentManager(writeConfig(environments));

    expect(manager.listEnvironments().map((env) => env.name)).toEqual(["dev", "warehouse", "sandbox"]);
    const dev = manager.getEnvironment();
    expect(dev.name).toBe("dev");
    expect(dev.password).toBe("test-secret");
    expect(manager.getEnvironment("warehouse").authMode).toBe("aad");
  });

  it("reports unknown environments with the available names", () => {
    const manager = new EnvironmentManager(writeConfig(environments));
    expect(() => manager.getEnvironment("prod")).toThrow(
      "Environment 'prod' not found. Available: dev, warehouse, sandbox"
    );
  });

  it("falls back to environment variables when the file is missing", () => {
    vi.stubEnv("SERVER_NAME", "db.local");
    vi.stubEnv("DATABASE_NAME", "Orders");
    vi.stubEnv("SQL_AUTH_MODE", "SQL");
    vi.stubEnv("SQL_PORT", "1444");
    vi.stubEnv("READONLY", "true");

    const manager = new EnvironmentManager(path.join(tempDir, "missing.json"));
    const env = manager.getEnvironment();

    expect(env).toMatchObject({
      name: "default",
      server: "db.local",
      database: "Orders",
      authMode: "sql",
      port: 1444,
      readonly: true,
    });
  });

  it("falls back to environment variables when the file is invalid", () => {
    vi.stubEnv("SERVER_NAME", "db.local");
    vi.stubEnv("DATABASE_NAME", "Orders");

    const manager = new EnvironmentManager(writeConfig({ environments: [] }));
    expect(manager.getEnvironment().name).toBe("default");
  });

  it("requires SERVER_NAME and DATABASE_NAME without a config file", () => {
    vi.stubEnv("SERVER_NAME", "");
    vi.stubEnv("DATABASE_NAME", "");

    expect(() => new EnvironmentManager()).toThrow(
      "No environment config file provided and SERVER_NAME/DATABASE_NAME env vars not set"
    );
  });
});

describe("isDatabaseAllowed", () => {
  it("restricts database-level environments to their own database", () => {
    const manager = new EnvironmentManager(writeConfig(environments));

    expect(manager.isDatabaseAllowed("dev", "appdb")).toEqual({ allowed: true });
    expect(manager.isDatabaseAllowed("dev", "Other")).toEqual({
      allowed: false,
      reason:
        "Environment 'dev' has database-level access and is restricted to database 'AppDb'. Cannot access 'Other'.",
    });
  });

  it("applies the denied list before the allowed list", () => {
    const manager = new EnvironmentManager(writeConfig(environments));

    expect(manager.isDatabaseAllowed("warehouse", "Warehouse")).toEqual({ allowed: true });
    expect(manager.isDatabaseAllowed("warehouse", "staging")).toEqual({
      allowed: false,
      reason: "Database 'staging' is in the denied list for environment 'warehouse'.",
    });
    expect(manager.isDatabaseAllowed("warehouse", "Finance").allowed).toBe(false);
  });

  it("allows every database for a wildcard", () => {
    const manager = new EnvironmentManager(writeConfig(environments));
    expect(manager.isDatabaseAllowed("sandbox", "Anything")).toEqual({ allowed: true });
  });

  it("refuses to open a session on a disallowed database", async () => {
    const manager = new EnvironmentManager(writeConfig(environments));

    await expect(manager.acquire("Other", "dev")).rejects.toThrow(AccessDeniedError);
  });
});

describe("connection pools", () => {
  it("opens one pool for concurrent first acquisitions", async () => {
    const pool = new sql.ConnectionPool({ server: "localhost" });
    const open = vi.fn<PoolOpener>().mockResolvedValue(pool);
    const manager = new EnvironmentManager(writeConfig(environments), open);

    const [first, second] = await Promise.all([manager.getConnection("dev"), manager.getConnection("dev")]);

    expect(open).toHaveBeenCalledTimes(1);
    expect(first).toBe(pool);
    expect(second).toBe(pool);
  });

  it("does not cache a pool that failed to open", async () => {
    const pool = new sql.ConnectionPool({ server: "localhost" });
    const open = vi.fn<PoolOpener>().mockRejectedValueOnce(new Error("Login failed for user 'app'.")).mockResolvedValue(pool);
    const manager = new EnvironmentManager(writeConfig(environments), open);

    await expect(manager.getConnection("dev")).rejects.toThrow("Login failed for user 'app'.");
    await expect(manager.getConnection("dev")).resolves.toBe(pool);
    expect(open).toHaveBeenCalledTimes(2);
  });

  it("passes the environment's settings to the opener", async () => {
    vi.stubEnv("TEST_DB_PASSWORD", "test-secret");
    const open = vi.fn<PoolOpener>().mockResolvedValue(new sql.ConnectionPool({ server: "localhost" }));
    const manager = new EnvironmentManager(writeConfig(environments), open);

    await manager.getConnection("dev");

    expect(open).toHaveBeenCalledWith(
      expect.objectContaining({ server: "localhost", database: "AppDb", user: "app", password: "test-secret" })
    );
  });
});
