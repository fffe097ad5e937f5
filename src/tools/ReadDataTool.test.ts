import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeConnectionProvider } from "../db/testing.js";
import { ReadDataTool, enforceRowLimit, resolveMaxRows, validateSelectQuery } from "./ReadDataTool.js";

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  vi.stubEnv("MAX_ROWS_DEFAULT", "");
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("validateSelectQuery", () => {
  it("accepts a plain SELECT, ignoring comments", () => {
    expect(() => validateSelectQuery("SELECT Id, Name FROM dbo.Customers -- DROP TABLE x")).not.toThrow();
  });

  it("requires the statement to start with SELECT", () => {
    expect(() => validateSelectQuery("DELETE FROM Orders")).toThrow("Query must start with SELECT");
  });

  it("rejects write keywords anywhere in the query", () => {
    expect(() => validateSelectQuery("SELECT * FROM a; DROP TABLE b")).toThrow(
      "Dangerous keyword 'DROP' detected in query. Only SELECT operations are allowed."
    );
    expect(() => validateSelectQuery("SELECT * INTO Copy FROM a")).toThrow(
      "Dangerous keyword 'INTO' detected in query. Only SELECT operations are allowed."
    );
  });

  it("rejects system procedure patterns", () => {
    expect(() => validateSelectQuery("SELECT name FROM sys.objects WHERE name LIKE 'sp_%'")).toThrow(
      "Potentially malicious SQL pattern detected. Only simple SELECT queries are allowed."
    );
  });

  it("rejects several statements", () => {
    expect(() => validateSelectQuery("SELECT 1; SELECT 2")).toThrow(
      "Multiple SQL statements are not allowed. Use only a single SELECT statement."
    );
  });
});

describe("enforceRowLimit", () => {
  it("injects TOP after SELECT and DISTINCT", () => {
    expect(enforceRowLimit("SELECT * FROM t", 100)).toEqual({ query: "SELECT TOP 100 * FROM t", limitAdded: true });
    expect(enforceRowLimit("SELECT DISTINCT Name FROM t", 5).query).toBe("SELECT DISTINCT TOP 5 Name FROM t");
  });

  it("keeps an existing TOP", () => {
    expect(enforceRowLimit("SELECT TOP 5 * FROM t", 100)).toEqual({ query: "SELECT TOP 5 * FROM t", limitAdded: false });
  });
});

describe("resolveMaxRows", () => {
  it("defaults to 1000 and honors MAX_ROWS_DEFAULT", () => {
    expect(resolveMaxRows(undefined, undefined)).toBe(1000);
    vi.stubEnv("MAX_ROWS_DEFAULT", "250");
    expect(resolveMaxRows(undefined, undefined)).toBe(250);
  });

  it("clamps requests and never exceeds the environment cap", () => {
    expect(resolveMaxRows(500000, undefined)).toBe(100000);
    expect(resolveMaxRows(5000, 200)).toBe(200);
    expect(resolveMaxRows(20, 200)).toBe(20);
  });
});

describe("ReadDataTool", () => {
  it("runs the limited query on the requested database", async () => {
    const provider = new FakeConnectionProvider().queueQuery({ recordsets: [[{ Id: 1 }]] });

    const result = await new ReadDataTool().run(
      { query: "SELECT * FROM Orders", database: "Sales" },
      { provider, environment: "dev", maxRowsDefault: 50 }
    );

    expect(result).toEqual({ success: true, data: [{ Id: 1 }] });
    expect(provider.calls[0]).toMatchObject({ text: "SELECT TOP 50 * FROM Orders", database: "Sales" });
  });

  it("reports invalid arguments without touching the database", async () => {
    const provider = new FakeConnectionProvider();

    const result = await new ReadDataTool().run({}, { provider, environment: "dev" });

    expect(result).toEqual({
      success: false,
      error: "Invalid arguments for read_data: query: Required",
      code: "INVALID_ARGUMENTS",
    });
    expect(provider.acquisitions).toHaveLength(0);
  });
});
