import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeConnectionProvider } from "../db/testing.js";
import { RoutineInvoker } from "./RoutineInvoker.js";

let provider: FakeConnectionProvider;
let invoker: RoutineInvoker;

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  provider = new FakeConnectionProvider();
  invoker = new RoutineInvoker(provider);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("invokeScalarFunction", () => {
  it("sends one typed batch and returns the scalar", async () => {
    provider.queueQuery({ recordsets: [[{ Result: 108 }]] });

    const result = await invoker.invokeScalarFunction({
      name: "AddTax",
      parameters: '{"@Amount": 100.00, "@Rate": 0.08}',
    });

    expect(result).toEqual({ success: true, data: { result: 108 } });
    expect(provider.calls).toHaveLength(1);
    expect(provider.calls[0].text).toBe(
      "DECLARE @v0 DECIMAL(38,10); DECLARE @v1 DECIMAL(38,10); SET @v0 = @p0; SET @v1 = @p1; " +
        "SELECT [dbo].[AddTax](@v0, @v1) AS Result"
    );
    expect(provider.calls[0].bindings).toEqual([
      { name: "p0", value: { kind: "decimal", value: 100, text: "100.00", scale: 0 }, direction: "input" },
      { name: "p1", value: { kind: "decimal", value: 0.08, text: "0.08", scale: 2 }, direction: "input" },
    ]);
    expect(provider.released).toBe(1);
  });

  it("accepts parameters that are already an object", async () => {
    await invoker.invokeScalarFunction({ name: "dbo.Square", parameters: { n: 4 } });
    expect(provider.calls[0].text).toBe("DECLARE @v0 INT; SET @v0 = @p0; SELECT [dbo].[Square](@v0) AS Result");
  });

  it("rejects malformed parameter JSON before taking a connection", async () => {
    const result = await invoker.invokeScalarFunction({ name: "AddTax", parameters: "{bad" });

    expect(result.success).toBe(false);
    expect(!result.success && result.code).toBe("MALFORMED_PARAMETERS");
    expect(!result.success && result.error).toMatch(/^Invalid parameter JSON: /);
    expect(provider.acquisitions).toHaveLength(0);
    expect(provider.calls).toHaveLength(0);
  });

  it("rejects names with too many parts before taking a connection", async () => {
    const result = await invoker.invokeScalarFunction({ name: "srv.db.dbo.AddTax" });

    expect(result).toEqual({
      success: false,
      error: "Object name 'srv.db.dbo.AddTax' has 4 parts; expected [schema.]name",
      code: "INVALID_ARGUMENTS",
    });
    expect(provider.acquisitions).toHaveLength(0);
  });
});

describe("invokeTableFunction", () => {
  it("returns the rows of the function", async () => {
    const rows = [{ OrderId: 1 }, { OrderId: 2 }];
    provider.queueQuery({ recordsets: [rows] });

    const result = await invoker.invokeTableFunction({
      name: "sales.OrdersSince",
      parameters: '{"@Since": "2024-01-01"}',
      database: "Reporting",
      environment: "staging",
    });

    expect(result).toEqual({ success: true, data: rows });
    expect(provider.acquisitions).toEqual([{ database: "Reporting", environment: "staging" }]);
    expect(provider.calls[0]).toMatchObject({
      kind: "query",
      text: "DECLARE @v0 DATETIME2; SET @v0 = @p0; SELECT * FROM [sales].[OrdersSince](@v0)",
      database: "Reporting",
    });
  });

  it("splices a literal argument list as written", async () => {
    await invoker.invokeTableFunction({ name: "TopN", parameters: "5, 'West'" });

    expect(provider.calls[0].text).toBe("SELECT * FROM [dbo].[TopN](5, 'West')");
    expect(provider.calls[0].bindings).toEqual([]);
  });

  it("treats a list opening with an ODBC escape as literals", async () => {
    await invoker.invokeTableFunction({ name: "OrdersSince", parameters: "{d '2024-01-01'}, 10" });

    expect(provider.calls[0].text).toBe("SELECT * FROM [dbo].[OrdersSince]({d '2024-01-01'}, 10)");
  });

  it("still rejects malformed JSON that opens with a brace", async () => {
    const result = await invoker.invokeTableFunction({ name: "OrdersSince", parameters: "{d: 1}" });

    expect(result.success).toBe(false);
    expect(!result.success && result.code).toBe("MALFORMED_PARAMETERS");
    expect(provider.acquisitions).toHaveLength(0);
  });

  it("reports execution failures and still releases the session", async () => {
    provider.queueQuery(new Error("Invalid object name 'dbo.Missing'."));

    const result = await invoker.invokeTableFunction({ name: "Missing" });

    expect(result).toEqual({
      success: false,
      error: "Invalid object name 'dbo.Missing'.",
      code: "EXECUTION_FAILURE",
    });
    expect(provider.released).toBe(1);
  });

  it("logs the bound values of a failed call", async () => {
    provider.queueQuery(new Error("Arithmetic overflow error."));

    await invoker.invokeScalarFunction({ name: "AddTax", parameters: '{"@Amount": 100.00}' });

    expect(console.error).toHaveBeenCalledWith(
      "invokeScalarFunction failed for 'AddTax' with @p0 = 100.00: Arithmetic overflow error."
    );
  });

  it("reports connection failures as execution failures", async () => {
    provider.failAcquire(new Error("Login failed for user 'app'."));

    const result = await invoker.invokeTableFunction({ name: "Anything" });

    expect(result).toEqual({ success: false, error: "Login failed for user 'app'.", code: "EXECUTION_FAILURE" });
    expect(provider.released).toBe(0);
  });
});

describe("invokeProcedure", () => {
  it("returns only the return value when the procedure produced no rows", async () => {
    provider.queueProcedure({ returnValue: 0, recordsets: [[]] });

    const result = await invoker.invokeProcedure({ name: "dbo.RefreshStats" });

    expect(result).toEqual({ success: true, data: { return_value: 0 } });
    expect(provider.calls[0]).toMatchObject({ kind: "execute", text: "[dbo].[RefreshStats]", bindings: [] });
  });

  it("binds named parameters and collects outputs", async () => {
    provider.queueProcedure({ returnValue: 0, recordsets: [[{ Id: 1 }]], output: { Total: 42 } });

    const result = await invoker.invokeProcedure({
      name: "GetTotals",
      parameters: '{"@Region": "West"}',
      outputParameters: ["@Total"],
    });

    expect(result).toEqual({
      success: true,
      data: {
        return_value: 0,
        result_set: [{ Id: 1 }],
        output_parameters: { "@RETURN_VALUE": 0, "@Total": 42 },
      },
    });
    expect(provider.calls[0].bindings).toEqual([
      { name: "Region", value: { kind: "text", value: "West" }, direction: "input" },
      { name: "Total", value: { kind: "null" }, direction: "output" },
    ]);
  });

  it("does not accept a literal argument list", async () => {
    const result = await invoker.invokeProcedure({ name: "GetTotals", parameters: "1, 2" });

    expect(!result.success && result.code).toBe("MALFORMED_PARAMETERS");
    expect(provider.acquisitions).toHaveLength(0);
  });
});
