import { describe, expect, it } from "vitest";
import { InvalidArgumentsError } from "../errors/ToolError.js";
import { buildBatch, buildLiteralBatch, parseQualifiedName, quoteIdentifier, renderRoutine } from "./BatchBuilder.js";
import { bindParameters } from "./ParameterBinder.js";
import { decodeParameters } from "./TypeInferencer.js";

describe("parseQualifiedName", () => {
  it("splits schema and name", () => {
    expect(parseQualifiedName("sales.AddTax")).toEqual({ schema: "sales", name: "AddTax" });
  });

  it("applies the default schema only to unqualified names", () => {
    expect(parseQualifiedName("AddTax", "dbo")).toEqual({ schema: "dbo", name: "AddTax" });
    expect(parseQualifiedName("AddTax")).toEqual({ name: "AddTax" });
  });

  it("unwraps bracketed segments and keeps dots inside them", () => {
    expect(parseQualifiedName("[my.schema].[Odd]]Name]")).toEqual({ schema: "my.schema", name: "Odd]Name" });
  });

  it("rejects three-part and empty names", () => {
    expect(() => parseQualifiedName("db.dbo.AddTax")).toThrow(InvalidArgumentsError);
    expect(() => parseQualifiedName("db.dbo.AddTax")).toThrow(
      "Object name 'db.dbo.AddTax' has 3 parts; expected [schema.]name"
    );
    expect(() => parseQualifiedName("dbo.")).toThrow("Object name 'dbo.' is empty or has an empty part");
  });
});

describe("renderRoutine", () => {
  it("brackets each part and doubles closing brackets", () => {
    expect(quoteIdentifier("a]b")).toBe("[a]]b]");
    expect(renderRoutine({ schema: "dbo", name: "GetOrders" })).toBe("[dbo].[GetOrders]");
    expect(renderRoutine({ name: "GetOrders" })).toBe("[GetOrders]");
  });
});

describe("buildBatch", () => {
  it("declares, assigns and calls a scalar function", () => {
    const plan = bindParameters(decodeParameters('{"@Amount": 100.00, "@Rate": 0.08}'), "scalar");
    const batch = buildBatch({ schema: "dbo", name: "AddTax" }, "scalar", plan);

    expect(batch).toEqual({
      style: "scalar",
      text:
        "DECLARE @v0 DECIMAL(38,10); DECLARE @v1 DECIMAL(38,10); SET @v0 = @p0; SET @v1 = @p1; " +
        "SELECT [dbo].[AddTax](@v0, @v1) AS Result",
      bindings: plan.bindings,
    });
  });

  it("selects from a table function", () => {
    const plan = bindParameters(decodeParameters('{"@Region": "West"}'), "table");
    const batch = buildBatch({ schema: "dbo", name: "OrdersByRegion" }, "table", plan);

    expect(batch.style === "table" && batch.text).toBe(
      "DECLARE @v0 NVARCHAR(50); SET @v0 = @p0; SELECT * FROM [dbo].[OrdersByRegion](@v0)"
    );
  });

  it("calls zero-argument functions with empty parentheses", () => {
    const scalar = buildBatch({ schema: "dbo", name: "Now" }, "scalar", bindParameters(new Map(), "scalar"));
    const table = buildBatch({ schema: "dbo", name: "AllRegions" }, "table", bindParameters(new Map(), "table"));

    expect(scalar).toEqual({ style: "scalar", text: "SELECT [dbo].[Now]() AS Result", bindings: [] });
    expect(table).toEqual({ style: "table", text: "SELECT * FROM [dbo].[AllRegions]()", bindings: [] });
  });

  it("names the procedure for an RPC call", () => {
    const plan = bindParameters(decodeParameters('{"@Id": 1}'), "procedure");
    expect(buildBatch({ name: "GetCustomer" }, "procedure", plan)).toEqual({
      style: "procedure",
      procedure: "[GetCustomer]",
      bindings: plan.bindings,
    });
  });
});

describe("buildLiteralBatch", () => {
  it("splices literal arguments as written", () => {
    expect(buildLiteralBatch({ schema: "dbo", name: "AddTax" }, "scalar", " 100.00, 0.08 ")).toEqual({
      style: "scalar",
      text: "SELECT [dbo].[AddTax](100.00, 0.08) AS Result",
      bindings: [],
    });
  });
});
