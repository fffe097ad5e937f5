import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeConnectionProvider } from "../db/testing.js";
import { DescribeFunctionTool } from "./DescribeFunctionTool.js";
import { DescribeStoredProcedureTool } from "./DescribeStoredProcedureTool.js";
import { DescribeTableTool } from "./DescribeTableTool.js";
import { DescribeViewTool } from "./DescribeViewTool.js";

let provider: FakeConnectionProvider;

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  provider = new FakeConnectionProvider();
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("describe_table", () => {
  it("looks the table up by schema and name", async () => {
    provider.queueQuery({ recordsets: [[{ name: "Id", type: "int" }]] });

    const result = await new DescribeTableTool().run({ tableName: "sales.Orders" }, { provider, environment: "dev" });

    expect(result).toEqual({
      success: true,
      data: { schema: "sales", tableName: "Orders", columns: [{ name: "Id", type: "int" }] },
    });
    expect(provider.calls[0].bindings.map((binding) => binding.value)).toEqual([
      { kind: "text", value: "Orders" },
      { kind: "text", value: "sales" },
    ]);
  });

  it("reports a missing table", async () => {
    const result = await new DescribeTableTool().run(
      { tableName: "Ghost", database: "Sales" },
      { provider, environment: "dev" }
    );

    expect(result).toEqual({
      success: false,
      error: "Table 'dbo.Ghost' not found in database [Sales].",
      code: "NOT_FOUND",
    });
  });
});

describe("describe_view", () => {
  it("splits one batch into the view's sections", async () => {
    provider.queueQuery({
      recordsets: [
        [{ id: 7, name: "ActiveCustomers" }],
        [{ name: "Id" }],
        [],
        [{ definition: "CREATE VIEW ActiveCustomers AS SELECT 1 AS Id" }],
        [{ referenced_object: "Customers" }],
      ],
    });

    const result = await new DescribeViewTool().run({ name: "ActiveCustomers" }, { provider, environment: "dev" });

    expect(result).toEqual({
      success: true,
      data: {
        view: { id: 7, name: "ActiveCustomers" },
        columns: [{ name: "Id" }],
        indexes: [],
        definition: "CREATE VIEW ActiveCustomers AS SELECT 1 AS Id",
        dependencies: [{ referenced_object: "Customers" }],
      },
    });
    expect(provider.calls).toHaveLength(1);
    expect(provider.calls[0].bindings.map((binding) => binding.value)).toEqual([
      { kind: "text", value: "ActiveCustomers" },
      { kind: "null" },
    ]);
  });

  it("reports a missing view", async () => {
    const result = await new DescribeViewTool().run({ name: "dbo.Nope" }, { provider, environment: "dev" });
    expect(result).toEqual({ success: false, error: "View 'dbo.Nope' not found.", code: "NOT_FOUND" });
  });
});

describe("describe_stored_procedure", () => {
  it("returns parameters and a null definition for encrypted modules", async () => {
    provider.queueQuery({
      recordsets: [[{ name: "GetOrders" }], [{ name: "@customerId", type: "int" }], [], []],
    });

    const result = await new DescribeStoredProcedureTool().run({ name: "GetOrders" }, { provider, environment: "dev" });

    expect(result).toEqual({
      success: true,
      data: {
        procedure: { name: "GetOrders" },
        parameters: [{ name: "@customerId", type: "int" }],
        definition: null,
        dependencies: [],
      },
    });
  });
});

describe("describe_function", () => {
  it("includes table columns only for table-valued functions", async () => {
    provider
      .queueQuery({
        recordsets: [[{ name: "AddTax", type: "FN" }], [{ name: "@amount" }], [{ type: "decimal" }], [], [], []],
      })
      .queueQuery({
        recordsets: [[{ name: "OrdersFor", type: "IF" }], [], [], [{ name: "Id" }], [], []],
      });
    const tool = new DescribeFunctionTool();

    const scalar = await tool.run({ name: "AddTax" }, { provider, environment: "dev" });
    const table = await tool.run({ name: "OrdersFor" }, { provider, environment: "dev" });

    expect(scalar).toEqual({
      success: true,
      data: {
        function: { name: "AddTax", type: "FN" },
        parameters: [{ name: "@amount" }],
        return_type: { type: "decimal" },
        table_columns: undefined,
        definition: null,
        dependencies: [],
      },
    });
    expect(table.success && table.data).toMatchObject({ return_type: null, table_columns: [{ name: "Id" }] });
  });
});
