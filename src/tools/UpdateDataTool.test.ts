import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeConnectionProvider } from "../db/testing.js";
import { UpdateDataTool, buildUpdate } from "./UpdateDataTool.js";

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("buildUpdate", () => {
  it("binds SET values and keeps the WHERE clause", () => {
    const { text, bindings } = buildUpdate("sales.Orders", { Status: "shipped", Qty: 3 }, "WHERE Id = 7");

    expect(text).toBe("UPDATE [sales].[Orders] SET [Status] = @update_0, [Qty] = @update_1 WHERE Id = 7");
    expect(bindings.map((binding) => binding.value)).toEqual([
      { kind: "text", value: "shipped" },
      { kind: "int", value: 3 },
    ]);
  });

  it("requires a WHERE clause", () => {
    expect(() => buildUpdate("Orders", { Status: "x" }, "  ")).toThrow(/^WHERE clause is required/);
  });
});

describe("UpdateDataTool", () => {
  it("returns the number of rows updated", async () => {
    const provider = new FakeConnectionProvider().queueQuery({ rowsAffected: [4] });

    const result = await new UpdateDataTool().run(
      { tableName: "Orders", updates: { Status: "closed" }, whereClause: "Status = 'open'" },
      { provider, environment: "dev" }
    );

    expect(result).toEqual({ success: true, rowsAffected: 4 });
    expect(provider.calls[0].text).toBe("UPDATE [dbo].[Orders] SET [Status] = @update_0 WHERE Status = 'open'");
  });
});
