import { CreateTableTool } from "./CreateTableTool.js";
import { DescribeDatabaseTool } from "./DescribeDatabaseTool.js";
import { DescribeFunctionTool } from "./DescribeFunctionTool.js";
import { DescribeInstanceTool } from "./DescribeInstanceTool.js";
import { DescribeStoredProcedureTool } from "./DescribeStoredProcedureTool.js";
import { DescribeTableTool } from "./DescribeTableTool.js";
import { DescribeViewTool } from "./DescribeViewTool.js";
import { DropTableTool } from "./DropTableTool.js";
import { ExecuteScalarFunctionTool } from "./ExecuteScalarFunctionTool.js";
import { ExecuteStoredProcedureTool } from "./ExecuteStoredProcedureTool.js";
import { ExecuteTableFunctionTool } from "./ExecuteTableFunctionTool.js";
import { InsertDataTool } from "./InsertDataTool.js";
import { ListDatabasesTool } from "./ListDatabasesTool.js";
import { ListFunctionsTool } from "./ListFunctionsTool.js";
import { ListStoredProceduresTool } from "./ListStoredProceduresTool.js";
import { ListTableTool } from "./ListTableTool.js";
import { ListViewsTool } from "./ListViewsTool.js";
import { ReadDataTool } from "./ReadDataTool.js";
import type { SqlTool } from "./SqlTool.js";
import { TestConnectionTool } from "./TestConnectionTool.js";
import { UpdateDataTool } from "./UpdateDataTool.js";

export function createTools(): SqlTool<unknown>[] {
  return [
    new ExecuteStoredProcedureTool(),
    new ExecuteScalarFunctionTool(),
    new ExecuteTableFunctionTool(),
    new ListDatabasesTool(),
    new ListTableTool(),
    new ListViewsTool(),
    new ListStoredProceduresTool(),
    new ListFunctionsTool(),
    new DescribeTableTool(),
    new DescribeViewTool(),
    new DescribeStoredProcedureTool(),
    new DescribeFunctionTool(),
    new DescribeDatabaseTool(),
    new DescribeInstanceTool(),
    new TestConnectionTool(),
    new ReadDataTool(),
    new InsertDataTool(),
    new UpdateDataTool(),
    new CreateTableTool(),
    new DropTableTool(),
  ];
}

/** Tools advertised to clients; mutating tools are left out in read-only mode. */
export function exposedTools(tools: SqlTool<unknown>[], readOnly: boolean): SqlTool<unknown>[] {
  return readOnly ? tools.filter((tool) => !tool.mutates) : tools;
}
