import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { DatabaseSession } from "../db/ConnectionProvider.js";
import { ok } from "../engine/OperationResult.js";
import type { Row } from "../engine/types.js";
import { errorMessage } from "../errors/ToolError.js";
import { SqlTool, type ToolContext } from "./SqlTool.js";
import { engineEditionName } from "./TestConnectionTool.js";

const VERSION_QUERY = `
  SELECT
    SERVERPROPERTY('MachineName') AS machine_name,
    SERVERPROPERTY('ServerName') AS server_name,
    ISNULL(SERVERPROPERTY('InstanceName'), 'Default') AS instance_name,
    SERVERPROPERTY('ProductVersion') AS product_version,
    SERVERPROPERTY('ProductLevel') AS product_level,
    SERVERPROPERTY('Edition') AS edition,
    SERVERPROPERTY('EngineEdition') AS engine_edition,
    SERVERPROPERTY('Collation') AS collation,
    CAST(SERVERPROPERTY('IsIntegratedSecurityOnly') AS BIT) AS is_windows_auth_only,
    CAST(SERVERPROPERTY('IsClustered') AS BIT) AS is_clustered,
    CAST(SERVERPROPERTY('IsHadrEnabled') AS BIT) AS is_hadr_enabled,
    CAST(SERVERPROPERTY('IsFullTextInstalled') AS BIT) AS is_fulltext_installed,
    @@VERSION AS version_string
`;

const CONFIGURATION_QUERY = `
  SELECT
    (SELECT CAST(value_in_use AS INT) FROM sys.configurations WHERE name = 'max server memory (MB)') AS max_server_memory_mb,
    (SELECT CAST(value_in_use AS INT) FROM sys.configurations WHERE name = 'min server memory (MB)') AS min_server_memory_mb,
    (SELECT CAST(value_in_use AS INT) FROM sys.configurations WHERE name = 'max degree of parallelism') AS max_degree_of_parallelism,
    (SELECT CAST(value_in_use AS INT) FROM sys.configurations WHERE name = 'cost threshold for parallelism') AS cost_threshold_for_parallelism
`;

const RESOURCES_QUERY = `
  SELECT
    cpu_count AS logical_cpu_count,
    hyperthread_ratio,
    physical_memory_kb / 1024 AS physical_memory_mb,
    virtual_memory_kb / 1024 AS virtual_memory_mb,
    committed_kb / 1024 AS committed_memory_mb,
    committed_target_kb / 1024 AS committed_target_mb
  FROM sys.dm_os_sys_info
`;

const DATABASE_COUNT_QUERY = `
  SELECT
    COUNT(*) AS total_databases,
    SUM(CASE WHEN state_desc = 'ONLINE' THEN 1 ELSE 0 END) AS online_databases,
    SUM(CASE WHEN name NOT IN ('master', 'tempdb', 'model', 'msdb') THEN 1 ELSE 0 END) AS user_databases
  FROM sys.databases
`;

/**
 * Sections past the version need server-level permissions that not every
 * login has (sys.dm_os_sys_info wants VIEW SERVER STATE). A refused section
 * is reported as null with a warning.
 */
async function optionalSection(session: DatabaseSession, section: string, query: string): Promise<Row | null> {
  try {
    const { recordsets } = await session.query(query);
    return recordsets[0]?.[0] ?? null;
  } catch (error) {
    console.warn(`describe_instance: ${section} unavailable: ${errorMessage(error)}`);
    return null;
  }
}

const argsSchema = z.object({});

type DescribeInstanceArgs = z.infer<typeof argsSchema>;

export class DescribeInstanceTool extends SqlTool<DescribeInstanceArgs> {
  name = "describe_instance";
  description =
    "Returns SQL Server instance information including version, edition, server properties, and configuration";
  annotations = {
    title: "Describe Instance",
    readOnlyHint: true,
    idempotentHint: true,
    destructiveHint: false,
  };
  inputSchema: Tool["inputSchema"] = {
    type: "object",
    properties: {},
    required: [],
  };
  protected argsSchema = argsSchema;

  protected async execute(_args: DescribeInstanceArgs, context: ToolContext) {
    return this.withSession(context, undefined, async (session) => {
      const { recordsets } = await session.query(VERSION_QUERY);
      const version = recordsets[0]?.[0];
      const instance = version
        ? { ...version, engine_edition_name: engineEditionName(version.engine_edition) }
        : null;

      return ok({
        instance,
        configuration: await optionalSection(session, "configuration", CONFIGURATION_QUERY),
        resources: await optionalSection(session, "resources", RESOURCES_QUERY),
        databases: await optionalSection(session, "database counts", DATABASE_COUNT_QUERY),
      });
    });
  }
}
