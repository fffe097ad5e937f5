import * as fs from "fs";
import * as path from "path";
import type { AuditLevel } from "../config/EnvironmentManager.js";
import type { OperationResult } from "../engine/OperationResult.js";

export interface AuditLogEntry {
  timestamp: string;
  toolName: string;
  environment?: string;
  arguments?: Record<string, unknown>;
  result?: {
    success: boolean;
    recordCount?: number;
    rowsAffected?: number;
    error?: string;
    data?: unknown; // Only included in verbose mode
  };
  durationMs?: number;
  sessionId?: string;
}

export interface AuditLoggerOptions {
  enabled?: boolean;
  logFilePath?: string;
  redactSensitiveData?: boolean;
}

const SENSITIVE_KEYS = ["password", "secret", "token", "key", "authorization", "auth", "credential"];

/** JSON replacer: bigint is not serializable by default. */
export function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export class AuditLogger {
  private readonly logFilePath: string;
  private readonly enabled: boolean;
  private readonly redactSensitiveData: boolean;

  constructor(options: AuditLoggerOptions = {}) {
    this.enabled = options.enabled ?? process.env.AUDIT_LOGGING !== "false";
    this.redactSensitiveData = options.redactSensitiveData ?? process.env.AUDIT_REDACT_SENSITIVE !== "false";

    const logPath = options.logFilePath ?? process.env.AUDIT_LOG_PATH;
    if (!this.enabled) {
      this.logFilePath = "";
    } else {
      this.logFilePath = logPath
        ? path.resolve(logPath)
        : path.resolve(process.cwd(), "logs", "audit.jsonl");
      this.ensureLogDirectory();
    }
  }

  private ensureLogDirectory() {
    const dir = path.dirname(this.logFilePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  redactArguments(args: Record<string, unknown>): Record<string, unknown> {
    if (!this.redactSensitiveData) {
      return args;
    }

    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(args)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))) {
        redacted[key] = "[REDACTED]";
      } else if (typeof value === "string" && value.length > 500) {
        redacted[key] = value.substring(0, 500) + "... [TRUNCATED]";
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }

  log(entry: AuditLogEntry): void {
    if (!this.enabled) {
      return;
    }

    try {
      const logEntry = {
        ...entry,
        arguments: entry.arguments ? this.redactArguments(entry.arguments) : undefined,
      };
      fs.appendFileSync(this.logFilePath, JSON.stringify(logEntry, jsonReplacer) + "\n", { encoding: "utf-8" });
    } catch (error) {
      console.error("Failed to write audit log:", error);
    }
  }

  logToolInvocation(
    toolName: string,
    args: Record<string, unknown>,
    result: OperationResult,
    durationMs: number,
    options?: {
      sessionId?: string;
      environment?: string;
      auditLevel?: AuditLevel;
    }
  ): void {
    const auditLevel = options?.auditLevel ?? "basic";
    if (auditLevel === "none") {
      return;
    }

    const summary: NonNullable<AuditLogEntry["result"]> = result.success
      ? {
          success: true,
          recordCount: Array.isArray(result.data) ? result.data.length : undefined,
          rowsAffected: result.rowsAffected,
        }
      : { success: false, error: result.error };

    const entry: AuditLogEntry = {
      timestamp: new Date().toISOString(),
      toolName,
      environment: options?.environment,
      result: summary,
      durationMs: Math.round(durationMs),
      sessionId: options?.sessionId,
    };

    // Verbose level adds full arguments and (truncated) result data
    if (auditLevel === "verbose") {
      entry.arguments = args;
      if (result.success) {
        summary.data = this.truncateResultData(result.data);
      }
    }

    this.log(entry);
  }

  private truncateResultData(data: unknown): unknown {
    if (data === undefined || data === null) return undefined;

    if (Array.isArray(data)) {
      if (data.length > 10) {
        return {
          _truncated: true,
          _totalCount: data.length,
          items: data.slice(0, 10),
        };
      }
      return data;
    }

    const stringified = JSON.stringify(data, jsonReplacer);
    if (stringified.length > 10000) {
      return {
        _truncated: true,
        _originalSize: stringified.length,
        preview: stringified.substring(0, 1000) + "...",
      };
    }

    return data;
  }
}

let auditLogger: AuditLogger | undefined;

export function getAuditLogger(): AuditLogger {
  if (!auditLogger) {
    auditLogger = new AuditLogger();
  }
  return auditLogger;
}
