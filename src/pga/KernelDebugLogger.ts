/**
 * KernelDebugLogger - opt-in capture of degenerate kernel results
 *
 * Join and meet never fail: "no such line/plane/point" comes back as the
 * zero element. When enabled, this logger records every such result and
 * every unitize on a zero weight, so the inputs that produced them can be
 * turned into test cases.
 */

import { DEFAULT_KERNEL_OPTIONS, type KernelOptions } from "@/config/kernelConfig";
import type { Entity, EntityKind } from "@/types";
import { format, normSquared } from "./coordinates";

export type KernelOperation = "join" | "meet" | "unitize";

export type KernelDebugReason = "zero-result" | "zero-weight";

/**
 * Debug log entry for a single degenerate operation.
 */
export interface KernelDebugLog {
  timestamp: number;
  operation: KernelOperation;
  reason: KernelDebugReason;
  operandKinds: EntityKind[];
  operands: string[];
  result: string;
}

/**
 * Global debug logger instance.
 */
class KernelDebugLoggerImpl {
  private enabled = false;
  private logs: KernelDebugLog[] = [];
  private maxLogs = DEFAULT_KERNEL_OPTIONS.debugLogLimit;
  private zeroEpsilon = DEFAULT_KERNEL_OPTIONS.zeroEpsilon;
  private lastLog: KernelDebugLog | null = null;

  /**
   * Enable debug logging.
   */
  enable(maxLogs: number = this.maxLogs): void {
    this.enabled = true;
    this.maxLogs = maxLogs;
    console.log("[KERNEL DEBUG] Logging enabled. Use KernelDebugLogger.dump() to see logs.");
  }

  /**
   * Take the log cap and the zero threshold from a kernel configuration.
   */
  configure(options: KernelOptions): void {
    this.maxLogs = options.debugLogLimit;
    this.zeroEpsilon = options.zeroEpsilon;
    this.trim();
  }

  /**
   * Disable debug logging.
   */
  disable(): void {
    this.enabled = false;
    console.log("[KERNEL DEBUG] Logging disabled.");
  }

  toggle(): void {
    if (this.enabled) {
      this.disable();
    } else {
      this.enable();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Record a join/meet result if it is the zero element.
   */
  logResult(operation: KernelOperation, operands: readonly Entity[], result: Entity): void {
    if (!this.enabled) return;
    if (normSquared(result) > this.zeroEpsilon) return;

    this.push(operation, "zero-result", operands, result);
  }

  /**
   * Record a unitize call on an entity without weight.
   */
  logZeroWeight(entity: Entity, result: Entity): void {
    if (!this.enabled) return;

    this.push("unitize", "zero-weight", [entity], result);
  }

  private push(
    operation: KernelOperation,
    reason: KernelDebugReason,
    operands: readonly Entity[],
    result: Entity
  ): void {
    const log: KernelDebugLog = {
      timestamp: Date.now(),
      operation,
      reason,
      operandKinds: operands.map((operand) => operand.kind),
      operands: operands.map((operand) => format(operand)),
      result: format(result),
    };

    this.lastLog = log;
    this.logs.push(log);
    this.trim();
  }

  // Keep only the last N logs
  private trim(): void {
    while (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }
  }

  /**
   * Dump all logs to console.
   */
  dump(): void {
    console.log("[KERNEL DEBUG] Dumping logs...");
    console.log("Total logs:", this.logs.length);

    for (const log of this.logs) {
      console.group(`${log.operation} (${log.reason}) @ ${new Date(log.timestamp).toISOString()}`);
      log.operands.forEach((operand, index) => {
        console.log(`${log.operandKinds[index]}:`, operand);
      });
      console.log("Result:", log.result);
      console.groupEnd();
    }
  }

  getLastLog(): KernelDebugLog | null {
    return this.lastLog;
  }

  getAllLogs(): readonly KernelDebugLog[] {
    return this.logs;
  }

  clear(): void {
    this.logs = [];
    this.lastLog = null;
    console.log("[KERNEL DEBUG] Logs cleared.");
  }
}

export const KernelDebugLogger = new KernelDebugLoggerImpl();
