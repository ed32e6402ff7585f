import type { SimSeconds } from "../core/time";
import type { NodeId } from "../constraints/constraints";

/**
 * Diagnostic categories for grouping.
 */
export type DiagnosticCategory = "timing" | "hierarchy" | "constraint";

/**
 * Diagnostic severity levels.
 */
export type DiagnosticSeverity = "info" | "warning" | "error";

/**
 * A runtime diagnostic emitted when something degrades but the simulation
 * carries on. Diagnostics are observational only; nothing in the engine
 * reads them back.
 */
export interface Diagnostic {
  /** Unique identifier for deduplication */
  id: string;

  category: DiagnosticCategory;

  severity: DiagnosticSeverity;

  /** Human-readable message */
  message: string;

  /** Simulation time at which the diagnostic was emitted */
  timestamp: SimSeconds;

  /** Optional: which component emitted this */
  source?: string;

  /** Optional: the node involved */
  nodeId?: NodeId;

  /**
   * Persistence mode:
   * - "transient": a one-off event
   * - "sticky": holds until the condition clears
   */
  persistence: "transient" | "sticky";
}
