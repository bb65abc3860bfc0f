/**
 * DSC Engine - Prometheus Metrics
 *
 * Metrics naming convention:  dsc_engine_<metric>_<unit>
 */

import { Counter, Registry } from "prom-client";

// ============================================================
//  REGISTRY
// ============================================================

/** Registry shared by every engine instance in this process. */
export const register: Registry = new Registry();

// ============================================================
//  COUNTERS
// ============================================================

/** Operations by outcome. `status` is "ok" or the error code. */
export const engineOperationsTotal = new Counter({
  name: "dsc_engine_operations_total",
  help: "Total engine operations by outcome",
  labelNames: ["operation", "status"] as const,
  registers: [register],
});

/** Successful liquidations by collateral asset. */
export const liquidationsTotal = new Counter({
  name: "dsc_engine_liquidations_total",
  help: "Total successful liquidations",
  labelNames: ["asset"] as const,
  registers: [register],
});
