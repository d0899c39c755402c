/**
 * Hourly status report
 *
 * Logs universe size, the last cycle and alert totals at the top of every hour.
 */

import cron, { type ScheduledTask } from "node-cron";
import { info } from "../utils/logger.js";
import type { CycleSummary } from "../monitor/cycleOrchestrator.js";

export interface StatusSnapshot {
  now: number;
  universeSize: number;
  lastCycle: CycleSummary | null;
  totalAlerts: number;
  completedCycles: number;
  nextUniverseRefresh: number | null;
}

export function formatStatusReport(snapshot: StatusSnapshot): string {
  const lines = [
    `Universe: ${snapshot.universeSize} symbols`,
    `Cycles: ${snapshot.completedCycles} | Alerts since start: ${snapshot.totalAlerts}`,
  ];

  if (snapshot.lastCycle) {
    const c = snapshot.lastCycle;
    lines.push(
      `Last cycle: window ${new Date(c.windowStart).toISOString()} recorded=${c.recorded} evaluated=${c.evaluated} alerts=${c.alerted} noSource=${c.noSource} failed=${c.failed}`
    );
  } else {
    lines.push("Last cycle: none yet");
  }

  if (snapshot.nextUniverseRefresh !== null) {
    const minutes = Math.max(0, Math.round((snapshot.nextUniverseRefresh - snapshot.now) / 60000));
    lines.push(`Next universe refresh in ${minutes} min`);
  }

  return lines.join(" | ");
}

export function startStatusReport(snapshot: () => StatusSnapshot): ScheduledTask {
  const task = cron.schedule("0 * * * *", () => {
    info("StatusReport", formatStatusReport(snapshot()));
  });
  info("StatusReport", "Hourly status report scheduled: 0 * * * *");
  return task;
}
