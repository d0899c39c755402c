/**
 * Signal Evaluator
 *
 * Dual-rule volume test. Pure: same inputs, same verdict.
 *
 * - PCT fires when observed > mean * (1 + pctThreshold / 100)
 * - ZSCORE fires when std > 0 and (observed - mean) / std >= zThreshold
 */

import type { Baseline, MarketSymbol, SignalReason, SignalVerdict } from "./types.js";

export interface SignalThresholds {
  pctThreshold: number; // percent above mean, 200 = 3x the mean
  zThreshold: number;
}

export interface SignalEvaluation {
  triggered: boolean;
  reason: SignalReason;
  pctChange: number | null;
  zScore: number | null;
}

function combineReason(pct: boolean, z: boolean): SignalReason {
  if (pct && z) return "BOTH";
  if (pct) return "PCT";
  if (z) return "ZSCORE";
  return "NONE";
}

export function evaluateSignal(
  observed: number,
  mean: number,
  std: number,
  thresholds: SignalThresholds
): SignalEvaluation {
  const pctTriggered = observed > mean * (1 + thresholds.pctThreshold / 100);

  // std == 0 would divide by zero; only the PCT rule can fire then
  const zScore = std > 0 ? (observed - mean) / std : null;
  const zTriggered = zScore !== null && zScore >= thresholds.zThreshold;

  const reason = combineReason(pctTriggered, zTriggered);
  return {
    triggered: reason !== "NONE",
    reason,
    pctChange: mean > 0 ? ((observed - mean) * 100) / mean : null,
    zScore,
  };
}

export function buildVerdict(
  symbol: MarketSymbol,
  windowStart: number,
  observed: number,
  baseline: Baseline,
  thresholds: SignalThresholds
): SignalVerdict {
  const evaluation = evaluateSignal(observed, baseline.mean, baseline.std, thresholds);
  return {
    symbol,
    windowStart,
    triggered: evaluation.triggered,
    reason: evaluation.reason,
    observedVolume: observed,
    baselineMean: baseline.mean,
    baselineStd: baseline.std,
    pctChange: evaluation.pctChange,
    zScore: evaluation.zScore,
  };
}
