import type { EngagementPolicy } from "../utils/config";
import type { TerminationReason } from "../utils/types";

export type EngagementCounters = {
  turnCount: number;
  staleTurns: number;
  lowConfidenceTurns: number;
};

export function checkTermination(
  counters: EngagementCounters,
  policy: EngagementPolicy
): TerminationReason | null {
  if (counters.turnCount >= policy.maxTurns) return "max_turns";
  if (counters.staleTurns >= policy.staleTurnLimit) return "stale_intelligence";
  if (counters.lowConfidenceTurns >= policy.lowConfidenceTurnLimit) return "confidence_dropped";
  return null;
}

/**
 * Low-confidence turns only count once the conversation has been flagged:
 * the streak tracks a verdict that dropped, not one that never rose.
 */
export function nextCounters(
  previous: EngagementCounters,
  turn: { newIntel: number; isScam: boolean; flaggedBefore: boolean }
): EngagementCounters {
  return {
    turnCount: previous.turnCount + 1,
    staleTurns: turn.newIntel > 0 ? 0 : previous.staleTurns + 1,
    lowConfidenceTurns: turn.flaggedBefore && !turn.isScam ? previous.lowConfidenceTurns + 1 : 0
  };
}
