import { Candidate } from "./types";

function hoursKey(hours: number | null): number {
  return hours === null ? Number.POSITIVE_INFINITY : hours;
}

/**
 * Highest ROI first; on equal ROI the market closing soonest wins, unknown
 * close times last. Array#sort is stable, so full ties keep input order.
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.roiPct !== b.roiPct) return b.roiPct - a.roiPct;
  const ha = hoursKey(a.hoursToClose);
  const hb = hoursKey(b.hoursToClose);
  if (ha === hb) return 0;
  return ha < hb ? -1 : 1;
}

export function rankCandidates(candidates: readonly Candidate[]): Candidate[] {
  return [...candidates].sort(compareCandidates);
}
