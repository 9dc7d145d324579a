import { createLogger } from "./logger";
import { formatHours } from "./time";
import { formatVolume } from "./notifier";
import { Candidate, FilterResult } from "./types";

const log = createLogger("reporter");

interface Column {
  header: string;
  align: "left" | "right";
  value: (c: Candidate) => string;
}

export function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}…` : value;
}

const COLUMNS: Column[] = [
  { header: "Ticker", align: "left", value: (c) => c.ticker },
  { header: "Event", align: "left", value: (c) => truncate(c.eventTitle, 35) },
  { header: "Market", align: "left", value: (c) => truncate(c.marketTitle, 40) },
  { header: "Outcome", align: "left", value: (c) => truncate(c.marketSubtitle || "—", 30) },
  { header: "Yes Bid", align: "right", value: (c) => `${c.yesBid}¢` },
  { header: "Yes Ask", align: "right", value: (c) => `${c.yesAsk}¢` },
  { header: "Spread", align: "right", value: (c) => `${c.spread}¢` },
  { header: "ROI", align: "right", value: (c) => `${c.roiCents}¢ (${c.roiPct.toFixed(1)}%)` },
  { header: "Closes In", align: "right", value: (c) => formatHours(c.hoursToClose) },
  { header: "24h Volume", align: "right", value: (c) => formatVolume(Math.max(c.eventVolume24h, c.marketVolume)) },
];

export function formatFilterSummary(result: FilterResult): string {
  const { rejects } = result;
  return (
    `Filter summary: kept ${result.candidates.length}/${result.totalMarkets} markets ` +
    `(price rejects: ${rejects.price}, spread: ${rejects.spread}, ` +
    `expiration: ${rejects.expiration}, volume: ${rejects.volume}, odds: ${rejects.noOdds})`
  );
}

export function renderCandidateTable(candidates: readonly Candidate[]): string[] {
  if (candidates.length === 0) return ["No markets met the high-probability criteria."];

  const rows = candidates.map((c) => COLUMNS.map((col) => col.value(c)));
  const widths = COLUMNS.map((col, i) => Math.max(col.header.length, ...rows.map((r) => r[i].length)));

  const line = (cells: string[]) =>
    cells
      .map((cell, i) => (COLUMNS[i].align === "right" ? cell.padStart(widths[i]) : cell.padEnd(widths[i])))
      .join(" │ ");

  const width = widths.reduce((sum, w) => sum + w, 0) + 3 * (widths.length - 1);
  return [
    "═".repeat(width),
    "  HIGH-PROBABILITY YES MARKETS",
    "═".repeat(width),
    line(COLUMNS.map((col) => col.header)),
    "─".repeat(width),
    ...rows.map(line),
    "═".repeat(width),
  ];
}

export function printCandidateTable(candidates: readonly Candidate[]): void {
  for (const row of renderCandidateTable(candidates)) log.info(row);
}
