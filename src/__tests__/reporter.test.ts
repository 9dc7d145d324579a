/**
 * Unit tests for the console report
 */

import { formatFilterSummary, renderCandidateTable, truncate } from "../reporter";
import { candidate } from "./fixtures";

describe("Reporter", () => {
  it("should summarize kept markets and rejections", () => {
    const summary = formatFilterSummary({
      candidates: [candidate()],
      rejects: { noOdds: 4, price: 10, spread: 3, expiration: 2, volume: 1 },
      totalMarkets: 21,
    });

    expect(summary).toBe(
      "Filter summary: kept 1/21 markets (price rejects: 10, spread: 3, expiration: 2, volume: 1, odds: 4)"
    );
  });

  it("should print a single line when nothing qualified", () => {
    expect(renderCandidateTable([])).toEqual(["No markets met the high-probability criteria."]);
  });

  it("should lay out one aligned row per candidate", () => {
    const lines = renderCandidateTable([candidate(), candidate({ ticker: "KX-2", marketSubtitle: "", hoursToClose: null })]);

    // 10 columns, widths 20+26+24+10+7+7+6+9+9+10 plus separators
    const width = 128 + 3 * 9;
    expect(lines).toHaveLength(8);
    expect(lines[0]).toBe("═".repeat(width));
    expect(lines[1]).toBe("  HIGH-PROBABILITY YES MARKETS");
    expect(lines[3].split(" │ ").map((cell) => cell.trim())).toEqual([
      "Ticker",
      "Event",
      "Market",
      "Outcome",
      "Yes Bid",
      "Yes Ask",
      "Spread",
      "ROI",
      "Closes In",
      "24h Volume",
    ]);
    expect(lines[4]).toBe("─".repeat(width));

    const first = lines[5].split(" │ ");
    expect(first).toEqual([
      "KXHIGHNY-24DEC31-B45",
      "Highest temperature in NYC",
      "Will the high be 45-46°?",
      "45° to 46°",
      "    95¢",
      "    97¢",
      "    2¢",
      "5¢ (5.3%)",
      "     5.5h",
      "    12,345",
    ]);

    const second = lines[6].split(" │ ").map((cell) => cell.trim());
    expect(second[3]).toBe("—");
    expect(second[8]).toBe("unknown");
    expect(lines.slice(3, 7).every((line) => line.length === width)).toBe(true);
  });

  it("should truncate long text with an ellipsis", () => {
    expect(truncate("abcdef", 3)).toBe("abc…");
    expect(truncate("abc", 3)).toBe("abc");
  });
});
