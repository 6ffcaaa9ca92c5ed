import { describe, expect, it } from "vitest";

import { filterByWindow, sortByPublishedDesc } from "./window-filter.js";

const now = new Date("2026-10-19T12:00:00.000Z");

function at(iso: string) {
  return { publishedAt: new Date(iso) };
}

describe("filterByWindow", () => {
  it("keeps the boundary instant and drops anything older", () => {
    const boundary = at("2026-10-12T12:00:00.000Z");
    const justBefore = at("2026-10-12T11:59:59.999Z");
    const recent = at("2026-10-19T08:00:00.000Z");

    expect(filterByWindow([justBefore, boundary, recent], now, 7)).toEqual([
      boundary,
      recent
    ]);
  });

  it("honours a shorter retention window", () => {
    const twoDaysOld = at("2026-10-17T11:00:00.000Z");
    expect(filterByWindow([twoDaysOld], now, 2)).toEqual([]);
  });
});

describe("sortByPublishedDesc", () => {
  it("orders newest first and keeps ties in input order", () => {
    const older = { id: "older", publishedAt: new Date("2026-10-17T10:00:00.000Z") };
    const tieA = { id: "tie-a", publishedAt: new Date("2026-10-18T10:00:00.000Z") };
    const tieB = { id: "tie-b", publishedAt: new Date("2026-10-18T10:00:00.000Z") };

    expect(sortByPublishedDesc([older, tieA, tieB]).map((item) => item.id)).toEqual([
      "tie-a",
      "tie-b",
      "older"
    ]);
  });
});
