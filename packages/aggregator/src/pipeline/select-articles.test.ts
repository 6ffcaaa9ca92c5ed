import { describe, expect, it } from "vitest";

import { selectArticles } from "./select-articles.js";

const entries = [
  { id: 1, topicId: "milho" },
  { id: 2, topicId: "milho" },
  { id: 3, topicId: "milho" },
  { id: 4, topicId: "cafe" },
  { id: 5, topicId: "milho" },
  { id: 6, topicId: "soja" }
];

describe("selectArticles", () => {
  it("keeps short lists whole", () => {
    expect(selectArticles(entries, 6).map((entry) => entry.id)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("reserves a slot for every topic before filling by recency", () => {
    expect(selectArticles(entries, 4).map((entry) => entry.id)).toEqual([1, 2, 4, 6]);
  });

  it("covers topics newest first when there are more topics than slots", () => {
    expect(selectArticles(entries, 2).map((entry) => entry.id)).toEqual([1, 4]);
  });
});
