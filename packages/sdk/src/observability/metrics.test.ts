import { describe, it, expect, beforeEach } from "vitest";
import { metrics, timed } from "./metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should record successful operations with their row counts", () => {
    const result = timed("books", "select", () => ["a", "b", "c"], (rows) => rows.length);

    expect(result).toEqual(["a", "b", "c"]);
    const books = metrics.getMetrics("books");
    expect(books?.select.count).toBe(1);
    expect(books?.select.rows).toBe(3);
    expect(books?.select.durationMs).toHaveLength(1);
    expect(books?.insert.count).toBe(0);
  });

  it("should record failures and rethrow", () => {
    expect(() =>
      timed(
        "books",
        "delete",
        () => {
          throw new Error("boom");
        },
        () => 0
      )
    ).toThrow("boom");

    expect(metrics.getMetrics("books")?.delete).toEqual({ count: 0, errors: 1, rows: 0, durationMs: [] });
  });

  it("should keep only the most recent 100 samples", () => {
    for (let i = 0; i < 150; i++) {
      metrics.recordOperation("books", "update", i, 1);
    }

    const update = metrics.getMetrics("books")?.update;
    expect(update?.count).toBe(150);
    expect(update?.durationMs).toHaveLength(100);
    expect(update?.durationMs[0]).toBe(50);
  });

  it("should compute p95", () => {
    const samples = Array.from({ length: 20 }, (_, i) => i + 1);
    expect(metrics.getP95(samples)).toBe(19);
    expect(metrics.getP95([])).toBe(0);
  });

  it("should reset one table or all tables", () => {
    metrics.recordOperation("books", "select", 1, 1);
    metrics.recordOperation("notes", "select", 1, 1);

    metrics.reset("books");
    expect(metrics.getMetrics("books")).toBeUndefined();
    expect([...metrics.getAllMetrics().keys()]).toEqual(["notes"]);

    metrics.reset();
    expect(metrics.getAllMetrics().size).toBe(0);
  });
});
