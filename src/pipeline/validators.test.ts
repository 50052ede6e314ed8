import { describe, it, expect } from "vitest";
import { createTestDatabase, seedTestFeed } from "../test-utils/db";
import { fetchValidators } from "../db/schema";
import { NO_VALIDATORS, recordFetch, validatorsFor } from "./validators";

describe("validatorsFor", () => {
  it("should return no validators for a feed never fetched", () => {
    const db = createTestDatabase();
    const feedId = seedTestFeed(db);

    expect(validatorsFor(db, feedId)).toEqual(NO_VALIDATORS);
  });
});

describe("recordFetch", () => {
  it("should store the validators of a full fetch", () => {
    const db = createTestDatabase();
    const feedId = seedTestFeed(db);

    recordFetch(db, feedId, {
      etag: '"abc123"',
      lastModified: "Sun, 01 Mar 2026 10:00:00 GMT",
    });

    expect(validatorsFor(db, feedId)).toEqual({
      etag: '"abc123"',
      lastModified: "Sun, 01 Mar 2026 10:00:00 GMT",
    });
  });

  it("should replace the stored pair, including with nulls", () => {
    const db = createTestDatabase();
    const feedId = seedTestFeed(db);

    recordFetch(db, feedId, { etag: '"v1"', lastModified: "yesterday" });
    recordFetch(db, feedId, { etag: '"v2"', lastModified: null });

    expect(validatorsFor(db, feedId)).toEqual({ etag: '"v2"', lastModified: null });
    expect(db.select().from(fetchValidators).all()).toHaveLength(1);
  });

  it("should refresh the update time even when the values are unchanged", () => {
    const db = createTestDatabase();
    const feedId = seedTestFeed(db);
    const later = new Date("2026-03-02T00:00:00Z");

    recordFetch(db, feedId, { etag: '"same"', lastModified: null }, new Date("2026-03-01T00:00:00Z"));
    recordFetch(db, feedId, { etag: '"same"', lastModified: null }, later);

    const row = db.select().from(fetchValidators).get();
    expect(row?.updatedAt).toEqual(later);
  });

  it("should keep validators per feed", () => {
    const db = createTestDatabase();
    const feedA = seedTestFeed(db);
    const feedB = seedTestFeed(db);

    recordFetch(db, feedA, { etag: '"a"', lastModified: null });

    expect(validatorsFor(db, feedA).etag).toBe('"a"');
    expect(validatorsFor(db, feedB)).toEqual(NO_VALIDATORS);
  });
});
