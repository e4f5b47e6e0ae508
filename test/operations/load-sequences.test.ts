/**
 * Tests for loading sequence records into an array store
 */

import { writeFileSync } from "node:fs";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { MalformedInputError, NotFoundError } from "../../src/errors";
import { withMaybeGzip } from "../../src/io/file-opener";
import {
  decodeSequence,
  encodeSequence,
  loadSequences,
} from "../../src/operations/load-sequences";
import { InMemoryArrayStore } from "../../src/storage/array-store";
import { createFixtureDir, valuesOf } from "../utils/helpers";

const fixtures = createFixtureDir("load-sequences");

beforeAll(async () => {
  await withMaybeGzip(fixtures.path("genome.fa.gz"), "w", (handle) =>
    handle.write(">chr1\nACGT\nAC\n>chr2\nTTTT\n")
  );
  writeFileSync(fixtures.path("duplicate.fa"), ">a\nAC\n>b\nGG\n>a\nTT\n");
  writeFileSync(fixtures.path("empty.fa"), "");
});

afterAll(() => {
  fixtures.remove();
});

describe("encodeSequence", () => {
  test("should store character codes as uint8", () => {
    const array = encodeSequence("ACGTn");
    expect(array.dtype).toBe("uint8");
    expect(array.shape).toEqual([5]);
    expect(valuesOf(array)).toEqual([65, 67, 71, 84, 110]);
  });

  test("should round-trip through decodeSequence", () => {
    const body = "ACGTN".repeat(3000);
    expect(decodeSequence(encodeSequence(body))).toBe(body);
  });

  test("should reject characters wider than a byte", () => {
    expect(() => encodeSequence("AC€")).toThrow(MalformedInputError);
  });
});

describe("loadSequences", () => {
  test("should store each record under its label", async () => {
    const store = new InMemoryArrayStore();
    const progress: number[] = [];

    const result = await loadSequences(fixtures.path("genome.fa.gz"), store, {
      onProgress: (count) => {
        progress.push(count);
      },
    });

    expect(result).toEqual({ records: 2, totalLength: 10 });
    expect(progress).toEqual([1, 2]);
    expect(await store.listArrays()).toEqual(["sequence/chr1", "sequence/chr2"]);

    const chr1 = await store.getArray("sequence/chr1");
    expect(chr1?.dtype).toBe("uint8");
    expect(chr1 === undefined ? undefined : decodeSequence(chr1)).toBe("ACGTAC");
    expect(await store.getAttributes("sequence/chr1")).toEqual({ length: 6 });
    expect(await store.getAttributes("sequence/chr2")).toEqual({ length: 4 });
  });

  test("should apply a custom prefix", async () => {
    const store = new InMemoryArrayStore();
    await loadSequences(fixtures.path("genome.fa.gz"), store, { prefix: "genome:" });
    expect(await store.listArrays()).toEqual(["genome:chr1", "genome:chr2"]);
  });

  test("should reject repeated labels", async () => {
    const result = loadSequences(fixtures.path("duplicate.fa"), new InMemoryArrayStore());
    await expect(result).rejects.toBeInstanceOf(MalformedInputError);
    await expect(result).rejects.toThrow("Duplicate record label 'a'");
  });

  test("should require at least one record by default", async () => {
    await expect(loadSequences(fixtures.path("empty.fa"), new InMemoryArrayStore())).rejects.toThrow(
      "No records found in input"
    );
  });

  test("should accept empty input when records are optional", async () => {
    const store = new InMemoryArrayStore();
    const result = await loadSequences(fixtures.path("empty.fa"), store, { requireRecords: false });

    expect(result).toEqual({ records: 0, totalLength: 0 });
    expect(store.size).toBe(0);
  });

  test("should fail with NotFoundError for a missing file", async () => {
    await expect(
      loadSequences(fixtures.path("missing.fa"), new InMemoryArrayStore())
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});
