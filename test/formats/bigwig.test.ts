/**
 * Tests for bigWig signature sniffing
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { InvalidArgumentError, IOError, NotFoundError } from "../../src/errors";
import {
  BIGWIG_SIGNATURE,
  detectTrackFormat,
  isBigWig,
  matchesBigWigSignature,
  readSignatureBytes,
} from "../../src/formats/bigwig";
import { createFixtureDir } from "../utils/helpers";

const fixtures = createFixtureDir("bigwig");

const LITTLE_ENDIAN_MAGIC = [0x26, 0xfc, 0x8f, 0x88];
const BIG_ENDIAN_MAGIC = [0x88, 0x8f, 0xfc, 0x26];

beforeAll(() => {
  writeFileSync(fixtures.path("le.bw"), Uint8Array.from([...LITTLE_ENDIAN_MAGIC, 0x04, 0x00, 0x01, 0x00]));
  writeFileSync(fixtures.path("be.bw"), Uint8Array.from([...BIG_ENDIAN_MAGIC, 0x00, 0x04]));
  writeFileSync(fixtures.path("zeros.bin"), new Uint8Array(16));
  writeFileSync(fixtures.path("short.bin"), Uint8Array.from([0x26, 0xfc]));
  writeFileSync(fixtures.path("exact.bw"), Uint8Array.from(LITTLE_ENDIAN_MAGIC));
  mkdirSync(fixtures.path("a-directory"));
  writeFileSync(fixtures.path("signal.bedGraph"), "chr1\t0\t100\t1.5\nchr1\t100\t200\t2.0\n");
});

afterAll(() => {
  fixtures.remove();
});

describe("matchesBigWigSignature", () => {
  test("should accept the magic in either byte order", () => {
    expect(matchesBigWigSignature(Uint8Array.from(LITTLE_ENDIAN_MAGIC))).toBe(true);
    expect(matchesBigWigSignature(Uint8Array.from(BIG_ENDIAN_MAGIC))).toBe(true);
  });

  test("should reject other prefixes", () => {
    expect(matchesBigWigSignature(new Uint8Array(4))).toBe(false);
    expect(matchesBigWigSignature(Uint8Array.from([0x1f, 0x8b, 0x08, 0x00]))).toBe(false);
  });

  test("should only look at the first four bytes of a view", () => {
    const bytes = Uint8Array.from([0x00, ...LITTLE_ENDIAN_MAGIC, 0xff]).subarray(1);
    expect(matchesBigWigSignature(bytes)).toBe(true);
  });

  test("should require four bytes", () => {
    expect(() => matchesBigWigSignature(Uint8Array.from([0x26, 0xfc, 0x8f]))).toThrow(
      InvalidArgumentError
    );
  });

  test("should use the documented magic number", () => {
    expect(BIGWIG_SIGNATURE).toBe(0x888ffc26);
  });
});

describe("isBigWig", () => {
  test("should detect little- and big-endian files", async () => {
    expect(await isBigWig(fixtures.path("le.bw"))).toBe(true);
    expect(await isBigWig(fixtures.path("be.bw"))).toBe(true);
    expect(await isBigWig(fixtures.path("exact.bw"))).toBe(true);
  });

  test("should return false for other content", async () => {
    expect(await isBigWig(fixtures.path("zeros.bin"))).toBe(false);
    expect(await isBigWig(fixtures.path("signal.bedGraph"))).toBe(false);
  });

  test("should fail with IOError on a truncated file", async () => {
    const result = isBigWig(fixtures.path("short.bin"));
    await expect(result).rejects.toBeInstanceOf(IOError);
    await expect(result).rejects.toThrow("is truncated");
  });

  test("should report the system message and a suggestion for a directory", async () => {
    const error = await isBigWig(fixtures.path("a-directory")).catch((cause: unknown) => cause);

    expect(error).toBeInstanceOf(IOError);
    expect(error).not.toBeInstanceOf(NotFoundError);
    expect(String(error)).toContain("EISDIR");
    expect(String(error)).toContain("Path points to a directory, not a file");
    expect(String(error)).not.toContain("[object Object]");
  });

  test("should fail with NotFoundError on a missing file", async () => {
    await expect(isBigWig(fixtures.path("missing.bw"))).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("readSignatureBytes", () => {
  test("should return exactly four bytes", async () => {
    const bytes = await readSignatureBytes(fixtures.path("le.bw"));
    expect(Array.from(bytes)).toEqual(LITTLE_ENDIAN_MAGIC);
  });
});

describe("detectTrackFormat", () => {
  test("should classify files by signature", async () => {
    expect(await detectTrackFormat(fixtures.path("le.bw"))).toBe("bigwig");
    expect(await detectTrackFormat(fixtures.path("signal.bedGraph"))).toBe("text");
  });

  test("should treat files shorter than a signature as text", async () => {
    expect(await detectTrackFormat(fixtures.path("short.bin"))).toBe("text");
  });

  test("should fail with NotFoundError on a missing file", async () => {
    await expect(detectTrackFormat(fixtures.path("missing.bw"))).rejects.toBeInstanceOf(NotFoundError);
  });
});
