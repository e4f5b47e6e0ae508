/**
 * End-to-end walk through the ingestion API
 *
 * Writes a small gzipped sequence file and a bigWig-looking stub into a
 * scratch directory, then loads both into an in-memory array store.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  detectTrackFormat,
  FastaParser,
  FastaWriter,
  fromValues,
  InMemoryArrayStore,
  loadSequences,
  loadTrack,
  TrackfillError,
  withMaybeGzip,
} from "../src";

// ============================================================================
// Example 1: Sequences
// ============================================================================

async function example1_sequences(dir: string, store: InMemoryArrayStore) {
  console.log("\n=== Example 1: Sequences ===\n");

  const path = join(dir, "genome.fa.gz");
  await withMaybeGzip(path, "w", (handle) =>
    new FastaWriter({ lineWidth: 8 }).writeToHandle(
      [
        { label: "chr1", body: "ACGTACGTACGTACGT" },
        { label: "chr2", body: "GGCCAATT" },
      ],
      handle
    )
  );

  for await (const record of new FastaParser().parseFile(path)) {
    console.log(`  ${record.label}: ${record.body.length}bp`);
  }

  const { records, totalLength } = await loadSequences(path, store);
  console.log(`Stored ${records} records (${totalLength}bp)`);
}

// ============================================================================
// Example 2: Signal track extrema
// ============================================================================

async function example2_track(dir: string, store: InMemoryArrayStore) {
  console.log("\n=== Example 2: Signal track extrema ===\n");

  const path = join(dir, "signal.bedGraph");
  writeFileSync(path, "chr1\t0\t100\t1.5\n");
  console.log(`${path} looks like: ${await detectTrackFormat(path)}`);

  const batches = [fromValues([0.5, 2, 1, 4], [2, 2]), fromValues([3, 0], [1, 2])];
  const accumulator = await loadTrack("signal", batches, store);
  console.log(`Folded ${accumulator.rows} rows over ${accumulator.numObs} observations`);
}

async function main() {
  const dir = mkdtempSync(join(tmpdir(), "trackfill-example-"));
  const store = new InMemoryArrayStore();

  try {
    await example1_sequences(dir, store);
    await example2_track(dir, store);
    console.log(`\nArrays: ${(await store.listArrays()).join(", ")}\n`);
  } catch (error) {
    console.error(error instanceof TrackfillError ? error.toString() : error);
    process.exitCode = 1;
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await main();
}

export { main };
