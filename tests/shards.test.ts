/**
 * Unit tests for shard discovery and split-archive reassembly.
 */
import { describe, test, expect } from "vitest";
import {
  discoverShards,
  findMissingOrdinal,
  reassembleShards,
  shardFilename,
} from "../src/archive/shards.js";
import { IncompleteShardSetError } from "../src/core/exceptions.js";
import { DiskStorage } from "../src/storage/disk.js";
import { API_LOG, buildZip, makeTmpDir, shardFiles } from "./fixtures.js";

const STAGING = "logs_T-1";
const ARCHIVE = `${STAGING}/merged.zip`;
const OPTS = { ticketId: "T-1", stagingKey: STAGING, archiveKey: ARCHIVE, baseName: "log" };

async function stage(files: Record<string, string | Uint8Array>): Promise<DiskStorage> {
  const storage = new DiskStorage(makeTmpDir());
  for (const [name, data] of Object.entries(files)) {
    await storage.write(`${STAGING}/${name}`, data);
  }
  return storage;
}

describe("shardFilename", () => {
  test("ordinal 0 is the primary archive", () => {
    expect(shardFilename("log", 0)).toBe("log.zip");
    expect(shardFilename("log", 3)).toBe("log.z03");
    expect(shardFilename("bundle", 12)).toBe("bundle.z12");
  });
});

describe("discoverShards", () => {
  test("keeps only the primary and two-digit parts", async () => {
    const storage = await stage({
      "log.zip": "0",
      "log.z02": "2",
      "log.z01": "1",
      "log.z1": "x",
      "log.z001": "x",
      "log.z00": "x",
      "other.z03": "x",
      "log.zip.bak": "x",
      "merged.zip": "x",
    });
    const set = await discoverShards(storage, STAGING, "log");

    expect(set.primary).toBe("log.zip");
    expect(set.parts).toEqual([
      { ordinal: 1, filename: "log.z01" },
      { ordinal: 2, filename: "log.z02" },
    ]);
  });

  test("empty staging directory", async () => {
    const storage = new DiskStorage(makeTmpDir());
    expect(await discoverShards(storage, STAGING, "log")).toEqual({
      baseName: "log",
      primary: null,
      parts: [],
    });
  });
});

describe("findMissingOrdinal", () => {
  test("complete sets have no gap", () => {
    expect(findMissingOrdinal({ baseName: "log", primary: "log.zip", parts: [] })).toBeNull();
    expect(
      findMissingOrdinal({
        baseName: "log",
        primary: "log.zip",
        parts: [
          { ordinal: 1, filename: "log.z01" },
          { ordinal: 2, filename: "log.z02" },
        ],
      }),
    ).toBeNull();
  });

  test("reports the lowest missing part", () => {
    expect(
      findMissingOrdinal({
        baseName: "log",
        primary: "log.zip",
        parts: [
          { ordinal: 1, filename: "log.z01" },
          { ordinal: 3, filename: "log.z03" },
          { ordinal: 5, filename: "log.z05" },
        ],
      }),
    ).toBe(2);
  });

  test("parts without a primary miss ordinal 0", () => {
    expect(
      findMissingOrdinal({
        baseName: "log",
        primary: null,
        parts: [{ ordinal: 1, filename: "log.z01" }],
      }),
    ).toBe(0);
  });
});

describe("reassembleShards", () => {
  const archive = buildZip({ "api.log": API_LOG });

  for (const count of [1, 2, 3, 4]) {
    test(`rebuilds the archive from ${count} shard(s)`, async () => {
      const storage = await stage(shardFiles(archive, count));
      const result = await reassembleShards(storage, OPTS);

      expect(result).toEqual({
        kind: count === 1 ? "single" : "split",
        archiveKey: ARCHIVE,
        shardCount: count,
        bytes: archive.length,
      });
      expect(Buffer.from(await storage.read(ARCHIVE)).equals(Buffer.from(archive))).toBe(true);
    });
  }

  test("a gap raises IncompleteShardSetError naming the missing part", async () => {
    const storage = await stage({ "log.zip": "a", "log.z01": "b", "log.z03": "d" });

    const err = await reassembleShards(storage, OPTS).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(IncompleteShardSetError);
    if (!(err instanceof IncompleteShardSetError)) return;
    expect(err.missingOrdinal).toBe(2);
    expect(err.missingFile).toBe("log.z02");
    expect(err.ticketId).toBe("T-1");
    expect(err.message).toContain(storage.locate(STAGING));
    expect(await storage.exists(ARCHIVE)).toBe(false);
  });

  test("parts without the primary archive are incomplete", async () => {
    const storage = await stage({ "log.z01": "b" });
    await expect(reassembleShards(storage, OPTS)).rejects.toThrow(
      "missing shard 0 (log.zip)",
    );
  });

  test("returns null when nothing is staged", async () => {
    const storage = await stage({ "screenshot.png": "png" });
    expect(await reassembleShards(storage, OPTS)).toBeNull();
    expect(await storage.exists(ARCHIVE)).toBe(false);
  });

  test("honours a custom base name", async () => {
    const storage = await stage(shardFiles(archive, 2, "bundle"));
    const result = await reassembleShards(storage, { ...OPTS, baseName: "bundle" });
    expect(result?.shardCount).toBe(2);
  });
});
