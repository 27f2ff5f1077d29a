import { access, mkdir, mkdtemp, readFile, rename, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DiskLruCache, type DiskLruCacheOptions, NEVER_EXPIRES } from "../src/services/DiskLruCache.js";
import type { DiskCacheFileNameGenerator } from "../src/types/cache.types.js";
import { ErrorCode, ValidationError } from "../src/types/errors.js";

const HEADER_TEXT = "tiered-image-cache.journal\n1\n1\n1\n\n";

// Identifiers used in these tests are already valid entry names
const identity: DiskCacheFileNameGenerator = { generate: identifier => identifier };

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function writeRecord(
  cache: DiskLruCache,
  identifier: string,
  content: string,
  expiryTimestamp?: number,
): Promise<void> {
  const editor = await cache.beginEdit(identifier);
  if (!editor) {
    throw new Error(`${identifier} is being edited`);
  }
  editor.newOutputStream(0).end(content);
  if (expiryTimestamp !== undefined) {
    editor.setEntryExpiryTimestamp(expiryTimestamp);
  }
  await editor.commit();
}

async function readRecord(cache: DiskLruCache, identifier: string): Promise<string | null> {
  const snapshot = await cache.getSnapshot(identifier);
  if (!snapshot) {
    return null;
  }
  try {
    return (await snapshot.readBytes(0)).toString();
  } finally {
    await snapshot.close();
  }
}

describe("DiskLruCache", () => {
  let root: string;
  let directory: string;
  let cache: DiskLruCache;

  const open = (options: Partial<DiskLruCacheOptions> = {}) =>
    DiskLruCache.open({
      directory,
      appVersion: 1,
      valueCount: 1,
      maxSize: 1024,
      fileNameGenerator: identity,
      ...options,
    });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "image-cache-disk-"));
    directory = join(root, "store");
  });

  afterEach(async () => {
    await cache?.close();
    await rm(root, { recursive: true, force: true });
  });

  describe("open", () => {
    it("should create the directory and an empty journal", async () => {
      cache = await open();

      expect(await readFile(join(directory, "journal"), "utf8")).toBe(HEADER_TEXT);
      expect(cache.size()).toBe(0);
      expect(cache.getMaxSize()).toBe(1024);
      expect(cache.getDirectory()).toBe(directory);
    });

    it("should reject invalid sizes", async () => {
      await expect(open({ maxSize: 0 })).rejects.toBeInstanceOf(ValidationError);
      await expect(open({ valueCount: 0 })).rejects.toBeInstanceOf(ValidationError);
    });

    it("should restore records after a restart", async () => {
      cache = await open();
      await writeRecord(cache, "alpha", "hello");
      await cache.close();

      cache = await open();

      expect(await readRecord(cache, "alpha")).toBe("hello");
      expect(cache.size()).toBe(5);
    });

    it("should keep recency order across a restart", async () => {
      cache = await open();
      await writeRecord(cache, "a", "1111");
      await writeRecord(cache, "b", "2222");
      await writeRecord(cache, "c", "3333");
      await readRecord(cache, "a");
      await cache.close();

      cache = await open();
      await cache.setMaxSize(8);

      expect(await readRecord(cache, "b")).toBeNull();
      expect(await readRecord(cache, "c")).toBe("3333");
      expect(await readRecord(cache, "a")).toBe("1111");
    });

    it("should drop records whose edit never completed", async () => {
      await mkdir(directory, { recursive: true });
      await writeFile(
        join(directory, "journal"),
        `${HEADER_TEXT}CLEAN keep ${NEVER_EXPIRES} 3\nDIRTY lost\n`,
      );
      await writeFile(join(directory, "keep.0"), "abc");
      await writeFile(join(directory, "lost.0.tmp"), "xyz");

      cache = await open();

      expect(await readRecord(cache, "keep")).toBe("abc");
      expect(await readRecord(cache, "lost")).toBeNull();
      expect(await exists(join(directory, "lost.0.tmp"))).toBe(false);
      expect(cache.size()).toBe(3);
    });

    it("should start empty when the journal is corrupt", async () => {
      await mkdir(directory, { recursive: true });
      await writeFile(join(directory, "journal"), "not a journal\n");
      await writeFile(join(directory, "x.0"), "stale");

      cache = await open();

      expect(cache.getStats().entryCount).toBe(0);
      expect(await exists(join(directory, "x.0"))).toBe(false);
      expect(await readFile(join(directory, "journal"), "utf8")).toBe(HEADER_TEXT);
    });

    it("should start empty when the journal was written by another app version", async () => {
      cache = await open();
      await writeRecord(cache, "alpha", "hello");
      await cache.close();

      cache = await open({ appVersion: 2 });

      expect(await readRecord(cache, "alpha")).toBeNull();
    });

    it("should recover from a torn last journal line", async () => {
      await mkdir(directory, { recursive: true });
      await writeFile(
        join(directory, "journal"),
        `${HEADER_TEXT}CLEAN keep ${NEVER_EXPIRES} 3\nREMOVE ke`,
      );
      await writeFile(join(directory, "keep.0"), "abc");

      cache = await open();

      expect(await readRecord(cache, "keep")).toBe("abc");
      await cache.close();
      expect(await readFile(join(directory, "journal"), "utf8")).toBe(
        `${HEADER_TEXT}CLEAN keep ${NEVER_EXPIRES} 3\nREAD keep\n`,
      );
    });

    it("should restore the backup journal when the journal is missing", async () => {
      cache = await open();
      await writeRecord(cache, "alpha", "hello");
      await cache.close();
      await rename(join(directory, "journal"), join(directory, "journal.bkp"));

      cache = await open();

      expect(await readRecord(cache, "alpha")).toBe("hello");
      expect(await exists(join(directory, "journal.bkp"))).toBe(false);
    });
  });

  describe("edits", () => {
    beforeEach(async () => {
      cache = await open();
    });

    it("should journal a committed edit", async () => {
      await writeRecord(cache, "alpha", "hello");

      expect(await readFile(join(directory, "journal"), "utf8")).toBe(
        `${HEADER_TEXT}DIRTY alpha\nCLEAN alpha ${NEVER_EXPIRES} 5\n`,
      );
      expect(await exists(join(directory, "alpha.0"))).toBe(true);
      expect(await exists(join(directory, "alpha.0.tmp"))).toBe(false);
    });

    it("should allow one edit per record at a time", async () => {
      const editor = await cache.beginEdit("alpha");

      expect(editor).not.toBeNull();
      expect(await cache.beginEdit("alpha")).toBeNull();
      expect(await cache.beginEdit("beta")).not.toBeNull();

      await editor?.abort();
      expect(await cache.beginEdit("alpha")).not.toBeNull();
    });

    it("should keep the previous version when an edit is aborted", async () => {
      await writeRecord(cache, "alpha", "v1");
      const editor = await cache.beginEdit("alpha");
      if (!editor) throw new Error("busy");
      editor.newOutputStream(0).write("partial");

      await editor.abort();

      expect(await readRecord(cache, "alpha")).toBe("v1");
      expect(await exists(join(directory, "alpha.0.tmp"))).toBe(false);
      expect(cache.size()).toBe(2);
    });

    it("should leave no record when the first edit is aborted", async () => {
      const editor = await cache.beginEdit("alpha");
      if (!editor) throw new Error("busy");
      editor.newOutputStream(0).end("never published");

      await editor.abort();

      expect(await readRecord(cache, "alpha")).toBeNull();
      expect(cache.getStats().entryCount).toBe(0);
    });

    it("should refuse to publish a new record without data", async () => {
      const editor = await cache.beginEdit("alpha");
      if (!editor) throw new Error("busy");

      await expect(editor.commit()).rejects.toMatchObject({
        code: ErrorCode.DISK_CACHE_INCOMPLETE_EDIT,
      });
      expect(await readRecord(cache, "alpha")).toBeNull();
      expect(await cache.beginEdit("alpha")).not.toBeNull();
    });

    it("should fail the commit when the temp file cannot be written", async () => {
      await mkdir(join(directory, "alpha.0.tmp"));
      const editor = await cache.beginEdit("alpha");
      if (!editor) throw new Error("busy");
      const stream = editor.newOutputStream(0);
      stream.write("chunk");
      await sleep(50);
      stream.end();

      await expect(editor.commit()).rejects.toMatchObject({ code: ErrorCode.DISK_CACHE_IO });
      expect(await readRecord(cache, "alpha")).toBeNull();
      expect(await exists(join(directory, "alpha.0.tmp"))).toBe(false);
      expect(await cache.beginEdit("alpha")).not.toBeNull();
    });

    it("should keep the previous version when a write fails", async () => {
      await writeRecord(cache, "alpha", "v1");
      await mkdir(join(directory, "alpha.0.tmp"));
      const editor = await cache.beginEdit("alpha");
      if (!editor) throw new Error("busy");
      editor.newOutputStream(0).write("v2");
      await sleep(50);

      await expect(editor.commit()).rejects.toMatchObject({ code: ErrorCode.DISK_CACHE_IO });
      expect(await readRecord(cache, "alpha")).toBe("v1");
    });

    it("should refuse to complete an edit twice", async () => {
      const editor = await cache.beginEdit("alpha");
      if (!editor) throw new Error("busy");
      editor.newOutputStream(0).end("x");
      await editor.commit();

      await expect(editor.commit()).rejects.toThrow("already completed");
      await expect(editor.abort()).resolves.toBeUndefined();
      expect(() => editor.newOutputStream(0)).toThrow("already completed");
    });

    it("should reject slots out of range", async () => {
      const editor = await cache.beginEdit("alpha");
      if (!editor) throw new Error("busy");

      expect(() => editor.newOutputStream(1)).toThrow(ValidationError);
      await editor.abort();
    });

    it("should reject names the generator makes invalid", async () => {
      cache.setFileNameGenerator({ generate: () => "Not Valid" });

      await expect(cache.beginEdit("alpha")).rejects.toMatchObject({
        code: ErrorCode.INVALID_KEY,
      });
    });
  });

  describe("snapshots", () => {
    beforeEach(async () => {
      cache = await open();
    });

    it("should expose lengths, expiry and re-readable streams", async () => {
      await writeRecord(cache, "alpha", "hello", 5_000_000_000_000);
      const snapshot = await cache.getSnapshot("alpha");
      if (!snapshot) throw new Error("missing");

      try {
        expect(snapshot.getLength(0)).toBe(5);
        expect(snapshot.expiryTimestamp).toBe(5_000_000_000_000);
        expect((await snapshot.readBytes(0)).toString()).toBe("hello");
        expect((await snapshot.readBytes(0)).toString()).toBe("hello");
      } finally {
        await snapshot.close();
      }
      expect(snapshot.isClosed()).toBe(true);
      expect(() => snapshot.reader(0)).toThrow("Snapshot is closed");
    });

    it("should keep reading the version it was opened on", async () => {
      await writeRecord(cache, "alpha", "v1");
      const snapshot = await cache.getSnapshot("alpha");
      if (!snapshot) throw new Error("missing");

      await writeRecord(cache, "alpha", "v2");

      expect((await snapshot.readBytes(0)).toString()).toBe("v1");
      await snapshot.close();
      expect(await readRecord(cache, "alpha")).toBe("v2");
    });

    it("should survive removal of its record", async () => {
      await writeRecord(cache, "alpha", "first");
      const snapshot = await cache.getSnapshot("alpha");
      if (!snapshot) throw new Error("missing");

      expect(await cache.remove("alpha")).toBe(true);

      expect((await snapshot.readBytes(0)).toString()).toBe("first");
      await snapshot.close();
      expect(await readRecord(cache, "alpha")).toBeNull();
    });

    it("should report a vanished file as a miss", async () => {
      await writeRecord(cache, "alpha", "hello");
      await rm(join(directory, "alpha.0"));

      expect(await cache.getSnapshot("alpha")).toBeNull();
      expect(cache.getStats().entryCount).toBe(0);
    });
  });

  describe("expiry", () => {
    it("should remove expired records on access", async () => {
      let now = 1_000;
      cache = await open({ now: () => now });
      await writeRecord(cache, "alpha", "hello", 1_500);

      expect(cache.getExpiryTimestamp("alpha")).toBe(1_500);
      expect(await readRecord(cache, "alpha")).toBe("hello");

      now = 2_000;
      expect(await cache.getSnapshot("alpha")).toBeNull();
      expect(cache.getExpiryTimestamp("alpha")).toBeNull();
      expect(await exists(join(directory, "alpha.0"))).toBe(false);
    });

    it("should never expire records without an expiry", async () => {
      cache = await open({ now: () => Number.MAX_SAFE_INTEGER - 1 });
      await writeRecord(cache, "alpha", "hello");

      expect(cache.getExpiryTimestamp("alpha")).toBe(NEVER_EXPIRES);
      expect(await readRecord(cache, "alpha")).toBe("hello");
    });
  });

  describe("capacity", () => {
    it("should evict least recently used records beyond the capacity", async () => {
      cache = await open({ maxSize: 10 });
      await writeRecord(cache, "a", "1111");
      await writeRecord(cache, "b", "2222");
      await writeRecord(cache, "c", "3333");

      expect(cache.size()).toBe(8);
      expect(await readRecord(cache, "a")).toBeNull();
      expect(await readRecord(cache, "b")).toBe("2222");
    });

    it("should account for replaced records", async () => {
      cache = await open();
      await writeRecord(cache, "a", "1234567890");
      await writeRecord(cache, "a", "12");

      expect(cache.size()).toBe(2);
    });

    it("should trim when the capacity shrinks", async () => {
      cache = await open();
      await writeRecord(cache, "a", "12345");
      await writeRecord(cache, "b", "12345");

      await cache.setMaxSize(6);

      expect(cache.getMaxSize()).toBe(6);
      expect(cache.size()).toBe(5);
      expect(cache.getCacheFile("a", 0)).toBeNull();
      expect(cache.getCacheFile("b", 0)).toBe(join(directory, "b.0"));
    });

    it("should compact the journal once redundant lines pile up", async () => {
      cache = await open();
      await writeRecord(cache, "alpha", "hello");

      for (let i = 0; i < 2100; i++) {
        await readRecord(cache, "alpha");
      }

      const lines = (await readFile(join(directory, "journal"), "utf8")).split("\n");
      expect(lines.length).toBeLessThan(200);
      expect(lines.slice(0, 6).join("\n")).toBe(`${HEADER_TEXT}CLEAN alpha ${NEVER_EXPIRES} 5`);
    });
  });

  describe("lifecycle", () => {
    it("should reject operations once closed", async () => {
      cache = await open();
      await writeRecord(cache, "alpha", "hello");
      await cache.close();

      expect(cache.isClosed()).toBe(true);
      await expect(cache.getSnapshot("alpha")).rejects.toMatchObject({
        code: ErrorCode.DISK_CACHE_CLOSED,
      });
      await expect(cache.beginEdit("alpha")).rejects.toMatchObject({
        code: ErrorCode.DISK_CACHE_CLOSED,
      });
      expect(cache.getCacheFile("alpha", 0)).toBeNull();
    });

    it("should abort in-flight edits on close", async () => {
      cache = await open();
      const editor = await cache.beginEdit("alpha");
      if (!editor) throw new Error("busy");
      editor.newOutputStream(0).write("partial");

      await cache.close();

      expect(editor.isDone()).toBe(true);
      expect(await exists(join(directory, "alpha.0.tmp"))).toBe(false);
      cache = await open();
      expect(await readRecord(cache, "alpha")).toBeNull();
    });

    it("should delete the directory", async () => {
      cache = await open();
      await writeRecord(cache, "alpha", "hello");

      await cache.delete();

      expect(await exists(directory)).toBe(false);
      expect(cache.isClosed()).toBe(true);
    });

    it("should flush without error", async () => {
      cache = await open();
      await writeRecord(cache, "alpha", "hello");

      await expect(cache.flush()).resolves.toBeUndefined();
    });
  });
});
