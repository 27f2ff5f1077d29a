import { type WriteStream, createWriteStream } from "node:fs";
import {
  type FileHandle,
  access,
  mkdir,
  open,
  readFile,
  rename,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import { join } from "node:path";
import type { Writable } from "node:stream";
import { buffer } from "node:stream/consumers";
import { finished } from "node:stream/promises";
import type { DiskCacheFileNameGenerator, DiskCacheStats } from "../types/cache.types.js";
import {
  DiskCacheError,
  ErrorCode,
  ValidationError,
  toImageCacheError,
} from "../types/errors.js";
import type { BlobReader } from "../types/image.types.js";
import { HashFileNameGenerator } from "../utils/storage.js";
import {
  JOURNAL_FILE,
  JOURNAL_FILE_BACKUP,
  JOURNAL_FILE_TEMP,
  type JournalRecord,
  VALID_ENTRY_NAME,
  formatHeader,
  formatRecord,
  parseJournal,
} from "./DiskJournal.js";
import { createLogger, describeError } from "./Logger.js";

/** Expiry of records whose writer never set one */
export const NEVER_EXPIRES = Number.MAX_SAFE_INTEGER;

const REDUNDANT_OP_COMPACT_THRESHOLD = 2000;

export interface DiskLruCacheOptions {
  directory: string;
  /** Bumping it invalidates every record written by an older version */
  appVersion: number;
  /** Number of blob slots per record */
  valueCount: number;
  maxSize: number;
  fileNameGenerator?: DiskCacheFileNameGenerator;
  now?: () => number;
}

interface DiskEntry {
  name: string;
  lengths: number[];
  expiryTimestamp: number;
  /** True once the record has been committed at least once */
  readable: boolean;
  currentEditor: Editor | null;
  sequenceNumber: number;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read view of a committed record. Holds open file handles, so it keeps
 * reading the bytes it was opened on even if the record is replaced or
 * removed afterwards. Must be closed.
 */
export class Snapshot {
  private closed = false;

  constructor(
    readonly name: string,
    readonly sequenceNumber: number,
    readonly expiryTimestamp: number,
    private readonly lengths: number[],
    private readonly handles: FileHandle[],
  ) {}

  getLength(slot: number): number {
    return this.lengths[this.checkSlot(slot)] ?? 0;
  }

  /**
   * Re-readable view of one slot; each stream starts at offset 0
   */
  reader(slot: number): BlobReader {
    const handle = this.handles[this.checkSlot(slot)];
    if (!handle) {
      throw new DiskCacheError(`Snapshot has no handle for slot ${slot}`);
    }
    return {
      createReadStream: () => handle.createReadStream({ start: 0, autoClose: false }),
    };
  }

  async readBytes(slot: number): Promise<Buffer> {
    return buffer(this.reader(slot).createReadStream());
  }

  isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await Promise.all(this.handles.map(handle => handle.close()));
  }

  private checkSlot(slot: number): number {
    if (this.closed) {
      throw new DiskCacheError("Snapshot is closed", ErrorCode.DISK_CACHE_CLOSED);
    }
    if (!Number.isInteger(slot) || slot < 0 || slot >= this.handles.length) {
      throw new ValidationError(`Slot ${slot} is out of range`, "slot", slot);
    }
    return slot;
  }
}

/**
 * Write side of a record. Bytes go to temp files that commit() renames
 * into place; abort() deletes them and leaves any earlier version intact.
 */
export class Editor {
  private streams: WriteStream[] = [];
  private written: boolean[];
  private expiryTimestamp: number;
  private done = false;
  private streamError: Error | null = null;

  constructor(
    readonly name: string,
    private readonly dirtyPaths: string[],
    expiryTimestamp: number,
    private readonly complete: (editor: Editor, success: boolean) => Promise<void>,
  ) {
    this.written = dirtyPaths.map(() => false);
    this.expiryTimestamp = expiryTimestamp;
  }

  newOutputStream(slot: number): Writable {
    if (this.done) {
      throw new DiskCacheError(`Edit of ${this.name} has already completed`);
    }
    const path = this.dirtyPaths[slot];
    if (!Number.isInteger(slot) || path === undefined) {
      throw new ValidationError(`Slot ${slot} is out of range`, "slot", slot);
    }

    const stream = createWriteStream(path);
    // Open and write failures surface from commit()
    stream.on("error", error => {
      if (!this.streamError) {
        this.streamError = error;
      }
    });
    this.written[slot] = true;
    this.streams.push(stream);
    return stream;
  }

  setEntryExpiryTimestamp(expiryTimestamp: number): void {
    this.expiryTimestamp = expiryTimestamp;
  }

  getEntryExpiryTimestamp(): number {
    return this.expiryTimestamp;
  }

  hasWritten(slot: number): boolean {
    return this.written[slot] === true;
  }

  isDone(): boolean {
    return this.done;
  }

  /**
   * Publish the written bytes and expiry atomically
   */
  async commit(): Promise<void> {
    if (this.done) {
      throw new DiskCacheError(`Edit of ${this.name} has already completed`);
    }
    this.done = true;
    await this.complete(this, true);
  }

  /**
   * Discard the written bytes; a no-op once the edit has completed
   */
  async abort(): Promise<void> {
    if (this.done) return;
    this.done = true;
    await this.complete(this, false);
  }

  /** @internal */
  async flushStreams(): Promise<void> {
    for (const stream of this.streams) {
      if (this.streamError) {
        throw this.streamError;
      }
      if (!stream.writableEnded) {
        stream.end();
      }
      await finished(stream);
    }
    if (this.streamError) {
      throw this.streamError;
    }
  }

  /** @internal */
  async destroyStreams(): Promise<void> {
    for (const stream of this.streams) {
      if (stream.closed) continue;
      const closed = new Promise<void>(resolve => {
        stream.once("close", () => resolve());
      });
      stream.destroy();
      await closed;
    }
  }
}

/**
 * Size-bounded persistent LRU store of blobs.
 *
 * Every structural change is appended to a journal so the index can be
 * rebuilt after a restart; records whose last journal line is DIRTY were
 * interrupted mid-edit and are dropped on open.
 */
export class DiskLruCache {
  private readonly logger = createLogger("DiskLruCache");
  private readonly directory: string;
  private readonly appVersion: number;
  private readonly valueCount: number;
  private readonly now: () => number;
  private maxSize: number;
  private fileNameGenerator: DiskCacheFileNameGenerator;
  private entries = new Map<string, DiskEntry>();
  private currentSize = 0;
  private redundantOpCount = 0;
  private nextSequenceNumber = 0;
  private journal: FileHandle | null = null;
  private journalQueue: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(options: DiskLruCacheOptions) {
    this.directory = options.directory;
    this.appVersion = options.appVersion;
    this.valueCount = options.valueCount;
    this.maxSize = options.maxSize;
    this.fileNameGenerator = options.fileNameGenerator ?? new HashFileNameGenerator();
    this.now = options.now ?? Date.now;
  }

  /**
   * Open the store in directory, creating it when missing
   */
  static async open(options: DiskLruCacheOptions): Promise<DiskLruCache> {
    DiskLruCache.validateMaxSize(options.maxSize);
    if (!Number.isInteger(options.valueCount) || options.valueCount <= 0) {
      throw new ValidationError("valueCount must be a positive integer", "valueCount", options.valueCount);
    }

    await mkdir(options.directory, { recursive: true });
    await DiskLruCache.restoreBackupJournal(options.directory);

    const journalPath = join(options.directory, JOURNAL_FILE);
    if (await pathExists(journalPath)) {
      const cache = new DiskLruCache(options);
      try {
        const needsRebuild = await cache.readJournal();
        await cache.processJournal(needsRebuild.interrupted);
        if (needsRebuild.interrupted.size > 0 || needsRebuild.truncatedTail) {
          await cache.rebuildJournal();
        } else {
          cache.journal = await open(journalPath, "a");
        }
        return cache;
      } catch (error) {
        cache.logger.warning(
          "Disk cache journal is unreadable, starting with an empty cache",
          { operation: "open", service: "DiskLruCache" },
          { directory: options.directory, ...describeError(error) },
        );
        await cache.delete();
      }
      await mkdir(options.directory, { recursive: true });
    }

    const cache = new DiskLruCache(options);
    await cache.rebuildJournal();
    return cache;
  }

  private static async restoreBackupJournal(directory: string): Promise<void> {
    const backupPath = join(directory, JOURNAL_FILE_BACKUP);
    if (!(await pathExists(backupPath))) return;

    const journalPath = join(directory, JOURNAL_FILE);
    if (await pathExists(journalPath)) {
      await rm(backupPath, { force: true });
    } else {
      await rename(backupPath, journalPath);
    }
  }

  private static validateMaxSize(maxSize: number): void {
    if (!Number.isFinite(maxSize) || maxSize <= 0) {
      throw new ValidationError("maxSize must be a positive number", "maxSize", maxSize);
    }
  }

  private get journalPath(): string {
    return join(this.directory, JOURNAL_FILE);
  }

  private cleanPath(name: string, slot: number): string {
    return join(this.directory, `${name}.${slot}`);
  }

  private dirtyPath(name: string, slot: number): string {
    return join(this.directory, `${name}.${slot}.tmp`);
  }

  private async readJournal(): Promise<{ interrupted: Set<string>; truncatedTail: boolean }> {
    const content = await readFile(this.journalPath, "utf8");
    const parsed = parseJournal(content, {
      appVersion: this.appVersion,
      valueCount: this.valueCount,
    });

    const interrupted = new Set<string>();
    for (const record of parsed.records) {
      switch (record.op) {
        case "CLEAN": {
          const entry = this.entries.get(record.name) ?? this.createEntry(record.name);
          entry.readable = true;
          entry.lengths = record.lengths;
          entry.expiryTimestamp = record.expiryTimestamp;
          entry.sequenceNumber = this.nextSequenceNumber++;
          this.touch(entry);
          interrupted.delete(record.name);
          break;
        }
        case "DIRTY":
          this.touch(this.entries.get(record.name) ?? this.createEntry(record.name));
          interrupted.add(record.name);
          break;
        case "REMOVE":
          this.entries.delete(record.name);
          interrupted.delete(record.name);
          break;
        case "READ": {
          const entry = this.entries.get(record.name);
          if (entry) this.touch(entry);
          break;
        }
      }
    }

    this.redundantOpCount = parsed.records.length - this.entries.size;
    return { interrupted, truncatedTail: parsed.truncatedTail };
  }

  /**
   * Compute the initial size and drop records of edits that never completed
   */
  private async processJournal(interrupted: Set<string>): Promise<void> {
    await rm(join(this.directory, JOURNAL_FILE_TEMP), { force: true });

    for (const entry of Array.from(this.entries.values())) {
      if (interrupted.has(entry.name)) {
        for (let slot = 0; slot < this.valueCount; slot++) {
          await rm(this.cleanPath(entry.name, slot), { force: true });
          await rm(this.dirtyPath(entry.name, slot), { force: true });
        }
        this.entries.delete(entry.name);
        continue;
      }
      this.currentSize += entry.lengths.reduce((sum, length) => sum + length, 0);
    }
  }

  /**
   * Serialize journal I/O so appends never interleave with a rebuild
   */
  private enqueueJournal(task: () => Promise<void>): Promise<void> {
    const run = this.journalQueue.then(task);
    // The queue only orders work; callers observe failures through `run`
    this.journalQueue = run.catch(() => undefined);
    return run;
  }

  private appendJournal(record: JournalRecord): Promise<void> {
    return this.enqueueJournal(async () => {
      if (!this.journal) {
        throw new DiskCacheError("Journal is not open", ErrorCode.DISK_CACHE_CLOSED);
      }
      await this.journal.appendFile(formatRecord(record));
    });
  }

  /**
   * Write a compact journal for the current state and swap it in
   */
  private rebuildJournal(): Promise<void> {
    return this.enqueueJournal(async () => {
      if (this.journal) {
        await this.journal.close();
        this.journal = null;
      }

      let content = formatHeader({ appVersion: this.appVersion, valueCount: this.valueCount });
      for (const entry of this.entries.values()) {
        content += entry.currentEditor
          ? formatRecord({ op: "DIRTY", name: entry.name })
          : formatRecord({
              op: "CLEAN",
              name: entry.name,
              expiryTimestamp: entry.expiryTimestamp,
              lengths: entry.lengths,
            });
      }

      const tempPath = join(this.directory, JOURNAL_FILE_TEMP);
      const backupPath = join(this.directory, JOURNAL_FILE_BACKUP);
      await writeFile(tempPath, content);
      if (await pathExists(this.journalPath)) {
        await rename(this.journalPath, backupPath);
      }
      await rename(tempPath, this.journalPath);
      await rm(backupPath, { force: true });

      this.journal = await open(this.journalPath, "a");
      this.redundantOpCount = 0;
    });
  }

  private journalRebuildRequired(): boolean {
    return (
      this.redundantOpCount >= REDUNDANT_OP_COMPACT_THRESHOLD &&
      this.redundantOpCount >= this.entries.size
    );
  }

  private createEntry(name: string): DiskEntry {
    const entry: DiskEntry = {
      name,
      lengths: new Array<number>(this.valueCount).fill(0),
      expiryTimestamp: NEVER_EXPIRES,
      readable: false,
      currentEditor: null,
      sequenceNumber: 0,
    };
    this.entries.set(name, entry);
    return entry;
  }

  private touch(entry: DiskEntry): void {
    this.entries.delete(entry.name);
    this.entries.set(entry.name, entry);
  }

  private ensureOpen(operation: string): void {
    if (this.closed) {
      throw new DiskCacheError("Disk cache is closed", ErrorCode.DISK_CACHE_CLOSED, {
        operation,
        service: "DiskLruCache",
      });
    }
  }

  private entryName(identifier: string): string {
    const name = this.fileNameGenerator.generate(identifier);
    if (!VALID_ENTRY_NAME.test(name)) {
      throw new ValidationError(
        `File name generator produced an invalid name "${name}"`,
        "identifier",
        identifier,
        { service: "DiskLruCache", identifier },
        ErrorCode.INVALID_KEY,
      );
    }
    return name;
  }

  /**
   * Snapshot of the committed record, or null when absent or expired
   */
  async getSnapshot(identifier: string): Promise<Snapshot | null> {
    this.ensureOpen("getSnapshot");
    const entry = this.entries.get(this.entryName(identifier));
    if (!entry || !entry.readable) {
      return null;
    }

    if (entry.expiryTimestamp < this.now()) {
      this.logger.debug("Disk record expired", { operation: "getSnapshot", identifier });
      await this.removeEntry(entry);
      return null;
    }

    const handles: FileHandle[] = [];
    try {
      for (let slot = 0; slot < this.valueCount; slot++) {
        handles.push(await open(this.cleanPath(entry.name, slot), "r"));
      }
    } catch (error) {
      await Promise.all(handles.map(handle => handle.close()));
      if (toImageCacheError(error).code === ErrorCode.DISK_CACHE_IO) {
        // File vanished underneath the index
        await this.removeEntry(entry);
        return null;
      }
      throw toImageCacheError(error, { operation: "getSnapshot", identifier });
    }

    const snapshot = new Snapshot(
      entry.name,
      entry.sequenceNumber,
      entry.expiryTimestamp,
      [...entry.lengths],
      handles,
    );

    try {
      this.touch(entry);
      this.redundantOpCount++;
      await this.appendJournal({ op: "READ", name: entry.name });
      if (this.journalRebuildRequired()) {
        await this.rebuildJournal();
      }
    } catch (error) {
      await snapshot.close();
      throw toImageCacheError(error, { operation: "getSnapshot", identifier });
    }
    return snapshot;
  }

  /**
   * Start an edit, or return null when the record is already being edited
   */
  async beginEdit(identifier: string): Promise<Editor | null> {
    this.ensureOpen("beginEdit");
    const name = this.entryName(identifier);
    const entry = this.entries.get(name) ?? this.createEntry(name);
    if (entry.currentEditor) {
      return null;
    }

    const dirtyPaths = entry.lengths.map((_, slot) => this.dirtyPath(name, slot));
    const editor = new Editor(name, dirtyPaths, NEVER_EXPIRES, (current, success) =>
      this.completeEdit(entry, current, success),
    );
    // Claimed before the first await so a concurrent caller sees it as busy
    entry.currentEditor = editor;

    try {
      await this.appendJournal({ op: "DIRTY", name });
    } catch (error) {
      entry.currentEditor = null;
      if (!entry.readable) {
        this.entries.delete(name);
      }
      throw toImageCacheError(error, { operation: "beginEdit", identifier });
    }
    return editor;
  }

  private async completeEdit(entry: DiskEntry, editor: Editor, success: boolean): Promise<void> {
    if (entry.currentEditor !== editor) {
      throw new DiskCacheError(`Edit of ${entry.name} is no longer current`);
    }

    let failureCause: unknown = null;
    let publish = success;
    if (publish) {
      try {
        if (!entry.readable) {
          for (let slot = 0; slot < this.valueCount; slot++) {
            if (!editor.hasWritten(slot)) {
              throw new DiskCacheError(
                `New record ${entry.name} did not write slot ${slot}`,
                ErrorCode.DISK_CACHE_INCOMPLETE_EDIT,
              );
            }
          }
        }
        await editor.flushStreams();
        await this.publishFiles(entry, editor);
      } catch (error) {
        failureCause = error;
        publish = false;
      }
    }

    if (!publish) {
      await editor.destroyStreams();
      await this.discardFiles(entry);
    }

    entry.currentEditor = null;
    this.redundantOpCount++;

    if (entry.readable || publish) {
      entry.readable = true;
      if (publish) {
        entry.expiryTimestamp = editor.getEntryExpiryTimestamp();
        entry.sequenceNumber = this.nextSequenceNumber++;
        this.touch(entry);
      }
      await this.appendJournal({
        op: "CLEAN",
        name: entry.name,
        expiryTimestamp: entry.expiryTimestamp,
        lengths: entry.lengths,
      });
    } else {
      this.entries.delete(entry.name);
      await this.appendJournal({ op: "REMOVE", name: entry.name });
    }

    if (this.currentSize > this.maxSize) {
      await this.trimToSize();
    }
    if (this.journalRebuildRequired()) {
      await this.rebuildJournal();
    }

    if (failureCause !== null) {
      throw toImageCacheError(failureCause, { operation: "commit", service: "DiskLruCache" });
    }
  }

  private async publishFiles(entry: DiskEntry, editor: Editor): Promise<void> {
    for (let slot = 0; slot < this.valueCount; slot++) {
      if (!editor.hasWritten(slot)) continue;

      const cleanPath = this.cleanPath(entry.name, slot);
      await rename(this.dirtyPath(entry.name, slot), cleanPath);
      const { size } = await stat(cleanPath);
      this.currentSize += size - (entry.lengths[slot] ?? 0);
      entry.lengths[slot] = size;
    }
  }

  private async discardFiles(entry: DiskEntry): Promise<void> {
    for (let slot = 0; slot < this.valueCount; slot++) {
      await rm(this.dirtyPath(entry.name, slot), { force: true, recursive: true });
      if (!entry.readable) {
        // A first edit that failed halfway may have renamed some slots already
        await rm(this.cleanPath(entry.name, slot), { force: true });
        this.currentSize -= entry.lengths[slot] ?? 0;
        entry.lengths[slot] = 0;
      }
    }
  }

  private async removeEntry(entry: DiskEntry): Promise<boolean> {
    if (entry.currentEditor) {
      return false;
    }

    for (let slot = 0; slot < this.valueCount; slot++) {
      await rm(this.cleanPath(entry.name, slot), { force: true });
      this.currentSize -= entry.lengths[slot] ?? 0;
      entry.lengths[slot] = 0;
    }

    this.redundantOpCount++;
    this.entries.delete(entry.name);
    await this.appendJournal({ op: "REMOVE", name: entry.name });

    if (this.journalRebuildRequired()) {
      await this.rebuildJournal();
    }
    return true;
  }

  /**
   * Drop the record of identifier. Returns false when there is none or it
   * is being edited.
   */
  async remove(identifier: string): Promise<boolean> {
    this.ensureOpen("remove");
    const entry = this.entries.get(this.entryName(identifier));
    if (!entry) {
      return false;
    }
    return this.removeEntry(entry);
  }

  private async trimToSize(): Promise<void> {
    while (this.currentSize > this.maxSize) {
      let victim: DiskEntry | undefined;
      for (const entry of this.entries.values()) {
        if (entry.readable && !entry.currentEditor) {
          victim = entry;
          break;
        }
      }
      if (!victim) break;

      this.logger.debug("Evicting disk record", {
        operation: "trimToSize",
        metadata: { name: victim.name, size: this.currentSize, maxSize: this.maxSize },
      });
      await this.removeEntry(victim);
    }
  }

  /**
   * Path of a committed blob, or null when the record is absent
   */
  getCacheFile(identifier: string, slot: number): string | null {
    if (this.closed || !Number.isInteger(slot) || slot < 0 || slot >= this.valueCount) {
      return null;
    }
    const name = this.entryName(identifier);
    const entry = this.entries.get(name);
    return entry?.readable ? this.cleanPath(name, slot) : null;
  }

  getExpiryTimestamp(identifier: string): number | null {
    const entry = this.entries.get(this.entryName(identifier));
    return entry?.readable ? entry.expiryTimestamp : null;
  }

  setFileNameGenerator(generator: DiskCacheFileNameGenerator): void {
    this.fileNameGenerator = generator;
  }

  async setMaxSize(maxSize: number): Promise<void> {
    DiskLruCache.validateMaxSize(maxSize);
    this.maxSize = maxSize;
    if (!this.closed) {
      await this.trimToSize();
    }
  }

  getMaxSize(): number {
    return this.maxSize;
  }

  /**
   * Bytes used by committed records
   */
  size(): number {
    return this.currentSize;
  }

  getDirectory(): string {
    return this.directory;
  }

  getStats(): DiskCacheStats {
    let entryCount = 0;
    for (const entry of this.entries.values()) {
      if (entry.readable) entryCount++;
    }
    return {
      directory: this.directory,
      entryCount,
      size: this.currentSize,
      maxSize: this.maxSize,
    };
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Trim to capacity and sync the journal to storage
   */
  async flush(): Promise<void> {
    this.ensureOpen("flush");
    await this.trimToSize();
    await this.enqueueJournal(async () => {
      await this.journal?.sync();
    });
  }

  /**
   * Abort in-flight edits and close the journal
   */
  async close(): Promise<void> {
    if (this.closed) return;

    for (const entry of Array.from(this.entries.values())) {
      if (entry.currentEditor) {
        await entry.currentEditor.abort();
      }
    }
    await this.trimToSize();

    this.closed = true;
    await this.enqueueJournal(async () => {
      if (this.journal) {
        await this.journal.close();
        this.journal = null;
      }
    });
  }

  /**
   * Close the store and delete its directory with every record in it
   */
  async delete(): Promise<void> {
    await this.close();
    await rm(this.directory, { recursive: true, force: true });
    this.entries.clear();
    this.currentSize = 0;
  }
}
