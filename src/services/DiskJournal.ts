import { DiskCacheError, ErrorCode } from "../types/errors.js";

export const JOURNAL_FILE = "journal";
export const JOURNAL_FILE_TEMP = "journal.tmp";
export const JOURNAL_FILE_BACKUP = "journal.bkp";
export const JOURNAL_MAGIC = "tiered-image-cache.journal";
export const JOURNAL_VERSION = "1";

/**
 * Journal lines, one operation per line:
 *
 *   CLEAN <name> <expiry> <length>...   record published (or rewritten)
 *   DIRTY <name>                         edit started, CLEAN or REMOVE follows
 *   REMOVE <name>                        record dropped
 *   READ <name>                          record accessed (recency only)
 */
export type JournalRecord =
  | { op: "CLEAN"; name: string; expiryTimestamp: number; lengths: number[] }
  | { op: "DIRTY"; name: string }
  | { op: "REMOVE"; name: string }
  | { op: "READ"; name: string };

export interface JournalHeader {
  appVersion: number;
  valueCount: number;
}

export interface ParsedJournal {
  records: JournalRecord[];
  /** The last line had no newline: the process died mid-write */
  truncatedTail: boolean;
}

export const VALID_ENTRY_NAME = /^[a-z0-9_-]{1,120}$/;

export function formatHeader(header: JournalHeader): string {
  return [
    JOURNAL_MAGIC,
    JOURNAL_VERSION,
    String(header.appVersion),
    String(header.valueCount),
    "",
  ]
    .map(line => `${line}\n`)
    .join("");
}

export function formatRecord(record: JournalRecord): string {
  if (record.op === "CLEAN") {
    return `CLEAN ${record.name} ${record.expiryTimestamp} ${record.lengths.join(" ")}\n`;
  }
  return `${record.op} ${record.name}\n`;
}

function corrupt(message: string, line?: string): DiskCacheError {
  return new DiskCacheError(message, ErrorCode.DISK_CACHE_CORRUPT_JOURNAL, {
    operation: "readJournal",
    service: "DiskLruCache",
    details: line === undefined ? undefined : { line },
  });
}

function parseInteger(value: string, line: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw corrupt("Journal contains a non-numeric field", line);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw corrupt("Journal contains an out of range number", line);
  }
  return parsed;
}

function parseRecord(line: string, valueCount: number): JournalRecord {
  const parts = line.split(" ");
  const [op, name] = parts;
  if (!name || !VALID_ENTRY_NAME.test(name)) {
    throw corrupt("Journal line has an invalid entry name", line);
  }

  switch (op) {
    case "CLEAN": {
      if (parts.length !== 3 + valueCount) {
        throw corrupt("CLEAN line has the wrong number of lengths", line);
      }
      const expiryTimestamp = parseInteger(parts[2] ?? "", line);
      const lengths = parts.slice(3).map(value => {
        const length = parseInteger(value, line);
        if (length < 0) {
          throw corrupt("CLEAN line has a negative length", line);
        }
        return length;
      });
      return { op, name, expiryTimestamp, lengths };
    }
    case "DIRTY":
    case "REMOVE":
    case "READ":
      if (parts.length !== 2) {
        throw corrupt(`${op} line has unexpected fields`, line);
      }
      return { op, name };
    default:
      throw corrupt("Journal line has an unknown operation", line);
  }
}

/**
 * Parse journal text, validating the header against the expected one
 */
export function parseJournal(content: string, expected: JournalHeader): ParsedJournal {
  const lines = content.split("\n");
  const truncatedTail = lines[lines.length - 1] !== "";
  if (!truncatedTail) {
    lines.pop();
  }

  const [magic, version, appVersion, valueCount, blank] = lines;
  if (
    magic !== JOURNAL_MAGIC ||
    version !== JOURNAL_VERSION ||
    appVersion !== String(expected.appVersion) ||
    valueCount !== String(expected.valueCount) ||
    blank !== ""
  ) {
    throw corrupt("Journal header does not match", [magic, version, appVersion, valueCount, blank].join(","));
  }

  const body = lines.slice(5);
  // A torn final line is dropped rather than treated as corruption
  const complete = truncatedTail ? body.slice(0, -1) : body;
  return {
    records: complete.map(line => parseRecord(line, expected.valueCount)),
    truncatedTail,
  };
}
