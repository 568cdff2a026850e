/**
 * Coded dataset: session-scoped, append-only table of accepted records.
 * Rows are frozen on append; there is no update or delete of a single row, only a full clear.
 *
 * Appends are synchronous, so the event loop is the single writer; concurrent requests cannot interleave an append.
 */

import { Parser } from "json2csv";
import { FIELD_KEYS } from "../pipeline/registry/index.js";
import type { CodingRecord } from "../pipeline/normalizer/index.js";

export type DatasetEntry = Readonly<{
  record: Readonly<CodingRecord>;
  acceptedBy: string;
  acceptedAt: string;
}>;

export class CodedDataset {
  private entries: DatasetEntry[] = [];

  append(record: CodingRecord, acceptedBy: string, acceptedAt: Date = new Date()): DatasetEntry {
    const entry: DatasetEntry = Object.freeze({
      record: Object.freeze({ ...record }),
      acceptedBy,
      acceptedAt: acceptedAt.toISOString(),
    });
    this.entries.push(entry);
    return entry;
  }

  get size(): number {
    return this.entries.length;
  }

  rows(): ReadonlyArray<Readonly<CodingRecord>> {
    return this.entries.map((e) => e.record);
  }

  clear(): void {
    this.entries = [];
  }

  /** Field mappings in canonical key order (JSON records export). */
  toJsonRecords(): CodingRecord[] {
    return this.entries.map((e) => ({ ...e.record }));
  }

  /** Header line plus one line per row, canonical column order. */
  toCsv(): string {
    const parser = new Parser<CodingRecord>({ fields: [...FIELD_KEYS], eol: "\n" });
    return parser.parse(this.toJsonRecords());
  }
}
