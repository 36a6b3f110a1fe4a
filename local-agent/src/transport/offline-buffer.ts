/**
 * Offline Buffer
 *
 * Samples the collector did not accept are kept as CSV batches:
 * `<dir>/agent_data_<n>.csv`, exactly `batchSize` rows each, with a header.
 *
 * - Files are created exclusively; an existing batch is never overwritten.
 * - Numbering continues after the highest batch already in the directory.
 * - Rows leave memory only once their batch file is written.
 */

import { promises as fs } from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import { flattenSample, type FlatSampleRow, type TelemetrySample } from "@wattlog/shared/telemetry";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("buffer");

const FILE_PATTERN = /^agent_data_(\d+)\.csv$/;

export interface OfflineBufferOptions {
  dir: string;
  /** Rows per file (default: 50) */
  batchSize?: number;
}

/** Header order: first-seen column order across the batch. */
export function collectColumns(rows: FlatSampleRow[]): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}

export function rowsToCsv(rows: FlatSampleRow[]): string {
  // Cells as text so large integers keep every digit
  const textRows = rows.map(row => {
    const text: Record<string, string> = {};
    for (const [key, value] of Object.entries(row)) text[key] = String(value);
    return text;
  });
  const sheet = XLSX.utils.json_to_sheet(textRows, { header: collectColumns(rows) });
  return XLSX.utils.sheet_to_csv(sheet) + "\n";
}

function isFileExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

export class OfflineBuffer {
  private readonly dir: string;
  private readonly batchSize: number;
  private readonly rows: FlatSampleRow[] = [];
  private nextIndex: number | null = null;
  private batches = 0;

  constructor(options: OfflineBufferOptions) {
    this.dir = options.dir;
    this.batchSize = options.batchSize ?? 50;
  }

  /** Rows waiting for a full batch (or for a failed write to be retried). */
  get pending(): number {
    return this.rows.length;
  }

  /** A full batch is waiting, for instance after a failed write. */
  get hasFullBatch(): boolean {
    return this.rows.length >= this.batchSize;
  }

  get flushedBatches(): number {
    return this.batches;
  }

  async add(sample: TelemetrySample): Promise<void> {
    this.rows.push(flattenSample(sample));
    log.debug("Sample buffered", { pending: this.rows.length });
    if (this.rows.length >= this.batchSize) {
      await this.flush();
    }
  }

  /**
   * Write one full batch if there is one. Returns false when there is
   * nothing to write or the write failed; failed rows stay buffered.
   */
  async flush(): Promise<boolean> {
    if (this.rows.length < this.batchSize) return false;

    const batch = this.rows.slice(0, this.batchSize);
    let written: string;
    try {
      written = await this.writeExclusive(rowsToCsv(batch));
    } catch (err) {
      log.error("Failed to write buffer file; rows kept in memory", err, { pending: this.rows.length });
      return false;
    }

    this.rows.splice(0, batch.length);
    this.batches++;
    log.info("Buffer file written", { file: written, rows: batch.length });
    return true;
  }

  private async writeExclusive(content: string): Promise<string> {
    await fs.mkdir(this.dir, { recursive: true });
    let index = this.nextIndex ?? await this.scanNextIndex();

    for (;;) {
      const file = path.join(this.dir, `agent_data_${index}.csv`);
      try {
        await fs.writeFile(file, content, { encoding: "utf8", flag: "wx" });
        this.nextIndex = index + 1;
        return file;
      } catch (err) {
        if (!isFileExists(err)) throw err;
        index++;
      }
    }
  }

  private async scanNextIndex(): Promise<number> {
    const entries = await fs.readdir(this.dir);
    let highest = -1;
    for (const name of entries) {
      const match = name.match(FILE_PATTERN);
      if (match) highest = Math.max(highest, Number(match[1]));
    }
    return highest + 1;
  }
}
