import { once } from 'node:events';
import { createWriteStream, WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';

export interface VerdictRow {
  post_id: string;
  title: string;
  verdict: string;
  ground_truth_label: string;
}

export const HEADER: ReadonlyArray<keyof VerdictRow> = ['post_id', 'title', 'verdict', 'ground_truth_label'];

export class CsvStreamWriter {
  private failure: Error | undefined;

  private constructor(private readonly destination: string, private readonly stream: WriteStream) {
    // The first stream error is held and rethrown by writeRow and close.
    stream.on('error', (error) => {
      if (!this.failure) {
        this.failure = error;
      }
    });
  }

  static async create(destination: string): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    stream.write(`${HEADER.join(',')}\n`);
    return new CsvStreamWriter(destination, stream);
  }

  async writeRow(row: VerdictRow): Promise<void> {
    this.throwIfFailed();
    if (!this.stream.write(`${formatCsvLine(row)}\n`)) {
      // Rejects if the stream emits 'error' before it drains.
      await once(this.stream, 'drain');
    }
  }

  async close(): Promise<void> {
    this.throwIfFailed();
    this.stream.end();
    await finished(this.stream);
  }

  get path(): string {
    return this.destination;
  }

  private throwIfFailed(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

export function formatCsvLine(row: VerdictRow): string {
  return HEADER.map((key) => csvEscape(row[key])).join(',');
}

// Line breaks stay inside the quoted field so titles survive a read back unchanged.
export function csvEscape(value: string): string {
  const needsQuotes = /[",\r\n]/.test(value);
  const sanitized = value.replace(/"/g, '""');
  return needsQuotes ? `"${sanitized}"` : sanitized;
}
