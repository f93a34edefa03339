import { once } from 'node:events';
import { createWriteStream, WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';

export interface CsvRow {
  comment_id: string;
  fullname: string;
  created_iso: string;
  subreddit: string;
  score: number;
  outcome: string;
  reason: string;
  edit: string;
  delete: string;
  comment_link: string;
}

export const HEADER: ReadonlyArray<keyof CsvRow> = [
  'comment_id',
  'fullname',
  'created_iso',
  'subreddit',
  'score',
  'outcome',
  'reason',
  'edit',
  'delete',
  'comment_link',
];

export class CsvStreamWriter {
  private constructor(private readonly destination: string, private readonly stream: WriteStream) {}

  static async create(destination: string): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    stream.write(`${HEADER.join(',')}\n`);
    return new CsvStreamWriter(destination, stream);
  }

  async writeRow(row: CsvRow): Promise<void> {
    if (!this.stream.write(`${formatCsvLine(row)}\n`)) {
      await waitForDrain(this.stream);
    }
  }

  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream);
  }

  get path(): string {
    return this.destination;
  }
}

export function formatCsvLine(row: CsvRow): string {
  return HEADER.map((key) => csvEscape(String(row[key]))).join(',');
}

/** Resolves on `drain`; rejects if the stream emits `error` first. */
export async function waitForDrain(stream: NodeJS.EventEmitter): Promise<void> {
  await once(stream, 'drain');
}

export function csvEscape(value: string): string {
  const needsQuotes = value.includes(',') || value.includes('\n') || value.includes('"');
  const sanitized = value.replace(/\r?\n/g, ' ').replace(/"/g, '""');
  return needsQuotes ? `"${sanitized}"` : sanitized;
}
