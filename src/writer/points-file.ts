import * as fs from 'node:fs';
import * as path from 'node:path';
import * as readline from 'node:readline';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';

/**
 * Identifies the audit artifact of one run.
 */
export type AuditTarget =
  | { mode: 'daily'; date: string; range: number }
  | { mode: 'live'; date: string; time: string };

/**
 * Canonical (uncompressed) audit file name for a run.
 *
 * @example
 * auditFileName({ mode: 'daily', date: '2025-05-29', range: 2 })
 * // 'date_2025-05-29_Range2.txt'
 */
export function auditFileName(target: AuditTarget): string {
  return target.mode === 'daily'
    ? `date_${target.date}_Range${target.range}.txt`
    : `live_${target.date}_${target.time}.txt`;
}

/**
 * PointsFile - per-run intermediate line protocol file
 *
 * Named by process id so concurrent processes sharing an output directory
 * never collide. Lines are appended while points are built and read back
 * for the batched store write. At run end the file is either retained as a
 * gzip audit artifact or removed.
 */
export class PointsFile {
  private lineCount = 0;

  private constructor(readonly path: string) {}

  /**
   * Create (or truncate) `tmp_<pid>.txt` under `dir`.
   */
  static async create(dir: string, pid: number): Promise<PointsFile> {
    await fs.promises.mkdir(dir, { recursive: true });
    const file = new PointsFile(path.join(dir, `tmp_${pid}.txt`));
    await fs.promises.writeFile(file.path, '', 'utf-8');
    return file;
  }

  get lines(): number {
    return this.lineCount;
  }

  async append(lines: string[]): Promise<void> {
    if (lines.length === 0) return;
    await fs.promises.appendFile(this.path, `${lines.join('\n')}\n`, 'utf-8');
    this.lineCount += lines.length;
  }

  /**
   * Stream the file back one line at a time.
   */
  async *read(): AsyncGenerator<string> {
    const input = fs.createReadStream(this.path, { encoding: 'utf-8' });
    const reader = readline.createInterface({ input, crlfDelay: Infinity });
    try {
      for await (const line of reader) {
        yield line;
      }
    } finally {
      reader.close();
      input.destroy();
    }
  }

  /**
   * Rename to the canonical audit name, gzip in place and drop the
   * uncompressed copy.
   *
   * @returns path of the `.gz` artifact
   */
  async retain(target: AuditTarget): Promise<string> {
    const finalPath = path.join(path.dirname(this.path), auditFileName(target));
    await fs.promises.rename(this.path, finalPath);

    const gzipPath = `${finalPath}.gz`;
    await pipeline(
      fs.createReadStream(finalPath),
      createGzip(),
      fs.createWriteStream(gzipPath),
    );
    await fs.promises.unlink(finalPath);
    return gzipPath;
  }

  async discard(): Promise<void> {
    await fs.promises.rm(this.path, { force: true });
  }
}
