import { appendFile, mkdir, open, readFile, type FileHandle } from 'node:fs/promises';
import path from 'node:path';

import {
  checkResultSchema,
  parseJsonLines,
  parseTimestamp,
  serializeStoredJson,
  SECONDS_PER_DAY,
  utcDateKey,
  utcDayStart,
  type CheckResult,
} from '@pulsewatch/records';

import { isErrnoCode, StorageError, toErrorMessage } from '../errors';
import type { Logger } from '../logger';

export interface ResultReader {
  /** Records of one check with `fromSec <= timestamp < toSec`, oldest first. */
  readRange(checkId: string, fromSec: number, toSec: number): Promise<CheckResult[]>;
}

export interface ResultStore extends ResultReader {
  append(result: CheckResult): Promise<void>;
}

// Serialized records always start with this; a torn write leaves a prefix of a record line.
const RECORD_PREFIX = '{"check_id":';

function isTornFragment(text: string): boolean {
  return text.startsWith(RECORD_PREFIX) || RECORD_PREFIX.startsWith(text);
}

/** True when `file` exists, is non-empty and does not end in a newline. */
async function endsMidLine(file: string): Promise<boolean> {
  let handle: FileHandle;
  try {
    handle = await open(file, 'r');
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return false;
    throw err;
  }
  try {
    const { size } = await handle.stat();
    if (size === 0) return false;
    const last = Buffer.alloc(1);
    await handle.read(last, 0, 1, size - 1);
    return last[0] !== 0x0a;
  } finally {
    await handle.close();
  }
}

/**
 * Append-only JSONL store partitioned per check and UTC day:
 * `<dataDir>/<check_id>/<YYYY-MM>/<YYYY-MM-DD>.jsonl`.
 */
export class FileResultStore implements ResultStore {
  // Tail of the pending write chain per partition file.
  private readonly writeQueues = new Map<string, Promise<void>>();

  constructor(
    private readonly dataDir: string,
    private readonly logger?: Logger,
  ) {}

  partitionPath(checkId: string, unixSeconds: number): string {
    const date = utcDateKey(unixSeconds);
    return path.join(this.dataDir, checkId, date.slice(0, 7), `${date}.jsonl`);
  }

  async append(result: CheckResult): Promise<void> {
    let line: string;
    let file: string;
    try {
      line = `${serializeStoredJson(checkResultSchema, result, { source: 'check_result' })}\n`;
      file = this.partitionPath(result.check_id, parseTimestamp(result.timestamp));
    } catch (err) {
      throw new StorageError(`Refusing to append invalid record: ${toErrorMessage(err)}`, this.dataDir, {
        cause: err,
      });
    }

    await this.enqueue(file, async () => {
      try {
        await mkdir(path.dirname(file), { recursive: true });
        // Keep a torn fragment left by a killed process on a line of its own.
        const prefix = (await endsMidLine(file)) ? '\n' : '';
        if (prefix) this.logger?.warn({ file }, 'result store: closing torn trailing line');
        await appendFile(file, `${prefix}${line}`, { encoding: 'utf-8', flag: 'a' });
      } catch (err) {
        throw new StorageError(`Failed to append to ${file}: ${toErrorMessage(err)}`, file, { cause: err });
      }
    });
  }

  async readRange(checkId: string, fromSec: number, toSec: number): Promise<CheckResult[]> {
    if (!(toSec > fromSec)) return [];

    const rows: Array<{ at: number; record: CheckResult }> = [];
    for (let day = utcDayStart(fromSec); day < toSec; day += SECONDS_PER_DAY) {
      const file = this.partitionPath(checkId, day);
      for (const record of await this.readPartition(file)) {
        if (record.check_id !== checkId) continue;
        const at = parseTimestamp(record.timestamp);
        if (at >= fromSec && at < toSec) rows.push({ at, record });
      }
    }

    // Array#sort is stable, so same-second records keep their append order.
    rows.sort((a, b) => a.at - b.at);
    return rows.map((r) => r.record);
  }

  private async readPartition(file: string): Promise<CheckResult[]> {
    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return [];
      throw new StorageError(`Failed to read ${file}: ${toErrorMessage(err)}`, file, { cause: err });
    }

    const records: CheckResult[] = [];
    for (const entry of parseJsonLines(checkResultSchema, content, file)) {
      if (entry.ok) {
        records.push(entry.value);
        continue;
      }
      const torn = !entry.terminated || (entry.error.problem === 'syntax' && isTornFragment(entry.text));
      if (!torn) {
        throw new StorageError(entry.error.message, file, { cause: entry.error });
      }
      this.logger?.warn({ file, line: entry.line }, 'result store: skipping torn line');
    }

    return records;
  }

  private enqueue(key: string, task: () => Promise<void>): Promise<void> {
    const prev = this.writeQueues.get(key) ?? Promise.resolve();
    const next = prev.then(task);
    // The caller observes failures through `next`; the queue only needs ordering.
    this.writeQueues.set(
      key,
      next.catch(() => undefined),
    );
    return next;
  }
}
