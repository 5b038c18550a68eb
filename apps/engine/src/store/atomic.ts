import { randomUUID } from 'node:crypto';
import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { StorageError, toErrorMessage } from '../errors';

/** Replaces `file` with `content` via write-to-temp + rename. */
export async function writeFileAtomic(file: string, content: string): Promise<void> {
  const tmp = path.join(path.dirname(file), `.${path.basename(file)}.${randomUUID()}.tmp`);
  try {
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(tmp, content, 'utf-8');
    await rename(tmp, file);
  } catch (err) {
    // The original error is what gets reported.
    await rm(tmp, { force: true }).catch(() => undefined);
    throw new StorageError(`Failed to write ${file}: ${toErrorMessage(err)}`, file, { cause: err });
  }
}
