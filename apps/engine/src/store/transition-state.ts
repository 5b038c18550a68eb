import { readFile } from 'node:fs/promises';

import {
  parseStoredJson,
  serializeStoredJson,
  transitionStateSchema,
  type TransitionState,
} from '@pulsewatch/records';

import { isErrnoCode, StorageError, toErrorMessage } from '../errors';
import { writeFileAtomic } from './atomic';

export interface TransitionStateStore {
  /** null when no state has been recorded yet. */
  read(): Promise<TransitionState | null>;
  write(state: TransitionState): Promise<void>;
}

export class FileTransitionStateStore implements TransitionStateStore {
  constructor(private readonly file: string) {}

  async read(): Promise<TransitionState | null> {
    let content: string;
    try {
      content = await readFile(this.file, 'utf-8');
    } catch (err) {
      if (isErrnoCode(err, 'ENOENT')) return null;
      throw new StorageError(`Failed to read ${this.file}: ${toErrorMessage(err)}`, this.file, {
        cause: err,
      });
    }

    try {
      return parseStoredJson(transitionStateSchema, content, this.file);
    } catch (err) {
      throw new StorageError(toErrorMessage(err), this.file, { cause: err });
    }
  }

  async write(state: TransitionState): Promise<void> {
    let content: string;
    try {
      content = serializeStoredJson(transitionStateSchema, state, { source: this.file, pretty: true });
    } catch (err) {
      throw new StorageError(toErrorMessage(err), this.file, { cause: err });
    }
    await writeFileAtomic(this.file, `${content}\n`);
  }
}
