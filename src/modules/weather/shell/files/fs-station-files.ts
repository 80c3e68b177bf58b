/**
 * File-system station file source.
 */

import { createReadStream } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';

import { ok, err, type Result } from 'neverthrow';

import { createFileReadError, type FileReadError } from '../../core/errors.js';

import type { PathKind, StationFileSource } from '../../core/ports.js';

const LINE_BREAK = /\r?\n/;

const isNotFound = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

class FsStationFileSource implements StationFileSource {
  async inspect(target: string): Promise<Result<PathKind | null, FileReadError>> {
    try {
      const stats = await stat(target);
      return ok(stats.isDirectory() ? 'directory' : 'file');
    } catch (error) {
      if (isNotFound(error)) {
        return ok(null);
      }
      return err(createFileReadError(target, error));
    }
  }

  async listDataFiles(dir: string, extension: string): Promise<Result<string[], FileReadError>> {
    try {
      const names = await readdir(dir);
      return ok(
        names
          .filter((name) => name.endsWith(extension))
          .sort()
          .map((name) => path.join(dir, name))
      );
    } catch (error) {
      return err(createFileReadError(dir, error));
    }
  }

  async *readLines(filePath: string): AsyncGenerator<Result<string, FileReadError>> {
    const chunks: AsyncIterable<string> = createReadStream(filePath, { encoding: 'utf8' });
    // Text after the last line break, completed by the next chunk
    let pending = '';

    try {
      for await (const chunk of chunks) {
        const parts = `${pending}${chunk}`.split(LINE_BREAK);
        pending = parts.pop() ?? '';
        for (const line of parts) {
          yield ok(line);
        }
      }
    } catch (error) {
      yield err(createFileReadError(filePath, error));
      return;
    }

    if (pending !== '') {
      yield ok(pending);
    }
  }
}

export const makeFsStationFileSource = (): StationFileSource => {
  return new FsStationFileSource();
};
