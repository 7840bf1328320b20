import { createHash, randomUUID } from 'node:crypto';
import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RawResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { type CacheStore, deserializeEntry, isExpired, serializeEntry } from './store.js';

/** Options for {@link FileStore} */
export interface FileStoreOptions {
  /** Directory holding one `<key>.json` file per entry; created on first write. */
  directory: string;
  /** Entry time to live in milliseconds; entries never expire when omitted. */
  ttl?: number;
}

const isMissing = (err: Error) => 'code' in err && err.code === 'ENOENT';

/**
 * On-disk cache store.
 *
 * Writes land in a temp file that is renamed into place, so readers never see a
 * partial entry and concurrent writers of one key leave the last complete file.
 */
export class FileStore implements CacheStore {
  #directory: string;
  #ttl: number | undefined;

  constructor({ directory, ttl }: FileStoreOptions) {
    this.#directory = directory;
    this.#ttl = ttl;
  }

  #path(key: string): string {
    const name = /^[A-Za-z0-9_-]{1,128}$/.test(key) ? key : createHash('sha256').update(key).digest('hex');
    return join(this.#directory, `${name}.json`);
  }

  async get(key: string): SafeWrapAsync<Error, RawResponse | null> {
    const path = this.#path(key);
    const [errRead, text] = await safeWrapAsync(() => readFile(path, 'utf8'));
    if (errRead) {
      if (isMissing(errRead)) {
        return [null, null];
      }

      return [new Error(`error reading cache file ${path}`, { cause: errRead }), null];
    }

    const [errEntry, entry] = deserializeEntry(text);
    if (errEntry) {
      return [new Error(`error decoding cache file ${path}`, { cause: errEntry }), null];
    }

    if (isExpired(entry.storedAt, this.#ttl)) {
      const [errDelete] = await this.delete(key);
      if (errDelete) {
        return [errDelete, null];
      }

      return [null, null];
    }

    return [null, entry.value];
  }

  async put(key: string, value: RawResponse): SafeWrapAsync<Error, void> {
    const path = this.#path(key);
    const temp = `${path}.${randomUUID()}.tmp`;
    const [errWrite] = await safeWrapAsync(async () => {
      await mkdir(this.#directory, { recursive: true });
      await writeFile(temp, serializeEntry({ key, value, storedAt: Date.now() }), 'utf8');
      await rename(temp, path);
    });

    if (errWrite) {
      await safeWrapAsync(() => rm(temp, { force: true }));
      return [new Error(`error writing cache file ${path}`, { cause: errWrite }), null];
    }

    return [null, undefined];
  }

  async delete(key: string): SafeWrapAsync<Error, void> {
    const path = this.#path(key);
    const [errRemove] = await safeWrapAsync(() => rm(path, { force: true }));
    if (errRemove) {
      return [new Error(`error removing cache file ${path}`, { cause: errRemove }), null];
    }

    return [null, undefined];
  }

  async clear(): SafeWrapAsync<Error, void> {
    const [errList, names] = await safeWrapAsync(() => readdir(this.#directory));
    if (errList) {
      return isMissing(errList)
        ? [null, undefined]
        : [new Error(`error listing cache directory ${this.#directory}`, { cause: errList }), null];
    }

    const [errRemove] = await safeWrapAsync(() =>
      Promise.all(
        names.filter((name) => name.endsWith('.json')).map((name) => rm(join(this.#directory, name), { force: true })),
      ),
    );
    if (errRemove) {
      return [new Error(`error clearing cache directory ${this.#directory}`, { cause: errRemove }), null];
    }

    return [null, undefined];
  }
}
