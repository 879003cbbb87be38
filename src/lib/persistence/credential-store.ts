/**
 * Credential persistence
 *
 * Writes are all-or-nothing: content goes to a temporary file beside the target,
 * which is then moved into place. A failed or cancelled run leaves no partial file.
 */

import { randomBytes } from 'crypto';
import { link, mkdir, rename, rm, unlink, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';

import { CREDENTIALS_FILE_MODE } from '../constants/defaults.js';
import {
  formatCredentials,
  type AccountCredentials,
  type CredentialsFormat,
} from '../core/credentials.js';
import { PersistenceError } from '../errors/registration-errors.js';
import { debugStore } from '../utils/debug.js';

export interface SaveCredentialsOptions {
  path: string;
  format: CredentialsFormat;
  /** Replace an existing file at `path` */
  overwrite?: boolean;
}

/**
 * Destination for finished credentials
 */
export interface CredentialStore {
  save(credentials: AccountCredentials, options: SaveCredentialsOptions): Promise<void>;
}

// fs errors come from Node's own realm, so `instanceof Error` is not reliable
function errorCode(err: unknown): unknown {
  return typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
}

/**
 * File-system credential store, files written with mode 0600
 *
 * Without `overwrite` the temp file is hard-linked to the target, which fails if
 * any file exists there at that moment; with it the temp file is renamed over it.
 */
export class FileCredentialStore implements CredentialStore {
  async save(credentials: AccountCredentials, options: SaveCredentialsOptions): Promise<void> {
    const { path, format, overwrite = false } = options;
    if (!path) {
      throw new PersistenceError('No output path was given.', { context: { path } });
    }

    const tmpPath = join(
      dirname(path),
      `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`,
    );

    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tmpPath, formatCredentials(credentials, format), {
        mode: CREDENTIALS_FILE_MODE,
        flag: 'wx',
      });
      if (overwrite) {
        await rename(tmpPath, path);
      } else {
        await link(tmpPath, path).catch((err: unknown) => {
          throw errorCode(err) === 'EEXIST' ? PersistenceError.exists(path) : err;
        });
        await unlink(tmpPath);
      }
      debugStore('wrote %s format=%s', path, format);
    } catch (err) {
      await this.removeTemp(tmpPath);
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(
        `An error occurred when writing the account credentials to ${path}.`,
        { context: { path }, cause: err },
      );
    }
  }

  private async removeTemp(tmpPath: string): Promise<void> {
    try {
      await rm(tmpPath, { force: true });
    } catch (err) {
      // the original failure is the one reported
      debugStore('could not remove %s: %s', tmpPath, errorCode(err) ?? err);
    }
  }
}
