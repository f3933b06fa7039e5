/**
 * Raw Upload Storage
 *
 * Saves uploaded bytes under a caller-supplied prefix so uploads from
 * different owners never collide, and deletes them again.
 */

import { createWriteStream } from 'node:fs';
import { mkdir, rm } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { ProcessingErrorCode, wrapError } from '../errors/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import { generateStoredFilename, validateFilename } from '../processor/file-utils.js';
import type { FileUpload } from '../processor/types.js';

const defaultLogger = createLogger('storage');

/**
 * Write an upload to `<directory>/<prefix>-<name>`
 *
 * The directory is created if missing. A partially written file is removed
 * when the copy fails.
 *
 * @returns the stored path
 * @throws {ValidationError} when the filename or prefix is invalid
 */
export async function saveUploadToDirectory(
  upload: FileUpload,
  directory: string,
  prefix: string,
  logger: Logger = defaultLogger
): Promise<string> {
  const filename = basename(upload.filename.replace(/\\/g, '/'));
  validateFilename(filename);
  const storedName = generateStoredFilename(prefix, filename);
  validateFilename(storedName);

  const storedPath = join(directory, storedName);

  try {
    await mkdir(directory, { recursive: true });
    await pipeline(Readable.from(upload.open()), createWriteStream(storedPath));
  } catch (error) {
    await rm(storedPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn('Failed to remove partial upload', {
        path: storedPath,
        reason: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw wrapError(error, 'failed to save file', ProcessingErrorCode.IO_ERROR, { filename });
  }

  logger.debug('Stored upload', { path: storedPath, size: upload.size });
  return storedPath;
}

/**
 * Remove a stored file. A file that does not exist is not an error.
 */
export async function deleteStoredFile(path: string, logger: Logger = defaultLogger): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (error) {
    throw wrapError(error, 'failed to delete file', ProcessingErrorCode.IO_ERROR, {
      filename: basename(path),
    });
  }
  logger.debug('Deleted stored file', { path });
}
