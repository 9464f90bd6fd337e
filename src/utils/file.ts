import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { FileAttachment } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from './wrap.js';

/**
 * Reads a file from disk into an attachment for multipart upload. The part is
 * named after the file's base name.
 * @example
 * const [err, file] = await fileFromPath('./jingle.mp3');
 */
export async function fileFromPath(path: string, mimeType = 'audio/mpeg'): SafeWrapAsync<Error, FileAttachment> {
  const [err, content] = await safeWrapAsync(() => readFile(path));
  if (err) {
    return [new Error(`error reading upload file ${path}`, { cause: err }), null];
  }

  return [null, { filename: basename(path), content, mimeType }];
}
