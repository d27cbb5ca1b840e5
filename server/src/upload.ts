// ============================================================
// Vision Analyzer - Multipart Image Upload
// Streams the "image" part to a transient file with busboy
// ============================================================

import crypto from 'node:crypto';
import path from 'node:path';
import type { IncomingHttpHeaders } from 'node:http';
import type { Readable } from 'node:stream';
import busboy from 'busboy';
import fs from 'fs-extra';
import { isAllowedImageFile } from '../../src/utils/media-type';
import { RequestValidationError } from './errors';

export const IMAGE_FIELD = 'image';

export interface UploadedImage {
  /** Client-supplied file name, used for the media type */
  filename: string;
  /** Transient location on disk */
  filePath: string;
  size: number;
}

export interface ParsedUpload {
  fields: Record<string, string>;
  file: UploadedImage;
}

type WriteOutcome = { ok: true; file: UploadedImage } | { ok: false; error: unknown };

export interface UploadOptions {
  uploadDir: string;
  maxFileSize: number;
}

/** A readable request carrying its headers (express Request or http.IncomingMessage) */
export interface UploadRequest extends Readable {
  headers: IncomingHttpHeaders;
}

const MB = 1024 * 1024;

function formatLimit(bytes: number): string {
  return bytes >= MB ? `${Math.floor(bytes / MB)}MB` : `${bytes} bytes`;
}

function sanitizeFileName(name: string): string {
  const base = path.basename(name).replace(/[^A-Za-z0-9._-]/g, '_');
  return base.replace(/^\.+/, '') || 'upload';
}

async function removeQuietly(filePath: string): Promise<void> {
  try {
    await fs.remove(filePath);
  } catch (err) {
    console.warn('[upload] Could not remove rejected file:', err);
  }
}

/**
 * Parses a multipart/form-data request holding one image file.
 *
 * Rejects with RequestValidationError when the image part is missing, has
 * an empty or disallowed file name, or exceeds `maxFileSize`. The transient
 * file is already removed in every rejected case; on success the caller owns it.
 */
export function parseImageUpload(req: UploadRequest, opts: UploadOptions): Promise<ParsedUpload> {
  return new Promise((resolve, reject) => {
    let bb: busboy.Busboy;
    try {
      bb = busboy({ headers: req.headers, limits: { fileSize: opts.maxFileSize, files: 1 } });
    } catch {
      reject(new RequestValidationError('Expected multipart/form-data'));
      return;
    }

    const fields: Record<string, string> = {};
    let rejection: RequestValidationError | null = null;
    let written: Promise<WriteOutcome> | null = null;
    let failure: unknown;

    bb.on('field', (name, value) => {
      fields[name] = value;
    });

    bb.on('file', (name, file, info) => {
      if (name !== IMAGE_FIELD || written || rejection) {
        file.resume();
        return;
      }
      if (!info.filename) {
        rejection = new RequestValidationError('No file selected');
        file.resume();
        return;
      }
      if (!isAllowedImageFile(info.filename)) {
        rejection = new RequestValidationError('Invalid file type');
        file.resume();
        return;
      }

      const filename = info.filename;
      const filePath = path.join(opts.uploadDir, `${crypto.randomUUID()}-${sanitizeFileName(filename)}`);
      const out = fs.createWriteStream(filePath);
      let size = 0;
      let truncated = false;

      written = new Promise<WriteOutcome>((settle) => {
        // Drop the partial file before reporting the failure
        const discard = (err: unknown): void => {
          out.destroy();
          void removeQuietly(filePath).then(() => settle({ ok: false, error: err }));
        };

        file.on('data', (chunk: Buffer) => {
          size += chunk.length;
        });
        file.on('limit', () => {
          truncated = true;
        });
        file.on('error', discard);
        out.on('error', discard);
        out.on('finish', () => {
          if (truncated) {
            discard(new RequestValidationError(`File too large (max ${formatLimit(opts.maxFileSize)})`, 413));
            return;
          }
          settle({ ok: true, file: { filename, filePath, size } });
        });
        file.pipe(out);
      });
    });

    bb.on('error', (err: unknown) => {
      failure = err instanceof Error ? new RequestValidationError(err.message) : err;
      const error = failure;
      // Answer only once no transient file is left on disk
      if (written) {
        void written
          .then((outcome) => (outcome.ok ? removeQuietly(outcome.file.filePath) : undefined))
          .then(() => reject(error));
      } else {
        reject(error);
      }
    });

    bb.on('close', () => {
      if (failure !== undefined) {
        return;
      }
      if (rejection) {
        reject(rejection);
      } else if (!written) {
        reject(new RequestValidationError('No image file provided'));
      } else {
        void written.then((outcome) => {
          if (outcome.ok) {
            resolve({ fields, file: outcome.file });
          } else {
            reject(outcome.error);
          }
        });
      }
    });

    req.pipe(bb);
  });
}
