// ============================================================
// Vision Analyzer - Media Type Resolution
// Maps file names to the MIME types the providers accept
// ============================================================

import path from 'node:path';
import { DEFAULT_MEDIA_TYPE, MEDIA_TYPES, UPLOAD } from '@shared/constants';
import type { MediaType } from '@shared/types';

/**
 * Resolve the media type from a file name's extension.
 * Unknown or missing extensions fall back to image/jpeg.
 */
export function mediaTypeFromFilename(filename: string): MediaType {
  const ext = path.extname(filename).toLowerCase();
  return MEDIA_TYPES[ext] ?? DEFAULT_MEDIA_TYPE;
}

/** True when the name carries one of the upload extensions */
export function isAllowedImageFile(filename: string): boolean {
  const dot = filename.lastIndexOf('.');
  if (dot === -1) return false;
  return UPLOAD.ALLOWED_EXTENSIONS.has(filename.slice(dot + 1).toLowerCase());
}
