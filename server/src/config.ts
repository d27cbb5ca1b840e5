// ============================================================
// Vision Analyzer - Server Configuration
// ============================================================

import os from 'node:os';
import path from 'node:path';
import { SERVER_DEFAULTS, UPLOAD } from '@shared/constants';

export interface ServerConfig {
  port: number;
  /** Folder for transient uploads; files are removed after each request */
  uploadDir: string;
  maxFileSize: number;
}

export function loadServerConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const port = env['PORT'] ? parseInt(env['PORT'], 10) : SERVER_DEFAULTS.PORT;
  return {
    port: Number.isNaN(port) ? SERVER_DEFAULTS.PORT : port,
    uploadDir: env['UPLOAD_DIR'] || path.join(os.tmpdir(), 'vision-analyzer-uploads'),
    maxFileSize: UPLOAD.MAX_FILE_SIZE_BYTES,
  };
}
