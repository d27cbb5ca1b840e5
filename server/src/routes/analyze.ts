// ============================================================
// POST /analyze
// Accepts a multipart image upload, runs it through the selected
// provider, and returns { success, analysis } or { error }
// ============================================================

import { Router } from 'express';
import fs from 'fs-extra';
import { DEFAULT_ANALYSIS_TYPE, DEFAULT_PROVIDER } from '@shared/constants';
import type { AnalysisResult } from '@shared/types';
import type { VisionAnalyzer } from '../../../src/analyzer';
import { mediaTypeFromFilename } from '../../../src/utils/media-type';
import { RequestValidationError } from '../errors';
import { parseImageUpload, type UploadedImage } from '../upload';

export interface AnalyzeRouteDeps {
  analyzer: VisionAnalyzer;
  uploadDir: string;
  maxFileSize: number;
}

type AnalyzeResponseBody = { success: true; analysis: string } | { error: string };

export function toResponseBody(result: AnalysisResult): AnalyzeResponseBody {
  return result.success
    ? { success: true, analysis: result.analysis }
    : { error: result.error };
}

/** Best-effort removal of the transient upload; failures are only logged */
async function removeUpload(file: UploadedImage): Promise<void> {
  try {
    await fs.remove(file.filePath);
  } catch (err) {
    console.warn(`[analyze] Could not remove ${file.filePath}:`, err instanceof Error ? err.message : err);
  }
}

export function createAnalyzeRouter(deps: AnalyzeRouteDeps): Router {
  const router = Router();

  router.post('/', async (req, res) => {
    let uploaded: UploadedImage | undefined;
    let status = 200;
    let body: AnalyzeResponseBody;

    try {
      await fs.ensureDir(deps.uploadDir);
      const { fields, file } = await parseImageUpload(req, {
        uploadDir: deps.uploadDir,
        maxFileSize: deps.maxFileSize,
      });
      uploaded = file;

      const provider = fields['model'] || DEFAULT_PROVIDER;
      const analysisType = fields['analysis_type'] || DEFAULT_ANALYSIS_TYPE;

      console.log(
        `[analyze] file=${file.filename}, size=${Math.round(file.size / 1024)}KB, ` +
          `model=${provider}, analysisType=${analysisType}`,
      );

      const result = await deps.analyzer.analyze({
        image: await fs.readFile(file.filePath),
        mediaType: mediaTypeFromFilename(file.filename),
        provider,
        analysisType,
        customPrompt: fields['prompt'],
      });
      body = toResponseBody(result);
    } catch (err) {
      if (err instanceof RequestValidationError) {
        status = err.status;
        body = { error: err.message };
      } else {
        const message = err instanceof Error ? err.message : String(err);
        console.error('[analyze] Error:', message);
        status = 500;
        body = { error: message };
      }
    } finally {
      if (uploaded) {
        await removeUpload(uploaded);
      }
    }

    res.status(status).json(body);
  });

  return router;
}
