import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import fs from 'node:fs';
import path from 'node:path';
import multer from 'multer';

import type { AnalysisService } from './analyzer/runAnalysis.js';
import type { AnalysisKind, UploadedFile } from './analyzer/types.js';
import type { AppConfig } from './config.js';
import { AppError, InputError, PayloadTooLargeError } from './errors.js';
import { Logger } from './logger.js';

export type AppDeps = {
  config: AppConfig;
  analysis: AnalysisService;
  webDistDir?: string;
};

const FAILURE_PREFIX: Record<AnalysisKind, string> = {
  image: 'Image analysis failed',
  code: 'Code analysis failed',
  combined: 'Combined analysis failed',
};

function normalizeError(error: unknown, prefix: string): AppError {
  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') return new PayloadTooLargeError(`Upload too large (field ${error.field ?? '?'})`);
    return new InputError(`${error.message}${error.field ? ` (field ${error.field})` : ''}`);
  }
  return AppError.fromError(error, prefix);
}

function sendError(res: Response, error: unknown, prefix: string): void {
  const appError = normalizeError(error, prefix);
  if (appError.status >= 500) Logger.fail(appError.message);
  else Logger.warn(appError.message);
  res.status(appError.status).json({ ok: false, error: appError.message });
}

function toUpload(file: Express.Multer.File | undefined, field: string): UploadedFile {
  if (!file) throw new InputError(`Missing required file field: ${field}`);
  if (file.size === 0) throw new InputError(`Uploaded file is empty: ${field}`);
  return { fileName: file.originalname, mimeType: file.mimetype, size: file.size, buffer: file.buffer };
}

function requireImage(upload: UploadedFile, field: string): UploadedFile {
  if (!upload.mimeType.startsWith('image/')) {
    throw new InputError(`Unsupported file type for ${field}: ${upload.mimeType || 'unknown'}`);
  }
  return upload;
}

function fieldFile(req: Request, field: string): Express.Multer.File | undefined {
  const files = req.files;
  if (!files || Array.isArray(files)) return undefined;
  return files[field]?.[0];
}

function readContext(req: Request): string | undefined {
  const body: unknown = req.body;
  if (!body || typeof body !== 'object' || !('context' in body)) return undefined;
  const context = body.context;
  return typeof context === 'string' && context.trim() ? context : undefined;
}

function describeUploads(uploads: UploadedFile[]): string {
  return uploads.map((u) => `${u.fileName} (${u.mimeType}, ${u.size} bytes)`).join(', ');
}

export function createApp(deps: AppDeps): express.Express {
  const { config, analysis } = deps;
  const app = express();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.server.maxUploadBytes, files: 2 },
  });

  const origins = config.server.corsOrigins;
  app.use(cors({ origin: origins.includes('*') ? true : origins }));

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/api/analyze/image', upload.single('file'), async (req, res) => {
    const started = Date.now();
    try {
      const image = requireImage(toUpload(req.file, 'file'), 'file');
      Logger.info(`image analysis: ${describeUploads([image])}`);
      const envelope = await analysis.analyzeImage(image);
      Logger.success(`image analysis ${envelope.analysis_id} done in ${Date.now() - started} ms`);
      res.json(envelope);
    } catch (error) {
      sendError(res, error, FAILURE_PREFIX.image);
    }
  });

  app.post('/api/analyze/code', upload.single('code_file'), async (req, res) => {
    const started = Date.now();
    try {
      const codeFile = toUpload(req.file, 'code_file');
      Logger.info(`code analysis: ${describeUploads([codeFile])}`);
      const envelope = await analysis.analyzeCode(codeFile);
      Logger.success(`code analysis ${envelope.analysis_id} done in ${Date.now() - started} ms`);
      res.json(envelope);
    } catch (error) {
      sendError(res, error, FAILURE_PREFIX.code);
    }
  });

  app.post(
    '/api/analyze/combined',
    upload.fields([
      { name: 'image_file', maxCount: 1 },
      { name: 'code_file', maxCount: 1 },
    ]),
    async (req, res) => {
      const started = Date.now();
      try {
        const image = requireImage(toUpload(fieldFile(req, 'image_file'), 'image_file'), 'image_file');
        const codeFile = toUpload(fieldFile(req, 'code_file'), 'code_file');
        Logger.info(`combined analysis: ${describeUploads([image, codeFile])}`);
        const envelope = await analysis.analyzeCombined(image, codeFile, readContext(req));
        Logger.success(`combined analysis ${envelope.analysis_id} done in ${Date.now() - started} ms`);
        res.json(envelope);
      } catch (error) {
        sendError(res, error, FAILURE_PREFIX.combined);
      }
    },
  );

  app.use('/api', (req, res) => {
    res.status(404).json({ ok: false, error: `Unknown endpoint: ${req.method} ${req.originalUrl}` });
  });

  const webDistDir = deps.webDistDir;
  if (webDistDir && fs.existsSync(path.join(webDistDir, 'index.html'))) {
    app.use(express.static(webDistDir));
    app.get('*', (_req, res) => {
      res.sendFile(path.join(webDistDir, 'index.html'));
    });
  }

  // Multer rejects oversized or unexpected uploads before the route handler runs.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    sendError(res, err, 'Request failed');
  });

  return app;
}
