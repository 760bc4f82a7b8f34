import { Router } from 'express';
import multer from 'multer';
import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { rawConfigSchema, type PipelineConfig, type RawConfig } from '../config.js';
import { badRequest, notFound } from '../errors.js';
import type { RunQueue } from '../services/run-queue.js';
import type { RunStore } from '../services/run-store.js';
import { asyncHandler } from '../utils/async-handler.js';

const MAX_FILES = Number(process.env.ETL_MAX_FILES ?? 50);

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    files: MAX_FILES,
    fileSize: Number(process.env.ETL_MAX_FILE_SIZE ?? 1024 * 1024 * 100), // 100MB default
  },
});

const OUTPUT_FILE = 'star-schema.zip';

export function resolveRoot(value: string | undefined, fallback: string): string {
  return value != null && value.trim() !== '' ? path.resolve(value) : path.resolve(process.cwd(), fallback);
}

export function sanitizeSourceFilename(filename: string): string {
  const base = path.basename(filename);
  const safe = base.replace(/[^a-zA-Z0-9._-]/g, '_');
  if (!safe || safe.startsWith('.')) {
    throw badRequest('invalid filename');
  }
  return safe;
}

export function createSessionId(now = new Date()): string {
  return `session-${now.toISOString().replace(/[:.]/g, '-')}-${randomUUID().slice(0, 8)}`;
}

// Multipart fields arrive as strings; `config` may hold a JSON object of snake_case overrides.
const runSchema = z.object({
  config: z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return {};
      try {
        const parsed: unknown = JSON.parse(value);
        return parsed;
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'config must be a JSON object' });
        return z.NEVER;
      }
    })
    .pipe(rawConfigSchema),
});

/**
 * Validates the multipart body and resolves its overrides with `check`, which
 * throws ConfigError for combinations the schema alone cannot see.
 */
export function parseRunOverrides(body: unknown, check: (overrides: RawConfig) => PipelineConfig): RawConfig {
  const parsed = runSchema.safeParse(body ?? {});
  if (!parsed.success) {
    throw badRequest('invalid request', parsed.error.flatten());
  }
  check(parsed.data.config);
  return parsed.data.config;
}

type RunsRouterOptions = {
  importRoot?: string;
  outputRoot?: string;
};

export function createRunsRouter(queue: RunQueue, store: RunStore, options: RunsRouterOptions = {}): Router {
  const router = Router();
  const importRoot = options.importRoot ?? resolveRoot(process.env.IMPORT_PATH, 'imports');
  const outputRoot = options.outputRoot ?? resolveRoot(process.env.OUTPUT_PATH, 'output');

  router.post(
    '/',
    upload.array('files', MAX_FILES),
    asyncHandler(async (req, res) => {
      const overrides = parseRunOverrides(req.body, (raw) => queue.checkOverrides(raw));

      const files = Array.isArray(req.files) ? req.files : [];
      if (!files.length) {
        throw badRequest('at least one CSV file is required');
      }

      const sessionId = createSessionId();
      const sessionDir = path.join(importRoot, sessionId);
      await fsp.mkdir(sessionDir, { recursive: true });

      const storedFiles: string[] = [];
      try {
        for (const file of files) {
          if (path.extname(file.originalname).toLowerCase() !== '.csv') {
            throw badRequest(`unsupported file type: ${file.originalname}`);
          }
          const safeName = sanitizeSourceFilename(file.originalname);
          await fsp.writeFile(path.join(sessionDir, safeName), file.buffer);
          storedFiles.push(safeName);
        }
      } catch (error) {
        await fsp.rm(sessionDir, { recursive: true, force: true });
        throw error;
      }

      const destination = path.join(outputRoot, sessionId, OUTPUT_FILE);
      const run = await store.createRun({ sessionId, sessionDir, destination, overrides });
      queue.enqueue({ id: run.id, sessionId, sessionDir, destination, overrides });

      res.status(202).json({
        status: 'queued',
        sessionId,
        runId: run.id,
        files: storedFiles,
        overrides,
        message: 'Run accepted. Processing will run asynchronously.',
      });
    })
  );

  router.get(
    '/:sessionId/status',
    asyncHandler(async (req, res) => {
      const status = await queue.getStatus(req.params.sessionId);
      if (!status) {
        throw notFound('run session not found');
      }
      res.json(status);
    })
  );

  router.get(
    '/:sessionId/report',
    asyncHandler(async (req, res) => {
      const report = await queue.getReport(req.params.sessionId);
      if (!report) {
        throw notFound('run report not available');
      }
      res.download(report.path, report.filename);
    })
  );

  router.get(
    '/:sessionId/output',
    asyncHandler(async (req, res) => {
      const output = await queue.getOutput(req.params.sessionId);
      if (!output) {
        throw notFound('output archive not available');
      }
      res.download(output.path, output.filename);
    })
  );

  return router;
}
