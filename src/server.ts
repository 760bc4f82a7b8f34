import 'dotenv/config';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import { router as healthRouter } from './routes/health.js';
import { createRunsRouter } from './routes/runs.js';
import { errorHandler } from './middleware/error-handler.js';
import { loadConfig } from './config.js';
import { PgRunStore } from './services/run-store.js';
import { RunQueue } from './services/run-queue.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
// src/ under tsx, dist/src/ once built
const openApiPath =
  [path.resolve(currentDir, '../openapi/openapi.yaml'), path.resolve(currentDir, '../../openapi/openapi.yaml')].find(
    (candidate) => existsSync(candidate)
  ) ?? path.resolve(currentDir, '../openapi/openapi.yaml');
const openApiDocument = z.record(z.unknown()).parse(YAML.parse(readFileSync(openApiPath, 'utf8')));

// Fail at boot on a broken ETL_* environment or config file.
loadConfig();

const store = new PgRunStore();
const queue = new RunQueue(store);

const app = express();
app.set('trust proxy', true);
app.use(helmet());
app.use(cors());
app.use(express.json());
app.use(morgan('combined'));

app.use('/api/v1/health', healthRouter);

app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
app.get('/api/v1/openapi.json', (_req, res) => {
  res.json(openApiDocument);
});

app.use('/api/v1/runs', createRunsRouter(queue, store));

app.use(errorHandler);

const port = Number(process.env.API_PORT || 8080);

queue
  .initialize()
  .then(() => {
    app.listen(port, () => {
      console.log(`[api] up on :${port}`);
    });
  })
  .catch((error: unknown) => {
    console.error('[api] failed to start run queue:', error);
    process.exitCode = 1;
  });
