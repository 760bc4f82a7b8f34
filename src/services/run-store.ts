import { rawConfigSchema, type RawConfig } from '../config.js';
import { query, withTransaction } from '../db.js';
import type { LogLevel } from './pipeline.js';

export type RunStatus = 'queued' | 'running' | 'completed' | 'rejected' | 'failed';

export type RunRecord = {
  id: string;
  sessionId: string;
  sessionDir: string;
  destination: string;
  overrides: RawConfig;
  status: RunStatus;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  summary: unknown;
  error: string | null;
  reportPath: string | null;
};

export type RunLogEntry = {
  level: LogLevel;
  message: string;
  createdAt: string;
};

export type NewRun = {
  sessionId: string;
  sessionDir: string;
  destination: string;
  overrides: RawConfig;
};

export type RunCompletion = {
  summary: unknown;
  error: string | null;
  reportPath: string | null;
};

export interface RunStore {
  ensureSchema(): Promise<void>;
  createRun(run: NewRun): Promise<RunRecord>;
  markRunning(id: string): Promise<void>;
  finishRun(id: string, status: RunStatus, completion: RunCompletion, log: { level: LogLevel; message: string }): Promise<void>;
  appendLog(id: string, level: LogLevel, message: string): Promise<void>;
  findBySession(sessionId: string): Promise<RunRecord | null>;
  listLogs(id: string): Promise<RunLogEntry[]>;
  /** Puts runs interrupted mid-flight back in the queue and returns every queued run, oldest first. */
  requeueInterrupted(): Promise<RunRecord[]>;
}

type RunRow = {
  id: string;
  session_id: string;
  session_dir: string;
  destination: string;
  overrides: RawConfig | string | null;
  status: RunStatus;
  created_at: Date | string;
  started_at: Date | string | null;
  finished_at: Date | string | null;
  summary: unknown;
  error_message: string | null;
  report_path: string | null;
};

type LogRow = {
  level: LogLevel;
  message: string;
  created_at: Date | string;
};

const RUN_COLUMNS = `id, session_id, session_dir, destination, overrides, status, created_at, started_at,
  finished_at, summary, error_message, report_path`;

function toIso(value: Date | string | null): string | null {
  if (value == null) return null;
  return value instanceof Date ? value.toISOString() : value;
}

function parseJson(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch (error) {
    return { raw: value, parseError: error instanceof Error ? error.message : String(error) };
  }
}

function mapRun(row: RunRow): RunRecord {
  const overrides = rawConfigSchema.safeParse(parseJson(row.overrides) ?? {});
  return {
    id: row.id,
    sessionId: row.session_id,
    sessionDir: row.session_dir,
    destination: row.destination,
    overrides: overrides.success ? overrides.data : {},
    status: row.status,
    createdAt: toIso(row.created_at) ?? '',
    startedAt: toIso(row.started_at),
    finishedAt: toIso(row.finished_at),
    summary: parseJson(row.summary),
    error: row.error_message,
    reportPath: row.report_path,
  };
}

export class PgRunStore implements RunStore {
  async ensureSchema(): Promise<void> {
    await query(`create extension if not exists pgcrypto`);
    await query(`
      create table if not exists system_etl_run (
        id uuid primary key default gen_random_uuid(),
        session_id text not null unique,
        session_dir text not null,
        destination text not null,
        overrides jsonb not null default '{}'::jsonb,
        status text not null default 'queued'
          check (status in ('queued','running','completed','rejected','failed')),
        created_at timestamptz not null default now(),
        started_at timestamptz,
        finished_at timestamptz,
        summary jsonb,
        error_message text,
        report_path text
      )
    `);
    await query(`
      create table if not exists system_etl_run_log (
        id bigserial primary key,
        run_id uuid not null references system_etl_run(id) on delete cascade,
        level text not null default 'info',
        message text not null,
        created_at timestamptz not null default now()
      )
    `);
    await query(`create index if not exists idx_system_etl_run_status on system_etl_run(status)`);
    await query(`create index if not exists idx_system_etl_run_log_run on system_etl_run_log(run_id, created_at)`);
  }

  async createRun(run: NewRun): Promise<RunRecord> {
    const { rows } = await query<RunRow>(
      `insert into system_etl_run (session_id, session_dir, destination, overrides, status)
       values ($1, $2, $3, $4::jsonb, 'queued')
       returning ${RUN_COLUMNS}`,
      [run.sessionId, run.sessionDir, run.destination, JSON.stringify(run.overrides)]
    );
    return mapRun(rows[0]);
  }

  async markRunning(id: string): Promise<void> {
    await query(`update system_etl_run set status = 'running', started_at = now() where id = $1`, [id]);
  }

  async finishRun(
    id: string,
    status: RunStatus,
    completion: RunCompletion,
    log: { level: LogLevel; message: string }
  ): Promise<void> {
    await withTransaction(async (client) => {
      await query(
        `update system_etl_run
         set status = $2, finished_at = now(), summary = $3::jsonb, error_message = $4, report_path = $5
         where id = $1`,
        [id, status, JSON.stringify(completion.summary ?? null), completion.error, completion.reportPath],
        client
      );
      await query(
        `insert into system_etl_run_log (run_id, level, message) values ($1, $2, $3)`,
        [id, log.level, log.message],
        client
      );
    });
  }

  async appendLog(id: string, level: LogLevel, message: string): Promise<void> {
    await query(`insert into system_etl_run_log (run_id, level, message) values ($1, $2, $3)`, [id, level, message]);
  }

  async findBySession(sessionId: string): Promise<RunRecord | null> {
    const { rows } = await query<RunRow>(`select ${RUN_COLUMNS} from system_etl_run where session_id = $1`, [
      sessionId,
    ]);
    return rows[0] ? mapRun(rows[0]) : null;
  }

  async listLogs(id: string): Promise<RunLogEntry[]> {
    const { rows } = await query<LogRow>(
      `select level, message, created_at from system_etl_run_log where run_id = $1 order by id`,
      [id]
    );
    return rows.map((row) => ({ level: row.level, message: row.message, createdAt: toIso(row.created_at) ?? '' }));
  }

  async requeueInterrupted(): Promise<RunRecord[]> {
    await query(`update system_etl_run set status = 'queued', started_at = null where status = 'running'`);
    const { rows } = await query<RunRow>(
      `select ${RUN_COLUMNS} from system_etl_run where status = 'queued' order by created_at`
    );
    return rows.map(mapRun);
  }
}
