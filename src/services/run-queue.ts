import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { loadConfig, type PipelineConfig, type RawConfig } from '../config.js';
import type { PipelineError } from '../errors.js';
import { runPipeline, type PipelineOutcome, type RunReport } from './pipeline.js';
import type { RunLogEntry, RunRecord, RunStatus, RunStore } from './run-store.js';
import { loadSourceDirectory } from './source-loader.js';

export type RunJob = {
  id: string;
  sessionId: string;
  sessionDir: string;
  destination: string;
  overrides: RawConfig;
};

export type RunStatusView = {
  status: RunStatus;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  summary: unknown;
  error: string | null;
  reportAvailable: boolean;
  outputAvailable: boolean;
  logs: RunLogEntry[];
};

type RunQueueOptions = {
  resolveConfig?: (overrides: RawConfig) => PipelineConfig;
};

function toJob(record: RunRecord): RunJob {
  return {
    id: record.id,
    sessionId: record.sessionId,
    sessionDir: record.sessionDir,
    destination: record.destination,
    overrides: record.overrides,
  };
}

function outcomeReport(outcome: PipelineOutcome): RunReport {
  return 'report' in outcome ? outcome.report : outcome.result.report;
}

function summarize(outcome: PipelineOutcome): Record<string, unknown> {
  const report = outcomeReport(outcome);
  return {
    status: outcome.status,
    stage: outcome.status === 'completed' ? null : outcome.stage,
    counts: report.counts,
    totals: report.totals,
    abc: report.abc,
    audit: report.audit
      ? { status: report.audit.status, delta: report.audit.delta, anomalies: report.audit.anomalies.length }
      : null,
    output:
      outcome.status === 'completed'
        ? { path: outcome.output.destination, sizeBytes: outcome.output.sizeBytes, checksum: outcome.output.checksum }
        : null,
    error: outcome.status === 'completed' ? null : outcome.error.toJSON(),
  };
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fsp.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * In-process FIFO of pipeline runs, one at a time. Run state and logs live in
 * the RunStore so a restart can pick up queued and interrupted runs.
 */
export class RunQueue {
  private readonly jobs: RunJob[] = [];
  private draining: Promise<void> | null = null;
  private initialized = false;
  private readonly resolveConfig: (overrides: RawConfig) => PipelineConfig;

  constructor(
    private readonly store: RunStore,
    options: RunQueueOptions = {}
  ) {
    this.resolveConfig = options.resolveConfig ?? ((overrides) => loadConfig({ overrides }));
  }

  /** Resolves overrides the way a queued run will, so bad ones fail before queueing. */
  checkOverrides(overrides: RawConfig): PipelineConfig {
    return this.resolveConfig(overrides);
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;
    this.initialized = true;
    await this.store.ensureSchema();
    const pending = await this.store.requeueInterrupted();
    for (const record of pending) {
      this.jobs.push(toJob(record));
    }
    this.kick();
  }

  enqueue(job: RunJob): void {
    this.jobs.push(job);
    this.kick();
  }

  /** Resolves once every queued run has finished. */
  async whenIdle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private kick(): void {
    if (this.draining || !this.jobs.length) return;
    this.draining = this.processQueue()
      .catch((error: unknown) => {
        console.error('[etl] run queue stopped:', error);
      })
      .finally(() => {
        this.draining = null;
        this.kick();
      });
  }

  private async processQueue(): Promise<void> {
    while (this.jobs.length) {
      const job = this.jobs.shift();
      if (!job) continue;
      try {
        await this.execute(job);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        await this.store.finishRun(
          job.id,
          'failed',
          { summary: null, error: message, reportPath: null },
          { level: 'error', message }
        );
      }
    }
  }

  private async execute(job: RunJob): Promise<void> {
    await this.store.markRunning(job.id);
    const log = (level: 'info' | 'warn' | 'error', message: string) => this.store.appendLog(job.id, level, message);

    const config = this.resolveConfig(job.overrides);
    await log('info', `Loading source files from ${job.sessionDir}`);
    const sources = await loadSourceDirectory(job.sessionDir);
    if (sources.notes.summaryRowsDropped) {
      await log('warn', `Dropped ${sources.notes.summaryRowsDropped} summary rows from the extracts`);
    }
    if (sources.notes.derived.length) {
      await log('info', `Derived ${sources.notes.derived.join(' and ')} from transactions`);
    }

    const outcome = await runPipeline(sources, {
      config,
      destination: job.destination,
      logger: log,
      notes: sources.notes,
    });

    const reportPath = path.join(path.dirname(job.destination), `${job.sessionId}.report.json`);
    await fsp.mkdir(path.dirname(reportPath), { recursive: true });
    await fsp.writeFile(reportPath, JSON.stringify(outcomeReport(outcome), null, 2), 'utf8');

    const error = outcome.status === 'completed' ? null : outcome.error;
    await this.store.finishRun(
      job.id,
      outcome.status,
      { summary: summarize(outcome), error: error ? error.message : null, reportPath },
      error
        ? { level: 'error', message: `Run ${outcome.status}: ${describe(error)}` }
        : { level: 'info', message: 'Run completed successfully' }
    );
  }

  async getStatus(sessionId: string): Promise<RunStatusView | null> {
    const record = await this.store.findBySession(sessionId);
    if (!record) return null;
    const logs = await this.store.listLogs(record.id);
    return {
      status: record.status,
      createdAt: record.createdAt,
      startedAt: record.startedAt,
      finishedAt: record.finishedAt,
      summary: record.summary,
      error: record.error,
      reportAvailable: Boolean(record.reportPath),
      outputAvailable: record.status === 'completed' && (await exists(record.destination)),
      logs,
    };
  }

  async getReport(sessionId: string): Promise<{ path: string; filename: string } | null> {
    const record = await this.store.findBySession(sessionId);
    if (!record || !record.reportPath) return null;
    return { path: record.reportPath, filename: path.basename(record.reportPath) };
  }

  async getOutput(sessionId: string): Promise<{ path: string; filename: string } | null> {
    const record = await this.store.findBySession(sessionId);
    if (!record || record.status !== 'completed' || !(await exists(record.destination))) return null;
    return { path: record.destination, filename: path.basename(record.destination) };
  }
}

function describe(error: PipelineError): string {
  return `${error.code} ${error.message}`;
}
