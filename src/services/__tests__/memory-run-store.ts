import type { LogLevel } from '../pipeline.js';
import type { NewRun, RunCompletion, RunLogEntry, RunRecord, RunStatus, RunStore } from '../run-store.js';

/** In-process RunStore for tests; mirrors PgRunStore's state transitions. */
export class MemoryRunStore implements RunStore {
  readonly runs = new Map<string, RunRecord>();
  readonly logs = new Map<string, RunLogEntry[]>();
  schemaEnsured = false;
  private sequence = 0;

  private tick(): string {
    this.sequence += 1;
    return new Date(Date.UTC(2024, 0, 1, 0, 0, this.sequence)).toISOString();
  }

  private get(id: string): RunRecord {
    const record = this.runs.get(id);
    if (!record) throw new Error(`run ${id} not found`);
    return record;
  }

  async ensureSchema(): Promise<void> {
    this.schemaEnsured = true;
  }

  async createRun(run: NewRun): Promise<RunRecord> {
    return this.seed(run, 'queued');
  }

  /** Inserts a run in any state, as a previous process would have left it. */
  seed(run: NewRun, status: RunStatus): RunRecord {
    const record: RunRecord = {
      ...run,
      id: `run-${this.runs.size + 1}`,
      status,
      createdAt: this.tick(),
      startedAt: status === 'running' ? this.tick() : null,
      finishedAt: null,
      summary: null,
      error: null,
      reportPath: null,
    };
    this.runs.set(record.id, record);
    this.logs.set(record.id, []);
    return record;
  }

  async markRunning(id: string): Promise<void> {
    const record = this.get(id);
    record.status = 'running';
    record.startedAt = this.tick();
  }

  async finishRun(
    id: string,
    status: RunStatus,
    completion: RunCompletion,
    log: { level: LogLevel; message: string }
  ): Promise<void> {
    const record = this.get(id);
    record.status = status;
    record.finishedAt = this.tick();
    record.summary = completion.summary;
    record.error = completion.error;
    record.reportPath = completion.reportPath;
    await this.appendLog(id, log.level, log.message);
  }

  async appendLog(id: string, level: LogLevel, message: string): Promise<void> {
    const entries = this.logs.get(id);
    if (!entries) throw new Error(`run ${id} not found`);
    entries.push({ level, message, createdAt: this.tick() });
  }

  async findBySession(sessionId: string): Promise<RunRecord | null> {
    return [...this.runs.values()].find((record) => record.sessionId === sessionId) ?? null;
  }

  async listLogs(id: string): Promise<RunLogEntry[]> {
    return [...(this.logs.get(id) ?? [])];
  }

  async requeueInterrupted(): Promise<RunRecord[]> {
    for (const record of this.runs.values()) {
      if (record.status === 'running') {
        record.status = 'queued';
        record.startedAt = null;
      }
    }
    return [...this.runs.values()]
      .filter((record) => record.status === 'queued')
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }
}
