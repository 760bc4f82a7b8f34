import type { PipelineConfig } from '../config.js';
import { classifyArticles, summarizeClasses } from '../core/abc-classifier.js';
import { consolidateFacts, indexDimensions } from '../core/fact-consolidator.js';
import { buildCategoryMetrics, buildChannelMetrics } from '../core/metrics.js';
import { normalizeArticles, normalizeChannels, normalizeTransactions } from '../core/normalizer.js';
import { auditRun, mismatchError } from '../core/reconciliation-auditor.js';
import { buildOutputTables } from '../core/tables.js';
import { KeyResolutionError, ReconciliationMismatch, WriteFailure } from '../errors.js';
import type {
  AbcClass,
  AbcLabel,
  AuditResult,
  CategoryMetric,
  ChannelMetric,
  FactRecord,
  NormalizationWarning,
  PipelineInput,
  UnresolvedLine,
} from '../types/pipeline.js';
import { formatMoney, fromMoney, toMoney } from '../utils/numbers.js';
import { writeTablesAtomically, type WriteResult } from './atomic-writer.js';

export type LogLevel = 'info' | 'warn' | 'error';

export type PipelineLogger = (level: LogLevel, message: string) => void | Promise<void>;

export const consoleLogger: PipelineLogger = (level, message) => {
  const line = `[etl] ${message}`;
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

export type RunReport = {
  generatedAt: string;
  config: PipelineConfig;
  counts: {
    transactions: number;
    resolved: number;
    unresolved: number;
    facts: number;
    articles: number;
    channels: number;
    categories: number;
  };
  totals: {
    grossSale: number;
    returnAmount: number;
    netSale: number;
    quarantinedAmount: number;
  };
  abc: Record<AbcLabel, number>;
  audit: AuditResult | null;
  warnings: NormalizationWarning[];
  unresolved: UnresolvedLine[];
  notes?: unknown;
};

export type PipelineResult = {
  facts: FactRecord[];
  classes: AbcClass[];
  channels: ChannelMetric[];
  categories: CategoryMetric[];
  report: RunReport;
};

export type PipelineOutcome =
  | { status: 'completed'; result: PipelineResult; output: WriteResult }
  | { status: 'rejected'; stage: 'key-resolution'; error: KeyResolutionError; report: RunReport }
  | { status: 'rejected'; stage: 'reconciliation'; error: ReconciliationMismatch; result: PipelineResult }
  | { status: 'failed'; stage: 'write'; error: WriteFailure; result: PipelineResult };

export type PipelineOptions = {
  config: PipelineConfig;
  destination: string;
  logger?: PipelineLogger;
  signal?: AbortSignal;
  /** Extra context (loader notes and the like) copied into the run report. */
  notes?: unknown;
  beforeReplace?: (stagedPath: string) => Promise<void> | void;
};

export const RUN_REPORT_FILE = 'run-report.json';

function emptyReport(config: PipelineConfig, notes: unknown): RunReport {
  return {
    generatedAt: new Date().toISOString(),
    config,
    counts: { transactions: 0, resolved: 0, unresolved: 0, facts: 0, articles: 0, channels: 0, categories: 0 },
    totals: { grossSale: 0, returnAmount: 0, netSale: 0, quarantinedAmount: 0 },
    abc: { A: 0, B: 0, C: 0 },
    audit: null,
    warnings: [],
    unresolved: [],
    notes,
  };
}

/**
 * Everything short of the write: normalize, consolidate, classify, measure,
 * audit. Throws KeyResolutionError under the `abort` policy.
 */
export async function computeStarSchema(
  input: PipelineInput,
  config: PipelineConfig,
  log: PipelineLogger = consoleLogger,
  notes?: unknown
): Promise<PipelineResult> {
  const transactions = normalizeTransactions(input.transactions, config);
  const articles = normalizeArticles(input.articles);
  const channels = normalizeChannels(input.channels);
  const warnings = [...transactions.warnings, ...articles.warnings, ...channels.warnings];
  await log(
    'info',
    `Normalized ${transactions.records.length} transactions, ${articles.records.length} articles, ${channels.records.length} channels`
  );
  if (warnings.length) {
    await log('warn', `${warnings.length} normalization warnings`);
  }

  const dimensions = indexDimensions(articles.records, channels.records);
  const consolidation = consolidateFacts(transactions.records, dimensions, config);
  await log('info', `Consolidated ${consolidation.resolvedLines.length} lines into ${consolidation.facts.length} facts`);
  if (consolidation.unresolved.length) {
    await log('warn', `Quarantined ${consolidation.unresolved.length} lines with unknown article or channel`);
  }

  const classes = classifyArticles(consolidation.facts, dimensions.articles, config);
  const abc = summarizeClasses(classes);
  await log('info', `ABC classification: A=${abc.A} B=${abc.B} C=${abc.C}`);

  const channelMetrics = buildChannelMetrics(consolidation.facts, dimensions.channels);
  const categoryMetrics = buildCategoryMetrics(consolidation.facts);

  const audit = auditRun(consolidation.resolvedLines, consolidation.facts, config, [
    ...warnings,
    ...dimensions.duplicates,
    ...consolidation.mismatches,
  ]);
  await log(
    audit.status === 'RECONCILED' ? 'info' : 'error',
    `Audit ${audit.status}: source ${audit.sourceTotal} vs facts ${audit.factTotal} (delta ${audit.delta})`
  );

  const gross = consolidation.facts.reduce((sum, fact) => sum + fact.grossSale, 0);
  const returns = consolidation.facts.reduce((sum, fact) => sum + fact.returnAmount, 0);
  const quarantined = consolidation.unresolved.reduce((sum, line) => sum + toMoney(line.amount), 0);

  const report: RunReport = {
    ...emptyReport(config, notes),
    counts: {
      transactions: transactions.records.length,
      resolved: consolidation.resolvedLines.length,
      unresolved: consolidation.unresolved.length,
      facts: consolidation.facts.length,
      articles: classes.length,
      channels: channelMetrics.length,
      categories: categoryMetrics.length,
    },
    totals: {
      grossSale: fromMoney(gross),
      returnAmount: fromMoney(returns),
      netSale: fromMoney(gross - returns),
      quarantinedAmount: fromMoney(quarantined),
    },
    abc,
    audit,
    warnings,
    unresolved: consolidation.unresolved,
  };

  return {
    facts: consolidation.facts,
    classes,
    channels: channelMetrics,
    categories: categoryMetrics,
    report,
  };
}

export async function runPipeline(input: PipelineInput, options: PipelineOptions): Promise<PipelineOutcome> {
  const { config, destination, signal, notes, beforeReplace } = options;
  const log = options.logger ?? consoleLogger;

  let result: PipelineResult;
  try {
    result = await computeStarSchema(input, config, log, notes);
  } catch (error) {
    if (error instanceof KeyResolutionError) {
      await log('error', `Run aborted: ${error.message}`);
      const report = emptyReport(config, notes);
      report.counts.transactions = input.transactions.length;
      report.unresolved = [error.line];
      return { status: 'rejected', stage: 'key-resolution', error, report };
    }
    throw error;
  }

  const audit = result.report.audit;
  const mismatch = audit ? mismatchError(audit) : null;
  if (mismatch) {
    await log('error', `Nothing written: ${mismatch.message}`);
    return { status: 'rejected', stage: 'reconciliation', error: mismatch, result };
  }

  const tables = buildOutputTables(result, config);
  try {
    const output = await writeTablesAtomically(tables, destination, {
      delimiter: config.csvDelimiter,
      attachments: [{ name: RUN_REPORT_FILE, content: JSON.stringify(result.report, null, 2) }],
      signal,
      beforeReplace,
    });
    await log(
      'info',
      `Wrote ${output.destination} (${output.sizeBytes} bytes, net ${formatMoney(netTotal(result.facts))}, sha256 ${output.checksum})`
    );
    return { status: 'completed', result, output };
  } catch (error) {
    if (error instanceof WriteFailure) {
      await log('error', error.message);
      return { status: 'failed', stage: 'write', error, result };
    }
    throw error;
  }
}

function netTotal(facts: FactRecord[]): number {
  return facts.reduce((sum, fact) => sum + fact.netSale, 0);
}
