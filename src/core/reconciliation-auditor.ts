import type { PipelineConfig } from '../config.js';
import { ReconciliationMismatch } from '../errors.js';
import type {
  AnomalyFlag,
  AuditResult,
  AuditStatus,
  Money,
  FactRecord,
  ReturnRateOutlier,
  TransactionLine,
  ZeroPriceAnomaly,
} from '../types/pipeline.js';
import { compensatedSum, fromMoney, safeRatio, toMoney } from '../utils/numbers.js';

type AuditConfig = Pick<
  PipelineConfig,
  'reconciliationEpsilon' | 'zeroPriceThreshold' | 'returnRateOutlierMultiplier'
>;

export type Reconciliation = {
  status: AuditStatus;
  sourceTotal: number;
  factTotal: number;
  delta: number;
  epsilon: number;
};

/**
 * Path one: the lines' signed amounts as parsed, summed without any per-line
 * rounding and rounded once at the end. Rounding lost while building facts
 * shows up here as a delta.
 */
export function sourceTotal(lines: TransactionLine[]): Money {
  return toMoney(compensatedSum(lines.map((line) => line.amount)));
}

/** Path two: from the consolidated fact table only. */
export function factTotal(facts: FactRecord[]): Money {
  return facts.reduce((sum, fact) => sum + fact.netSale, 0);
}

export function reconcile(
  lines: TransactionLine[],
  facts: FactRecord[],
  config: Pick<PipelineConfig, 'reconciliationEpsilon'>
): Reconciliation {
  const source = sourceTotal(lines);
  const fact = factTotal(facts);
  const delta = fromMoney(source - fact);
  return {
    status: Math.abs(delta) <= config.reconciliationEpsilon ? 'RECONCILED' : 'MISMATCH',
    sourceTotal: fromMoney(source),
    factTotal: fromMoney(fact),
    delta,
    epsilon: config.reconciliationEpsilon,
  };
}

export function findZeroPriceLines(
  lines: TransactionLine[],
  config: Pick<PipelineConfig, 'zeroPriceThreshold'>
): ZeroPriceAnomaly[] {
  return lines
    // A missing price already raised a normalization warning; 0 there is a stand-in.
    .filter((line) => line.priceKnown && line.unitPrice <= config.zeroPriceThreshold && line.quantity > 0)
    .map((line): ZeroPriceAnomaly => ({
      kind: 'zero-price',
      index: line.index,
      article: line.article,
      channel: line.channel,
      unitPrice: line.unitPrice,
      quantity: line.quantity,
      amount: line.amount,
    }));
}

type RateTotals = { gross: Money; returns: Money };

function accumulate(target: Map<string, RateTotals>, key: string, fact: FactRecord): void {
  const entry = target.get(key) ?? { gross: 0, returns: 0 };
  entry.gross += fact.grossSale;
  entry.returns += fact.returnAmount;
  target.set(key, entry);
}

/**
 * Flags articles and channels whose return rate is above the global rate
 * (total returns over total gross) times the configured multiplier.
 */
export function findReturnRateOutliers(
  facts: FactRecord[],
  config: Pick<PipelineConfig, 'returnRateOutlierMultiplier'>
): ReturnRateOutlier[] {
  const byArticle = new Map<string, RateTotals>();
  const byChannel = new Map<string, RateTotals>();
  let gross = 0;
  let returns = 0;
  for (const fact of facts) {
    accumulate(byArticle, fact.article, fact);
    accumulate(byChannel, fact.channel, fact);
    gross += fact.grossSale;
    returns += fact.returnAmount;
  }

  const globalReturnRate = safeRatio(returns, gross);
  const limit = globalReturnRate * config.returnRateOutlierMultiplier;
  const outliers: ReturnRateOutlier[] = [];

  const scan = (scope: ReturnRateOutlier['scope'], entries: Map<string, RateTotals>) => {
    const codes = [...entries.keys()].sort();
    for (const code of codes) {
      const entry = entries.get(code);
      if (!entry) continue;
      const returnRate = safeRatio(entry.returns, entry.gross);
      if (returnRate > limit) {
        outliers.push({ kind: 'return-rate-outlier', scope, code, returnRate, globalReturnRate, limit });
      }
    }
  };
  scan('channel', byChannel);
  scan('article', byArticle);

  return outliers;
}

/**
 * Runs both checks. `extra` carries flags raised earlier in the run
 * (normalization warnings, dimension problems) so the report has one list.
 */
export function auditRun(
  lines: TransactionLine[],
  facts: FactRecord[],
  config: AuditConfig,
  extra: AnomalyFlag[] = []
): AuditResult {
  const reconciliation = reconcile(lines, facts, config);
  return {
    ...reconciliation,
    anomalies: [...extra, ...findZeroPriceLines(lines, config), ...findReturnRateOutliers(facts, config)],
  };
}

export function mismatchError(audit: AuditResult): ReconciliationMismatch | null {
  if (audit.status === 'RECONCILED') return null;
  return new ReconciliationMismatch({
    sourceTotal: audit.sourceTotal,
    factTotal: audit.factTotal,
    delta: audit.delta,
    epsilon: audit.epsilon,
  });
}
