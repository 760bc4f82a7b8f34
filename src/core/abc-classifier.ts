import type { PipelineConfig } from '../config.js';
import type { AbcClass, AbcLabel, ArticleDimension, Money, FactRecord } from '../types/pipeline.js';
import { safeRatio } from '../utils/numbers.js';

type ArticleTotals = {
  article: string;
  category: string;
  netSale: Money;
  grossSale: Money;
  returnAmount: Money;
};

export function totalsByArticle(facts: FactRecord[]): ArticleTotals[] {
  const totals = new Map<string, ArticleTotals>();
  for (const fact of facts) {
    const current = totals.get(fact.article) ?? {
      article: fact.article,
      category: fact.category,
      netSale: 0,
      grossSale: 0,
      returnAmount: 0,
    };
    current.netSale += fact.netSale;
    current.grossSale += fact.grossSale;
    current.returnAmount += fact.returnAmount;
    totals.set(fact.article, current);
  }
  return [...totals.values()];
}

function byRevenue(a: ArticleTotals, b: ArticleTotals): number {
  if (a.netSale !== b.netSale) return b.netSale - a.netSale;
  if (a.article === b.article) return 0;
  return a.article < b.article ? -1 : 1;
}

export function labelFor(
  cumulativeShare: number,
  config: Pick<PipelineConfig, 'classAThreshold' | 'classBThreshold'>
): AbcLabel {
  if (cumulativeShare <= config.classAThreshold) return 'A';
  if (cumulativeShare <= config.classBThreshold) return 'B';
  return 'C';
}

/**
 * Pareto ranking over channel-independent article revenue. Only positive
 * articles take part in the cumulative share; the rest are appended as C.
 */
export function classifyArticles(
  facts: FactRecord[],
  articles: Map<string, ArticleDimension>,
  config: Pick<PipelineConfig, 'classAThreshold' | 'classBThreshold'>
): AbcClass[] {
  const totals = totalsByArticle(facts).sort(byRevenue);
  const positive = totals.filter((entry) => entry.netSale > 0);
  const rest = totals.filter((entry) => entry.netSale <= 0);
  const positiveTotal = positive.reduce((sum, entry) => sum + entry.netSale, 0);

  const classes: AbcClass[] = [];
  let running = 0;
  let cumulativeShare = 0;

  const push = (entry: ArticleTotals, label: AbcLabel, share: number) => {
    const dimension = articles.get(entry.article);
    classes.push({
      article: entry.article,
      description: dimension?.description ?? '',
      category: entry.category,
      rank: classes.length + 1,
      label,
      netSale: entry.netSale,
      grossSale: entry.grossSale,
      returnAmount: entry.returnAmount,
      returnRate: safeRatio(entry.returnAmount, entry.grossSale),
      share,
      cumulativeShare,
    });
  };

  for (const entry of positive) {
    running += entry.netSale;
    cumulativeShare = running / positiveTotal;
    push(entry, labelFor(cumulativeShare, config), entry.netSale / positiveTotal);
  }
  for (const entry of rest) {
    push(entry, 'C', 0);
  }

  return classes;
}

export function summarizeClasses(classes: AbcClass[]): Record<AbcLabel, number> {
  const summary: Record<AbcLabel, number> = { A: 0, B: 0, C: 0 };
  for (const entry of classes) {
    summary[entry.label] += 1;
  }
  return summary;
}
