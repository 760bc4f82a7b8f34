import type { CategoryMetric, ChannelDimension, ChannelMetric, FactRecord } from '../types/pipeline.js';
import { safeRatio } from '../utils/numbers.js';

function byNetThenCode<T extends { totalNetSale: number }>(code: (entry: T) => string) {
  return (a: T, b: T): number => {
    if (a.totalNetSale !== b.totalNetSale) return b.totalNetSale - a.totalNetSale;
    const left = code(a);
    const right = code(b);
    if (left === right) return 0;
    return left < right ? -1 : 1;
  };
}

export function buildChannelMetrics(facts: FactRecord[], channels: Map<string, ChannelDimension>): ChannelMetric[] {
  const metrics = new Map<string, ChannelMetric>();
  for (const fact of facts) {
    let metric = metrics.get(fact.channel);
    if (!metric) {
      metric = {
        channel: fact.channel,
        type: channels.get(fact.channel)?.type ?? 'PHYSICAL',
        grossSale: 0,
        returnAmount: 0,
        totalNetSale: 0,
        returnRate: 0,
      };
      metrics.set(fact.channel, metric);
    }
    metric.grossSale += fact.grossSale;
    metric.returnAmount += fact.returnAmount;
    metric.totalNetSale += fact.netSale;
  }

  return [...metrics.values()]
    .map((metric) => ({ ...metric, returnRate: safeRatio(metric.returnAmount, metric.grossSale) }))
    .sort(byNetThenCode((metric) => metric.channel));
}

export function buildCategoryMetrics(facts: FactRecord[]): CategoryMetric[] {
  const totals = new Map<string, { net: number; articles: Set<string> }>();
  let grandTotal = 0;
  for (const fact of facts) {
    const entry = totals.get(fact.category) ?? { net: 0, articles: new Set<string>() };
    entry.net += fact.netSale;
    entry.articles.add(fact.article);
    totals.set(fact.category, entry);
    grandTotal += fact.netSale;
  }

  return [...totals.entries()]
    .map(([category, entry]) => ({
      category,
      totalNetSale: entry.net,
      articleCount: entry.articles.size,
      contributionShare: safeRatio(entry.net, grandTotal),
    }))
    .sort(byNetThenCode((metric) => metric.category));
}
