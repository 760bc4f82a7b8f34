import type { PipelineConfig } from '../config.js';
import { KeyResolutionError } from '../errors.js';
import type {
  ArticleDimension,
  CategoryMismatch,
  ChannelDimension,
  DuplicateDimensionKey,
  FactRecord,
  TransactionLine,
  UnresolvedLine,
} from '../types/pipeline.js';
import { EMPTY_KEY, isEmptyKey } from './normalizer.js';

export type DimensionIndex = {
  articles: Map<string, ArticleDimension>;
  channels: Map<string, ChannelDimension>;
  duplicates: DuplicateDimensionKey[];
};

export function indexDimensions(articles: ArticleDimension[], channels: ChannelDimension[]): DimensionIndex {
  const duplicates: DuplicateDimensionKey[] = [];
  const articleMap = new Map<string, ArticleDimension>();
  articles.forEach((article, index) => {
    if (isEmptyKey(article.article)) return;
    if (articleMap.has(article.article)) {
      duplicates.push({ kind: 'duplicate-dimension-key', dimension: 'article', key: article.article, index });
      return;
    }
    articleMap.set(article.article, article);
  });

  const channelMap = new Map<string, ChannelDimension>();
  channels.forEach((channel, index) => {
    if (isEmptyKey(channel.channel)) return;
    if (channelMap.has(channel.channel)) {
      duplicates.push({ kind: 'duplicate-dimension-key', dimension: 'channel', key: channel.channel, index });
      return;
    }
    channelMap.set(channel.channel, channel);
  });

  return { articles: articleMap, channels: channelMap, duplicates };
}

export type ConsolidationResult = {
  facts: FactRecord[];
  /** Lines that contributed to `facts`; the auditor's source path sums exactly these. */
  resolvedLines: TransactionLine[];
  unresolved: UnresolvedLine[];
  mismatches: CategoryMismatch[];
};

function resolutionFailure(line: TransactionLine, dimensions: DimensionIndex): UnresolvedLine | null {
  const missing: string[] = [];
  if (!dimensions.articles.has(line.article)) missing.push(`unknown article ${line.article}`);
  if (!dimensions.channels.has(line.channel)) missing.push(`unknown channel ${line.channel}`);
  if (!missing.length) return null;
  return {
    index: line.index,
    article: line.article,
    channel: line.channel,
    amount: line.amount,
    reason: missing.join(', '),
  };
}

export function factKey(article: string, channel: string, period: string): string {
  return `${article}\u0000${channel}\u0000${period}`;
}

export function compareFacts(a: FactRecord, b: FactRecord): number {
  if (a.article !== b.article) return a.article < b.article ? -1 : 1;
  if (a.channel !== b.channel) return a.channel < b.channel ? -1 : 1;
  if (a.period !== b.period) return a.period < b.period ? -1 : 1;
  return 0;
}

/**
 * Folds transaction lines into one FactRecord per (article, channel, period).
 * Gross and returns come from the same lines as net, so
 * `netSale === grossSale - returnAmount` holds for every record.
 *
 * Under the `abort` policy the first unresolvable line is thrown as a
 * KeyResolutionError; under `quarantine` it is collected in `unresolved`.
 */
export function consolidateFacts(
  lines: TransactionLine[],
  dimensions: DimensionIndex,
  config: Pick<PipelineConfig, 'unresolvedPolicy'>
): ConsolidationResult {
  const facts = new Map<string, FactRecord>();
  const resolvedLines: TransactionLine[] = [];
  const unresolved: UnresolvedLine[] = [];
  const mismatches: CategoryMismatch[] = [];

  for (const line of lines) {
    const failure = resolutionFailure(line, dimensions);
    if (failure) {
      if (config.unresolvedPolicy === 'abort') {
        throw new KeyResolutionError(failure);
      }
      unresolved.push(failure);
      continue;
    }

    const article = dimensions.articles.get(line.article);
    const category = article?.category ?? EMPTY_KEY;
    if (!isEmptyKey(line.category) && line.category !== category) {
      mismatches.push({
        kind: 'category-mismatch',
        index: line.index,
        article: line.article,
        lineCategory: line.category,
        articleCategory: category,
      });
    }

    const key = factKey(line.article, line.channel, line.period);
    let fact = facts.get(key);
    if (!fact) {
      fact = {
        article: line.article,
        channel: line.channel,
        period: line.period,
        category,
        grossSale: 0,
        returnAmount: 0,
        netSale: 0,
        quantity: 0,
        lineCount: 0,
      };
      facts.set(key, fact);
    }

    if (line.amountUnits >= 0) {
      fact.grossSale += line.amountUnits;
    } else {
      fact.returnAmount += -line.amountUnits;
    }
    fact.netSale = fact.grossSale - fact.returnAmount;
    fact.quantity += line.quantity;
    fact.lineCount += 1;
    resolvedLines.push(line);
  }

  return {
    facts: [...facts.values()].sort(compareFacts),
    resolvedLines,
    unresolved,
    mismatches,
  };
}

/**
 * Merges fact sets computed over disjoint slices of the input. Sums are
 * commutative, so partial consolidations can be combined in any order.
 */
export function mergeFacts(...partials: FactRecord[][]): FactRecord[] {
  const merged = new Map<string, FactRecord>();
  for (const partial of partials) {
    for (const fact of partial) {
      const key = factKey(fact.article, fact.channel, fact.period);
      const existing = merged.get(key);
      if (!existing) {
        merged.set(key, { ...fact });
        continue;
      }
      existing.grossSale += fact.grossSale;
      existing.returnAmount += fact.returnAmount;
      existing.netSale = existing.grossSale - existing.returnAmount;
      existing.quantity += fact.quantity;
      existing.lineCount += fact.lineCount;
    }
  }
  return [...merged.values()].sort(compareFacts);
}
