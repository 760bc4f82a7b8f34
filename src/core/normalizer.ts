import type { PipelineConfig } from '../config.js';
import type {
  ArticleDimension,
  ChannelDimension,
  ChannelType,
  NormalizationWarning,
  RawArticle,
  RawChannel,
  RawField,
  RawTransactionLine,
  TransactionLine,
} from '../types/pipeline.js';
import { parseTimestamp, periodKey } from '../utils/dates.js';
import { parseNumber, toMoney } from '../utils/numbers.js';

/** Underscores never survive normalization, so no real key can equal this. */
export const EMPTY_KEY = '__EMPTY__';

export function isEmptyKey(key: string): boolean {
  return key === EMPTY_KEY;
}

export function normalizeKey(value: unknown): string {
  if (value == null || value === EMPTY_KEY) return EMPTY_KEY;
  const key = String(value)
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toUpperCase()
    .replace(/[^A-Z0-9\s-]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
  return key.length ? key : EMPTY_KEY;
}

function describeRaw(value: RawField): string {
  if (value == null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function normalizeText(value: RawField): string {
  return describeRaw(value).replace(/\s+/g, ' ').trim();
}

type WarningSink = (warning: NormalizationWarning) => void;

function keyField(
  value: RawField,
  field: string,
  source: NormalizationWarning['source'],
  index: number,
  warn: WarningSink
): string {
  const key = normalizeKey(value);
  if (isEmptyKey(key)) {
    warn({
      kind: 'normalization',
      source,
      index,
      field,
      raw: describeRaw(value),
      message: `${field} is empty after normalization`,
    });
  }
  return key;
}

function numberField(
  value: RawField,
  field: string,
  source: NormalizationWarning['source'],
  index: number,
  warn: WarningSink
): number {
  const parsed = parseNumber(value);
  if (parsed === null) {
    warn({
      kind: 'normalization',
      source,
      index,
      field,
      raw: describeRaw(value),
      message: `${field} is not numeric; counted as 0`,
    });
    return 0;
  }
  return parsed;
}

export type NormalizedBatch<T> = {
  records: T[];
  warnings: NormalizationWarning[];
};

export function normalizeTransactions(
  lines: RawTransactionLine[],
  config: Pick<PipelineConfig, 'reportingPeriod'>
): NormalizedBatch<TransactionLine> {
  const warnings: NormalizationWarning[] = [];
  const warn: WarningSink = (warning) => warnings.push(warning);

  const records = lines.map((raw, index): TransactionLine => {
    const amount = numberField(raw.amount, 'amount', 'transaction', index, warn);
    const timestamp = parseTimestamp(raw.timestamp);
    let period: string;
    if (config.reportingPeriod === 'all') {
      period = periodKey(new Date(0), 'all');
    } else if (timestamp) {
      period = periodKey(timestamp, config.reportingPeriod);
    } else {
      period = EMPTY_KEY;
      warn({
        kind: 'normalization',
        source: 'transaction',
        index,
        field: 'timestamp',
        raw: describeRaw(raw.timestamp),
        message: 'timestamp could not be parsed; period left empty',
      });
    }

    return Object.freeze({
      index,
      article: keyField(raw.article, 'article', 'transaction', index, warn),
      channel: keyField(raw.channel, 'channel', 'transaction', index, warn),
      // The article dimension owns the category, so a blank one here is not worth a warning.
      category: normalizeKey(raw.category),
      unitPrice: numberField(raw.unitPrice, 'unitPrice', 'transaction', index, warn),
      priceKnown: parseNumber(raw.unitPrice) !== null,
      quantity: numberField(raw.quantity, 'quantity', 'transaction', index, warn),
      amount,
      amountUnits: toMoney(amount),
      timestamp,
      period,
    });
  });

  return { records, warnings };
}

export function normalizeArticles(rows: RawArticle[]): NormalizedBatch<ArticleDimension> {
  const warnings: NormalizationWarning[] = [];
  const warn: WarningSink = (warning) => warnings.push(warning);

  const records = rows.map((raw, index): ArticleDimension => {
    const unitCost = raw.unitCost == null || raw.unitCost === '' ? null : parseNumber(raw.unitCost);
    return Object.freeze({
      article: keyField(raw.article, 'article', 'article', index, warn),
      description: normalizeText(raw.description) || 'SIN DESCRIPCION',
      category: keyField(raw.category, 'category', 'article', index, warn),
      unitCost,
    });
  });

  return { records, warnings };
}

export function normalizeChannelType(value: RawField, channel: string): ChannelType {
  const type = normalizeKey(value);
  if (type === 'ONLINE' || type === 'WEB' || type === 'ECOMMERCE' || type === 'E-COMMERCE') return 'ONLINE';
  if (isEmptyKey(type)) return channel.includes('ONLINE') ? 'ONLINE' : 'PHYSICAL';
  return 'PHYSICAL';
}

export function normalizeChannels(rows: RawChannel[]): NormalizedBatch<ChannelDimension> {
  const warnings: NormalizationWarning[] = [];
  const warn: WarningSink = (warning) => warnings.push(warning);

  const records = rows.map((raw, index): ChannelDimension => {
    const channel = keyField(raw.channel, 'channel', 'channel', index, warn);
    return Object.freeze({ channel, type: normalizeChannelType(raw.type, channel) });
  });

  return { records, warnings };
}
