import type { PipelineConfig } from '../config.js';
import type { AbcClass, CategoryMetric, ChannelMetric, FactRecord } from '../types/pipeline.js';
import { formatMoney, formatRatio } from '../utils/numbers.js';

export type OutputTable = {
  name: 'DATA_BI' | 'DATA_CANALES' | 'DATA_CATEGORIAS' | 'DIM_ARTICULOS';
  fileName: string;
  headers: string[];
  rows: string[][];
};

export type TableSources = {
  facts: FactRecord[];
  channels: ChannelMetric[];
  categories: CategoryMetric[];
  classes: AbcClass[];
};

function formatQuantity(value: number, decimalSeparator: string): string {
  return Number.isInteger(value) ? String(value) : formatRatio(value, decimalSeparator, 3);
}

/**
 * Renders the star schema as plain header + data tables. No title, blank or
 * total rows: a reporting tool would fold those into its own sums.
 */
export function buildOutputTables(
  sources: TableSources,
  config: Pick<PipelineConfig, 'decimalSeparator'>
): OutputTable[] {
  const sep = config.decimalSeparator;
  const money = (value: number) => formatMoney(value, sep);
  const ratio = (value: number) => formatRatio(value, sep);

  return [
    {
      name: 'DATA_BI',
      fileName: 'data_bi.csv',
      headers: ['article', 'channel', 'period', 'category', 'gross_sale', 'return_amount', 'net_sale', 'quantity'],
      rows: sources.facts.map((fact) => [
        fact.article,
        fact.channel,
        fact.period,
        fact.category,
        money(fact.grossSale),
        money(fact.returnAmount),
        money(fact.netSale),
        formatQuantity(fact.quantity, sep),
      ]),
    },
    {
      name: 'DATA_CANALES',
      fileName: 'data_canales.csv',
      headers: ['channel', 'channel_type', 'total_net_sale', 'return_rate'],
      rows: sources.channels.map((metric) => [
        metric.channel,
        metric.type,
        money(metric.totalNetSale),
        ratio(metric.returnRate),
      ]),
    },
    {
      name: 'DATA_CATEGORIAS',
      fileName: 'data_categorias.csv',
      headers: ['category', 'total_net_sale', 'article_count', 'contribution_share'],
      rows: sources.categories.map((metric) => [
        metric.category,
        money(metric.totalNetSale),
        String(metric.articleCount),
        ratio(metric.contributionShare),
      ]),
    },
    {
      name: 'DIM_ARTICULOS',
      fileName: 'dim_articulos.csv',
      headers: [
        'article',
        'description',
        'category',
        'rank',
        'abc_class',
        'net_sale',
        'gross_sale',
        'return_amount',
        'return_rate',
        'share',
        'cumulative_share',
      ],
      rows: sources.classes.map((entry) => [
        entry.article,
        entry.description,
        entry.category,
        String(entry.rank),
        entry.label,
        money(entry.netSale),
        money(entry.grossSale),
        money(entry.returnAmount),
        ratio(entry.returnRate),
        ratio(entry.share),
        ratio(entry.cumulativeShare),
      ]),
    },
  ];
}
