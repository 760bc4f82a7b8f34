/** Integer ten-thousandths of the currency unit. */
export type Money = number;

export type ChannelType = 'PHYSICAL' | 'ONLINE';

export type AbcLabel = 'A' | 'B' | 'C';

export type AuditStatus = 'RECONCILED' | 'MISMATCH';

export type RawField = string | number | Date | null | undefined;

export type RawTransactionLine = {
  article: RawField;
  channel: RawField;
  category?: RawField;
  description?: RawField;
  unitPrice: RawField;
  quantity: RawField;
  amount: RawField;
  timestamp: RawField;
};

export type RawArticle = {
  article: RawField;
  description?: RawField;
  category?: RawField;
  unitCost?: RawField;
};

export type RawChannel = {
  channel: RawField;
  type?: RawField;
};

export type TransactionLine = Readonly<{
  index: number;
  article: string;
  channel: string;
  category: string;
  unitPrice: number;
  quantity: number;
  amount: number;
  amountUnits: Money;
  /** False when the unit price was missing or not numeric and 0 stands in. */
  priceKnown: boolean;
  timestamp: Date | null;
  period: string;
}>;

export type ArticleDimension = Readonly<{
  article: string;
  description: string;
  category: string;
  unitCost: number | null;
}>;

export type ChannelDimension = Readonly<{
  channel: string;
  type: ChannelType;
}>;

export type FactRecord = {
  article: string;
  channel: string;
  period: string;
  category: string;
  grossSale: Money;
  returnAmount: Money;
  netSale: Money;
  quantity: number;
  lineCount: number;
};

export type ChannelMetric = {
  channel: string;
  type: ChannelType;
  grossSale: Money;
  returnAmount: Money;
  totalNetSale: Money;
  returnRate: number;
};

export type CategoryMetric = {
  category: string;
  totalNetSale: Money;
  articleCount: number;
  contributionShare: number;
};

export type AbcClass = {
  article: string;
  description: string;
  category: string;
  rank: number;
  label: AbcLabel;
  netSale: Money;
  grossSale: Money;
  returnAmount: Money;
  returnRate: number;
  share: number;
  cumulativeShare: number;
};

export type NormalizationWarning = {
  kind: 'normalization';
  source: 'transaction' | 'article' | 'channel';
  index: number;
  field: string;
  raw: string;
  message: string;
};

export type ZeroPriceAnomaly = {
  kind: 'zero-price';
  index: number;
  article: string;
  channel: string;
  unitPrice: number;
  quantity: number;
  amount: number;
};

export type ReturnRateOutlier = {
  kind: 'return-rate-outlier';
  scope: 'article' | 'channel';
  code: string;
  returnRate: number;
  globalReturnRate: number;
  limit: number;
};

export type CategoryMismatch = {
  kind: 'category-mismatch';
  index: number;
  article: string;
  lineCategory: string;
  articleCategory: string;
};

export type DuplicateDimensionKey = {
  kind: 'duplicate-dimension-key';
  dimension: 'article' | 'channel';
  key: string;
  index: number;
};

export type AnomalyFlag =
  | NormalizationWarning
  | ZeroPriceAnomaly
  | ReturnRateOutlier
  | CategoryMismatch
  | DuplicateDimensionKey;

export type AuditResult = {
  status: AuditStatus;
  delta: number;
  sourceTotal: number;
  factTotal: number;
  epsilon: number;
  anomalies: AnomalyFlag[];
};

export type UnresolvedLine = {
  index: number;
  article: string;
  channel: string;
  amount: number;
  reason: string;
};

export type PipelineInput = {
  transactions: RawTransactionLine[];
  articles: RawArticle[];
  channels: RawChannel[];
};
