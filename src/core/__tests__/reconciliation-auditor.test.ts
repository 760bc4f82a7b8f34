import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { DEFAULT_CONFIG } from '../../config.js';
import { ReconciliationMismatch } from '../../errors.js';
import type { FactRecord, NormalizationWarning, RawTransactionLine } from '../../types/pipeline.js';
import { formatMoney, fromMoney, toMoney } from '../../utils/numbers.js';
import { consolidateFacts, indexDimensions } from '../fact-consolidator.js';
import { normalizeArticles, normalizeChannels, normalizeTransactions } from '../normalizer.js';
import { auditRun, findReturnRateOutliers, findZeroPriceLines, mismatchError, reconcile } from '../reconciliation-auditor.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const ARTICLES = ['A1', 'A2', 'A3', 'A4', 'A5'];
const CHANNELS = ['NORTE', 'SUR', 'ONLINE'];

const dimensions = indexDimensions(
  normalizeArticles(ARTICLES.map((article) => ({ article, category: 'GENERAL' }))).records,
  normalizeChannels(CHANNELS.map((channel) => ({ channel }))).records
);

function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randomLines(seed: number, count: number): RawTransactionLine[] {
  const random = mulberry32(seed);
  const pick = <T>(items: T[]): T => items[Math.floor(random() * items.length)];
  const lines: RawTransactionLine[] = [];
  for (let index = 0; index < count; index += 1) {
    const cents = Math.floor(random() * 25000) - 5000;
    const quantity = 1 + Math.floor(random() * 5);
    lines.push({
      article: pick(ARTICLES).toLowerCase(),
      channel: pick(CHANNELS),
      unitPrice: Math.abs(cents) / 100 / quantity,
      quantity,
      // Half the lines arrive as comma-decimal strings.
      amount: index % 2 ? formatMoney(cents * 100, ',') : cents / 100,
      timestamp: `2024-${String(1 + Math.floor(random() * 12)).padStart(2, '0')}-10`,
    });
  }
  return lines;
}

/** Three-decimal amounts; every fourth sale is followed by its refund. */
function randomMillLines(seed: number, count: number): { raw: RawTransactionLine[]; amounts: number[] } {
  const random = mulberry32(seed);
  const pick = <T>(items: T[]): T => items[Math.floor(random() * items.length)];
  const raw: RawTransactionLine[] = [];
  const amounts: number[] = [];
  const push = (line: Omit<RawTransactionLine, 'amount'>, amount: number, asText: boolean) => {
    raw.push({ ...line, amount: asText ? amount.toFixed(3).replace('.', ',') : amount });
    amounts.push(amount);
  };
  for (let index = 0; index < count; index += 1) {
    const amount = (Math.floor(random() * 250000) - 50000) / 1000;
    const line = {
      article: pick(ARTICLES),
      channel: pick(CHANNELS),
      unitPrice: Math.abs(amount),
      quantity: 1,
      timestamp: `2024-${String(1 + Math.floor(random() * 12)).padStart(2, '0')}-10T12:00`,
    };
    push(line, amount, index % 3 === 0);
    if (index % 4 === 0) {
      push({ ...line, quantity: -1 }, -amount, index % 8 === 0);
    }
  }
  return { raw, amounts };
}

function consolidate(raw: RawTransactionLine[]) {
  const lines = normalizeTransactions(raw, { reportingPeriod: 'month' }).records;
  return consolidateFacts(lines, dimensions, { unresolvedPolicy: 'abort' });
}

function fact(article: string, channel: string, grossSale: number, returnAmount: number): FactRecord {
  return {
    article,
    channel,
    period: '2024-01',
    category: 'GENERAL',
    grossSale,
    returnAmount,
    netSale: grossSale - returnAmount,
    quantity: 1,
    lineCount: 1,
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('reconcile', () => {
  it('reconciles exactly on randomly generated consistent data', () => {
    for (let seed = 1; seed <= 25; seed += 1) {
      const { resolvedLines, facts } = consolidate(randomLines(seed, 200));
      const result = reconcile(resolvedLines, facts, DEFAULT_CONFIG);
      assert.equal(result.status, 'RECONCILED', `seed ${seed}`);
      assert.equal(result.delta, 0, `seed ${seed}`);
      assert.equal(result.sourceTotal, result.factTotal, `seed ${seed}`);
    }
  });

  it('conserves three-decimal amounts and refunds against the plain sum', () => {
    for (let seed = 1; seed <= 25; seed += 1) {
      const { raw, amounts } = randomMillLines(seed, 200);
      const { resolvedLines, facts } = consolidate(raw);
      const plainSum = amounts.reduce((sum, amount) => sum + amount, 0);
      const netSale = fromMoney(facts.reduce((sum, entry) => sum + entry.netSale, 0));

      assert.ok(Math.abs(netSale - plainSum) <= DEFAULT_CONFIG.reconciliationEpsilon, `seed ${seed}`);
      const result = reconcile(resolvedLines, facts, DEFAULT_CONFIG);
      assert.equal(result.status, 'RECONCILED', `seed ${seed}`);
      assert.equal(result.delta, 0, `seed ${seed}`);
    }
  });

  it('nets a half-cent sale and its refund to zero', () => {
    const { resolvedLines, facts } = consolidate([
      { article: 'A1', channel: 'NORTE', unitPrice: 0.125, quantity: 1, amount: 0.125, timestamp: '2024-01-02' },
      { article: 'A1', channel: 'NORTE', unitPrice: 0.125, quantity: -1, amount: -0.125, timestamp: '2024-01-02' },
    ]);

    const result = reconcile(resolvedLines, facts, DEFAULT_CONFIG);
    assert.equal(facts[0].netSale, 0);
    assert.equal(result.sourceTotal, 0);
    assert.equal(result.factTotal, 0);
    assert.equal(result.status, 'RECONCILED');
  });

  it('keeps half cents across many lines and catches facts rounded per line', () => {
    const raw = Array.from({ length: 1000 }, (): RawTransactionLine => ({
      article: 'A2',
      channel: 'SUR',
      unitPrice: 1.005,
      quantity: 1,
      amount: '1,005',
      timestamp: '2024-05-10',
    }));
    const { resolvedLines, facts } = consolidate(raw);

    const result = reconcile(resolvedLines, facts, DEFAULT_CONFIG);
    assert.equal(result.sourceTotal, 1005);
    assert.equal(result.factTotal, 1005);
    assert.equal(result.status, 'RECONCILED');

    const roundedPerLine = facts.map((entry) => ({ ...entry, grossSale: 1000 * toMoney(1), netSale: 1000 * toMoney(1) }));
    const lossy = reconcile(resolvedLines, roundedPerLine, DEFAULT_CONFIG);
    assert.equal(lossy.status, 'MISMATCH');
    assert.equal(lossy.delta, 5);
  });

  it('reports a tampered fact as the exact delta', () => {
    const { resolvedLines, facts } = consolidate(randomLines(7, 50));
    const tampered = facts.map((entry, index) => (index === 0 ? { ...entry, netSale: entry.netSale - toMoney(12.34) } : entry));

    const result = reconcile(resolvedLines, tampered, DEFAULT_CONFIG);
    assert.equal(result.status, 'MISMATCH');
    assert.equal(result.delta, 12.34);
  });

  it('reports an amount altered after consolidation as the exact delta', () => {
    const { resolvedLines, facts } = consolidate([
      { article: 'A1', channel: 'NORTE', unitPrice: 10.5, quantity: 1, amount: 10.5, timestamp: '2024-01-02' },
      { article: 'A2', channel: 'SUR', unitPrice: 3, quantity: 1, amount: -3, timestamp: '2024-01-03' },
    ]);
    const altered = resolvedLines.map((line, index) => (index === 0 ? { ...line, amount: line.amount + 0.5 } : line));

    const result = reconcile(altered, facts, DEFAULT_CONFIG);
    assert.equal(result.status, 'MISMATCH');
    assert.equal(result.delta, 0.5);
    assert.equal(result.sourceTotal, 8);
    assert.equal(result.factTotal, 7.5);
  });

  it('accepts a discrepancy within epsilon', () => {
    const { resolvedLines, facts } = consolidate(randomLines(3, 20));
    const tampered = facts.map((entry, index) => (index === 0 ? { ...entry, netSale: entry.netSale + toMoney(0.01) } : entry));

    const result = reconcile(resolvedLines, tampered, DEFAULT_CONFIG);
    assert.equal(result.delta, -0.01);
    assert.equal(result.status, 'RECONCILED');
    assert.equal(reconcile(resolvedLines, tampered, { reconciliationEpsilon: 0 }).status, 'MISMATCH');
  });
});

describe('findZeroPriceLines', () => {
  it('flags near-zero prices but keeps them in the totals', () => {
    const { resolvedLines, facts } = consolidate([
      { article: 'A1', channel: 'NORTE', unitPrice: 0.01, quantity: 3, amount: 0.03, timestamp: '2024-01-02' },
      { article: 'A2', channel: 'NORTE', unitPrice: 5, quantity: 2, amount: 10, timestamp: '2024-01-02' },
      { article: 'A3', channel: 'NORTE', unitPrice: 0, quantity: 0, amount: 0, timestamp: '2024-01-02' },
    ]);

    assert.deepEqual(findZeroPriceLines(resolvedLines, DEFAULT_CONFIG), [
      { kind: 'zero-price', index: 0, article: 'A1', channel: 'NORTE', unitPrice: 0.01, quantity: 3, amount: 0.03 },
    ]);

    const audit = auditRun(resolvedLines, facts, DEFAULT_CONFIG);
    assert.equal(audit.status, 'RECONCILED');
    assert.equal(audit.sourceTotal, 10.03);
    assert.equal(audit.factTotal, 10.03);
    assert.equal(audit.anomalies.length, 1);
  });
});

describe('findZeroPriceLines without a price column', () => {
  it('leaves lines whose price fell back to 0 to the normalization warnings', () => {
    const { resolvedLines } = consolidate([
      { article: 'A1', channel: 'NORTE', unitPrice: undefined, quantity: 2, amount: 8, timestamp: '2024-01-02' },
      { article: 'A2', channel: 'NORTE', unitPrice: '', quantity: 1, amount: 4, timestamp: '2024-01-02' },
      { article: 'A3', channel: 'NORTE', unitPrice: '0,00', quantity: 1, amount: 0, timestamp: '2024-01-02' },
    ]);

    assert.deepEqual(
      findZeroPriceLines(resolvedLines, DEFAULT_CONFIG).map((anomaly) => anomaly.index),
      [2]
    );
  });
});

describe('findReturnRateOutliers', () => {
  it('flags channels and articles above the global rate times the multiplier', () => {
    const facts = [fact('A1', 'NORTE', 10000, 500), fact('A2', 'NORTE', 10000, 0), fact('A3', 'SUR', 1000, 600)];
    const globalReturnRate = 1100 / 21000;
    const limit = globalReturnRate * 2;

    assert.deepEqual(findReturnRateOutliers(facts, DEFAULT_CONFIG), [
      { kind: 'return-rate-outlier', scope: 'channel', code: 'SUR', returnRate: 0.6, globalReturnRate, limit },
      { kind: 'return-rate-outlier', scope: 'article', code: 'A3', returnRate: 0.6, globalReturnRate, limit },
    ]);
  });

  it('flags nothing without returns', () => {
    assert.deepEqual(findReturnRateOutliers([fact('A1', 'NORTE', 100, 0)], DEFAULT_CONFIG), []);
  });
});

describe('auditRun', () => {
  it('lists earlier flags before its own', () => {
    const warning: NormalizationWarning = {
      kind: 'normalization',
      source: 'transaction',
      index: 4,
      field: 'timestamp',
      raw: 'x',
      message: 'timestamp could not be parsed; period left empty',
    };
    const { resolvedLines, facts } = consolidate([
      { article: 'A1', channel: 'NORTE', unitPrice: 0, quantity: 1, amount: 0, timestamp: '2024-01-02' },
    ]);

    const audit = auditRun(resolvedLines, facts, DEFAULT_CONFIG, [warning]);
    assert.deepEqual(
      audit.anomalies.map((anomaly) => anomaly.kind),
      ['normalization', 'zero-price']
    );
  });
});

describe('mismatchError', () => {
  it('is null for a reconciled audit and carries the totals otherwise', () => {
    const base = { sourceTotal: 10, factTotal: 10, delta: 0, epsilon: 0.01, anomalies: [] };
    assert.equal(mismatchError({ ...base, status: 'RECONCILED' }), null);

    const error = mismatchError({ ...base, status: 'MISMATCH', factTotal: 9.5, delta: 0.5 });
    assert.ok(error instanceof ReconciliationMismatch);
    assert.equal(error.code, 'RECONCILIATION_MISMATCH');
    assert.equal(error.delta, 0.5);
    assert.equal(error.message, 'source total 10 and fact total 9.5 differ by 0.5 (epsilon 0.01)');
  });
});
