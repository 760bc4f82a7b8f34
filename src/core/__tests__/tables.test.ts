import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { TableSources } from '../tables.js';
import { buildOutputTables } from '../tables.js';

const SOURCES: TableSources = {
  facts: [
    {
      article: 'A1',
      channel: 'NORTE',
      period: '2024-01',
      category: 'BEBIDAS',
      grossSale: 12_345_600,
      returnAmount: 5_600,
      netSale: 12_340_000,
      quantity: 2.5,
      lineCount: 3,
    },
  ],
  channels: [
    { channel: 'NORTE', type: 'PHYSICAL', grossSale: 12_345_600, returnAmount: 5_600, totalNetSale: 12_340_000, returnRate: 0.125 },
  ],
  categories: [{ category: 'BEBIDAS', totalNetSale: -500, articleCount: 1, contributionShare: 1 }],
  classes: [
    {
      article: 'A1',
      description: 'Agua; con gas',
      category: 'BEBIDAS',
      rank: 1,
      label: 'A',
      netSale: 12_340_000,
      grossSale: 12_345_600,
      returnAmount: 5_600,
      returnRate: 0.5,
      share: 1,
      cumulativeShare: 1,
    },
  ],
};

describe('buildOutputTables', () => {
  it('produces the four star-schema tables in a fixed order', () => {
    const tables = buildOutputTables(SOURCES, { decimalSeparator: ',' });
    assert.deepEqual(
      tables.map((table) => [table.name, table.fileName]),
      [
        ['DATA_BI', 'data_bi.csv'],
        ['DATA_CANALES', 'data_canales.csv'],
        ['DATA_CATEGORIAS', 'data_categorias.csv'],
        ['DIM_ARTICULOS', 'dim_articulos.csv'],
      ]
    );
  });

  it('formats money, ratios and quantities with the decimal separator', () => {
    const [bi, canales, categorias, articulos] = buildOutputTables(SOURCES, { decimalSeparator: ',' });

    assert.deepEqual(bi.headers, [
      'article',
      'channel',
      'period',
      'category',
      'gross_sale',
      'return_amount',
      'net_sale',
      'quantity',
    ]);
    assert.deepEqual(bi.rows, [['A1', 'NORTE', '2024-01', 'BEBIDAS', '1234,56', '0,56', '1234,00', '2,500']]);
    assert.deepEqual(canales.rows, [['NORTE', 'PHYSICAL', '1234,00', '0,1250']]);
    assert.deepEqual(categorias.rows, [['BEBIDAS', '-0,05', '1', '1,0000']]);
    assert.deepEqual(articulos.rows, [
      ['A1', 'Agua; con gas', 'BEBIDAS', '1', 'A', '1234,00', '1234,56', '0,56', '0,5000', '1,0000', '1,0000'],
    ]);
  });

  it('rounds money to cents only when rendering, half away from zero', () => {
    const sources: TableSources = {
      ...SOURCES,
      facts: [{ ...SOURCES.facts[0], grossSale: 12_340_050, returnAmount: 49, netSale: -12_340_050 }],
    };
    const [bi] = buildOutputTables(sources, { decimalSeparator: ',' });
    assert.deepEqual(bi.rows[0].slice(4, 7), ['1234,01', '0,00', '-1234,01']);
  });

  it('writes whole quantities without decimals', () => {
    const sources: TableSources = { ...SOURCES, facts: [{ ...SOURCES.facts[0], quantity: 3 }] };
    const [bi] = buildOutputTables(sources, { decimalSeparator: '.' });
    assert.deepEqual(bi.rows[0].slice(4), ['1234.56', '0.56', '1234.00', '3']);
  });

  it('emits header-only tables for an empty run', () => {
    const tables = buildOutputTables({ facts: [], channels: [], categories: [], classes: [] }, { decimalSeparator: ',' });
    for (const table of tables) {
      assert.deepEqual(table.rows, []);
      assert.ok(table.headers.length > 0);
    }
  });
});
