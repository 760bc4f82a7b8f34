import path from 'node:path';
import { promises as fsp } from 'node:fs';
import Papa from 'papaparse';
import { EMPTY_KEY, normalizeChannelType, normalizeKey } from '../core/normalizer.js';
import type { PipelineInput, RawArticle, RawChannel, RawTransactionLine } from '../types/pipeline.js';

type SourceField =
  | 'article'
  | 'description'
  | 'category'
  | 'channel'
  | 'channelType'
  | 'quantity'
  | 'unitPrice'
  | 'unitCost'
  | 'amount'
  | 'timestamp';

type FileRole = 'transactions' | 'articles' | 'channels';

export type SourceFile = {
  name: string;
  text: string;
};

export type LoadedFileNote = {
  name: string;
  role: FileRole;
  headerRow: number;
  columns: Partial<Record<SourceField, string>>;
  rows: number;
  summaryRowsDropped: number;
};

export type LoadNotes = {
  files: LoadedFileNote[];
  summaryRowsDropped: number;
  derived: Array<'articles' | 'channels'>;
};

export type LoadedSources = PipelineInput & { notes: LoadNotes };

const ARTICLE_FILES = new Set(['articles', 'articulos', 'dim_articulos']);
const CHANNEL_FILES = new Set(['channels', 'canales', 'sucursales', 'dim_sucursales']);
const HEADER_SEARCH_ROWS = 4;
const SUMMARY_ROW = /\b(GRAND TOTAL|GRAN TOTAL|TOTAL GENERAL|SUBTOTAL|TOTAL)\b/i;

function foldHeader(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

const has = (column: string, ...needles: string[]) => needles.some((needle) => column.includes(needle));

/** First match wins, so the more specific rules come first. */
function matchColumn(header: string): SourceField | null {
  const column = foldHeader(header);
  if (!column) return null;
  if (has(column, 'fecha', 'date', 'timestamp')) return 'timestamp';
  if (column === 'tipo' || column === 'type' || has(column, 'tipo canal', 'channel type', 'tipo sucursal')) {
    return 'channelType';
  }
  if (has(column, 'desc', 'nombre', 'name')) return 'description';
  if (has(column, 'categ', 'rubro', 'familia')) return 'category';
  if (has(column, 'sucursal', 'canal', 'channel', 'store', 'tienda')) return 'channel';
  if (
    (column.includes('total') && has(column, 'prec', 'venta', 'importe')) ||
    column === 'total' ||
    has(column, 'importe', 'amount', 'monto')
  ) {
    return 'amount';
  }
  if (has(column, 'cant', 'qty', 'quantity') && !column.includes('total')) return 'quantity';
  if (has(column, 'costo', 'cost')) return 'unitCost';
  if (has(column, 'precio', 'price', 'unit')) return 'unitPrice';
  if (has(column, 'art', 'prod', 'codigo', 'sku', 'item')) return 'article';
  return null;
}

function mapColumns(header: string[]): Map<SourceField, number> {
  const columns = new Map<SourceField, number>();
  header.forEach((cell, index) => {
    const field = matchColumn(cell);
    if (field && !columns.has(field)) {
      columns.set(field, index);
    }
  });
  return columns;
}

function detectHeaderRow(rows: string[][]): number {
  const limit = Math.min(rows.length, HEADER_SEARCH_ROWS);
  for (let index = 0; index < limit; index += 1) {
    if (mapColumns(rows[index]).size >= 2) return index;
  }
  return 0;
}

export function decodeSource(buffer: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    return buffer.toString('latin1');
  }
}

function fileRole(name: string): FileRole {
  const stem = foldHeader(path.parse(name).name);
  if (ARTICLE_FILES.has(stem)) return 'articles';
  if (CHANNEL_FILES.has(stem)) return 'channels';
  return 'transactions';
}

type ParsedTable = {
  header: string[];
  columns: Map<SourceField, number>;
  headerRow: number;
  rows: string[][];
};

function parseTable(file: SourceFile): ParsedTable {
  // `;` first: with comma decimals a `,` split can look consistent too.
  const parsed = Papa.parse<string[]>(file.text, { skipEmptyLines: 'greedy', delimitersToGuess: [';', ',', '\t', '|'] });
  const headerRow = detectHeaderRow(parsed.data);
  const header = parsed.data[headerRow] ?? [];
  return {
    header,
    columns: mapColumns(header),
    headerRow,
    rows: parsed.data.slice(headerRow + 1),
  };
}

function cell(row: string[], columns: Map<SourceField, number>, field: SourceField): string | undefined {
  const index = columns.get(field);
  if (index === undefined) return undefined;
  const value = row[index];
  return value === undefined ? undefined : value.trim();
}

function columnNames(header: string[], columns: Map<SourceField, number>): LoadedFileNote['columns'] {
  const names: LoadedFileNote['columns'] = {};
  for (const [field, index] of columns) {
    names[field] = header[index] ?? '';
  }
  return names;
}

/** `ventas_sucursal_norte.csv` sells through channel `ventas sucursal norte`. */
export function channelFromFileName(name: string): string {
  return path.parse(name).name.replace(/_+/g, ' ').trim();
}

function isSummaryRow(article: string | undefined, description: string | undefined): boolean {
  return SUMMARY_ROW.test(article ?? '') || SUMMARY_ROW.test(description ?? '');
}

/**
 * Turns CSV extracts into pipeline input. Transaction files without a channel
 * column take the file name as channel; missing dimension files are derived
 * from the transactions and listed in `notes.derived`.
 */
export function parseSources(files: SourceFile[]): LoadedSources {
  const transactions: RawTransactionLine[] = [];
  const articles: RawArticle[] = [];
  const channels: RawChannel[] = [];
  const notes: LoadNotes = { files: [], summaryRowsDropped: 0, derived: [] };
  let sawArticles = false;
  let sawChannels = false;

  const ordered = [...files].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const file of ordered) {
    const role = fileRole(file.name);
    const table = parseTable(file);
    const { header, columns } = table;
    const note: LoadedFileNote = {
      name: file.name,
      role,
      headerRow: table.headerRow,
      columns: columnNames(header, columns),
      rows: 0,
      summaryRowsDropped: 0,
    };

    const requiredField: SourceField = role === 'channels' ? 'channel' : 'article';
    if (!columns.has(requiredField)) {
      throw new Error(`${file.name}: no ${requiredField} column found in header row ${table.headerRow + 1}`);
    }

    for (const row of table.rows) {
      const article = cell(row, columns, 'article');
      const description = cell(row, columns, 'description');
      if (role !== 'channels' && isSummaryRow(article, description)) {
        note.summaryRowsDropped += 1;
        continue;
      }

      if (role === 'articles') {
        articles.push({
          article,
          description,
          category: cell(row, columns, 'category'),
          unitCost: cell(row, columns, 'unitCost'),
        });
      } else if (role === 'channels') {
        channels.push({ channel: cell(row, columns, 'channel'), type: cell(row, columns, 'channelType') });
      } else {
        transactions.push({
          article,
          description,
          channel: columns.has('channel') ? cell(row, columns, 'channel') : channelFromFileName(file.name),
          category: cell(row, columns, 'category'),
          unitPrice: cell(row, columns, 'unitPrice'),
          quantity: cell(row, columns, 'quantity'),
          amount: cell(row, columns, 'amount'),
          timestamp: cell(row, columns, 'timestamp'),
        });
      }
      note.rows += 1;
    }

    if (role === 'articles') sawArticles = true;
    if (role === 'channels') sawChannels = true;
    notes.summaryRowsDropped += note.summaryRowsDropped;
    notes.files.push(note);
  }

  if (!sawArticles) {
    articles.push(...deriveArticles(transactions));
    notes.derived.push('articles');
  }
  if (!sawChannels) {
    channels.push(...deriveChannels(transactions));
    notes.derived.push('channels');
  }

  return { transactions, articles, channels, notes };
}

export function deriveArticles(transactions: RawTransactionLine[]): RawArticle[] {
  const seen = new Map<string, RawArticle>();
  for (const line of transactions) {
    const key = normalizeKey(line.article);
    if (key === EMPTY_KEY || seen.has(key)) continue;
    seen.set(key, { article: key, description: line.description, category: line.category });
  }
  return [...seen.values()];
}

export function deriveChannels(transactions: RawTransactionLine[]): RawChannel[] {
  const seen = new Map<string, RawChannel>();
  for (const line of transactions) {
    const key = normalizeKey(line.channel);
    if (key === EMPTY_KEY || seen.has(key)) continue;
    seen.set(key, { channel: key, type: normalizeChannelType(undefined, key) });
  }
  return [...seen.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)).map(([, channel]) => channel);
}

export async function loadSourceDirectory(dir: string): Promise<LoadedSources> {
  const entries = await fsp.readdir(dir, { withFileTypes: true });
  const csvFiles = entries.filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === '.csv');
  if (!csvFiles.length) {
    throw new Error(`no CSV files found in ${dir}`);
  }

  const files: SourceFile[] = [];
  for (const entry of csvFiles) {
    const buffer = await fsp.readFile(path.join(dir, entry.name));
    files.push({ name: entry.name, text: decodeSource(buffer) });
  }
  return parseSources(files);
}
