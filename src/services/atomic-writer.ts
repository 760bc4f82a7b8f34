import { promises as fsp, createWriteStream, createReadStream } from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { randomUUID, createHash } from 'node:crypto';
import archiver from 'archiver';
import extract from 'extract-zip';
import Papa from 'papaparse';
import { WriteFailure } from '../errors.js';
import type { OutputTable } from '../core/tables.js';

export type Attachment = {
  name: string;
  content: string;
};

export type WriteOptions = {
  delimiter: string;
  attachments?: Attachment[];
  signal?: AbortSignal;
  /** Runs once the staged archive has been verified, right before it replaces the destination. */
  beforeReplace?: (stagedPath: string) => Promise<void> | void;
};

export type WrittenTable = {
  name: string;
  fileName: string;
  rows: number;
};

export type WriteResult = {
  destination: string;
  sizeBytes: number;
  checksum: string;
  tables: WrittenTable[];
  attachments: string[];
};

export function serializeTable(table: OutputTable, delimiter: string): string {
  return Papa.unparse({ fields: table.headers, data: table.rows }, { delimiter, newline: '\n' });
}

async function createZipArchive(sourceFiles: { path: string; name: string }[], destination: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const output = createWriteStream(destination);
    const archive = archiver('zip', { zlib: { level: 9 } });

    output.on('close', resolve);
    output.on('error', reject);
    archive.on('error', reject);

    archive.pipe(output);

    for (const file of sourceFiles) {
      archive.file(file.path, { name: file.name });
    }

    archive.finalize().catch(reject);
  });
}

export async function computeChecksum(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  const stream = createReadStream(filePath);

  return new Promise<string>((resolve, reject) => {
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', reject);
  });
}

async function readEntry(dir: string, name: string): Promise<string> {
  try {
    return await fsp.readFile(path.join(dir, name), 'utf8');
  } catch (error) {
    throw new Error(`entry ${name} missing from staged archive`, { cause: error });
  }
}

async function verifyArchive(
  archivePath: string,
  verifyDir: string,
  tables: OutputTable[],
  attachments: Attachment[],
  delimiter: string
): Promise<void> {
  const stats = await fsp.stat(archivePath);
  if (stats.size === 0) {
    throw new Error('staged archive is empty');
  }

  await extract(archivePath, { dir: verifyDir });

  for (const table of tables) {
    const text = await readEntry(verifyDir, table.fileName);
    const parsed = Papa.parse<string[]>(text, { delimiter, skipEmptyLines: true });
    if (parsed.errors.length) {
      throw new Error(`${table.fileName} does not parse: ${parsed.errors[0].message}`);
    }
    const [header = [], ...rows] = parsed.data;
    if (header.join('\u0000') !== table.headers.join('\u0000')) {
      throw new Error(`${table.fileName} header mismatch`);
    }
    if (rows.length !== table.rows.length) {
      throw new Error(`${table.fileName} has ${rows.length} data rows, expected ${table.rows.length}`);
    }
  }

  for (const attachment of attachments) {
    const content = await readEntry(verifyDir, attachment.name);
    if (content !== attachment.content) {
      throw new Error(`${attachment.name} content mismatch`);
    }
  }
}

/**
 * Writes every table (and attachment) into one zip archive next to the
 * destination, re-reads and checks it, then renames it into place. The
 * destination is either the previous file or the complete new one; a failure
 * at any step leaves it untouched and removes the staged files.
 */
export async function writeTablesAtomically(
  tables: OutputTable[],
  destination: string,
  { delimiter, attachments = [], signal, beforeReplace }: WriteOptions
): Promise<WriteResult> {
  const target = path.resolve(destination);
  const targetDir = path.dirname(target);
  // Same directory as the target so the final rename never crosses filesystems.
  const stagedPath = path.join(targetDir, `.${path.basename(target)}.${randomUUID().slice(0, 8)}.tmp`);
  let stagingDir: string | null = null;
  let verifyDir: string | null = null;

  try {
    signal?.throwIfAborted();
    await fsp.mkdir(targetDir, { recursive: true });
    stagingDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'etl-stage-'));

    const entries: { path: string; name: string }[] = [];
    for (const table of tables) {
      const filePath = path.join(stagingDir, table.fileName);
      await fsp.writeFile(filePath, serializeTable(table, delimiter), 'utf8');
      entries.push({ path: filePath, name: table.fileName });
    }
    for (const attachment of attachments) {
      const filePath = path.join(stagingDir, attachment.name);
      await fsp.writeFile(filePath, attachment.content, 'utf8');
      entries.push({ path: filePath, name: attachment.name });
    }

    await createZipArchive(entries, stagedPath);

    verifyDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'etl-verify-'));
    await verifyArchive(stagedPath, verifyDir, tables, attachments, delimiter);

    const stats = await fsp.stat(stagedPath);
    const checksum = await computeChecksum(stagedPath);

    await beforeReplace?.(stagedPath);
    signal?.throwIfAborted();
    await fsp.rename(stagedPath, target);

    return {
      destination: target,
      sizeBytes: stats.size,
      checksum,
      tables: tables.map((table) => ({ name: table.name, fileName: table.fileName, rows: table.rows.length })),
      attachments: attachments.map((attachment) => attachment.name),
    };
  } catch (error) {
    if (error instanceof WriteFailure) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new WriteFailure(target, message, { cause: error });
  } finally {
    await fsp.rm(stagedPath, { force: true });
    if (stagingDir) await fsp.rm(stagingDir, { recursive: true, force: true });
    if (verifyDir) await fsp.rm(verifyDir, { recursive: true, force: true });
  }
}
