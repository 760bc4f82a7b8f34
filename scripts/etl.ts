#!/usr/bin/env node
// Runs the star-schema pipeline once over a directory of CSV extracts.
//   tsx scripts/etl.ts <source-dir> <destination.zip> [--config etl.yaml] [--policy quarantine]
import 'dotenv/config';
import path from 'node:path';
import { loadConfig } from '../src/config.js';
import { consoleLogger, runPipeline } from '../src/services/pipeline.js';
import { loadSourceDirectory } from '../src/services/source-loader.js';

const USAGE = 'usage: etl <source-dir> <destination.zip> [--config file.yaml] [--policy abort|quarantine]';

type CliArgs = {
  sourceDir: string;
  destination: string;
  configPath?: string;
  overrides: Record<string, string>;
};

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let configPath: string | undefined;
  const overrides: Record<string, string> = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    const value = argv[index + 1];
    if (arg === '--config' || arg === '--policy') {
      if (value === undefined) throw new Error(`${arg} needs a value\n${USAGE}`);
      if (arg === '--config') configPath = value;
      else overrides.unresolved_policy = value;
      index += 1;
    } else {
      positional.push(arg);
    }
  }

  const [sourceDir, destination] = positional;
  if (!sourceDir || !destination || positional.length > 2) {
    throw new Error(USAGE);
  }
  return { sourceDir: path.resolve(sourceDir), destination: path.resolve(destination), configPath, overrides };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig({ configPath: args.configPath, overrides: args.overrides });
  const sources = await loadSourceDirectory(args.sourceDir);
  consoleLogger(
    'info',
    `Loaded ${sources.transactions.length} transaction lines from ${sources.notes.files.length} files`
  );

  const outcome = await runPipeline(sources, {
    config,
    destination: args.destination,
    notes: sources.notes,
  });

  if (outcome.status === 'completed') {
    console.log(JSON.stringify({ status: outcome.status, output: outcome.output }, null, 2));
    return;
  }
  console.error(JSON.stringify({ status: outcome.status, stage: outcome.stage, error: outcome.error.toJSON() }, null, 2));
  process.exitCode = outcome.status === 'rejected' ? 2 : 1;
}

main().catch((error: unknown) => {
  console.error('[etl]', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
