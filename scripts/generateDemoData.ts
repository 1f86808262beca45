/**
 * Генерирует демо-датасеты и печатает их размер и первые строки.
 * С --out записывает каждый датасет в CSV.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { format } from 'date-fns';
import type { DataTable } from '@shared/schema';
import { DEFAULT_RECORD_COUNT, listDemoCatalog, loadDemoDataset } from '../server/demo/registry';
import { DEFAULT_SEED } from '../server/demo/generator';
import { toCsvBuffer } from '../server/utils/csvExport';

interface CliArgs {
  outDir?: string;
  recordCount: number;
  seed: number;
  head: number;
}

function printUsage(): void {
  console.log(`Usage: tsx scripts/generateDemoData.ts [options]

Options:
  --count <n>   records in the detailed dataset (default ${DEFAULT_RECORD_COUNT})
  --seed <n>    generator seed (default ${DEFAULT_SEED})
  --head <n>    rows to print per dataset (default 5)
  --out <dir>   write <id>.csv files into <dir>
  -h, --help    show this message`);
}

function parseInteger(name: string, value: string | undefined, min: number): number {
  if (value === undefined) {
    throw new Error(`Missing value for ${name} option.`);
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${name} must be an integer >= ${min}.`);
  }
  return parsed;
}

function parseArgs(argv: string[]): CliArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const args: CliArgs = { recordCount: DEFAULT_RECORD_COUNT, seed: DEFAULT_SEED, head: 5 };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const value = argv[i + 1];

    switch (token) {
      case '--count':
        args.recordCount = parseInteger(token, value, 0);
        break;
      case '--seed':
        args.seed = parseInteger(token, value, Number.MIN_SAFE_INTEGER);
        break;
      case '--head':
        args.head = parseInteger(token, value, 0);
        break;
      case '--out':
        if (!value) {
          throw new Error('Missing value for --out option.');
        }
        args.outDir = path.resolve(process.cwd(), value);
        break;
      default:
        throw new Error(`Unknown option: ${token}`);
    }
    i += 1;
  }

  return args;
}

function previewRows(table: DataTable, head: number) {
  return table.rows.slice(0, head).map((row) =>
    Object.fromEntries(
      Object.entries(row).map(([key, value]) => [
        key,
        value instanceof Date ? format(value, 'yyyy-MM-dd') : value,
      ]),
    ),
  );
}

function main(): void {
  try {
    const args = parseArgs(process.argv.slice(2));
    const options = { recordCount: args.recordCount, seed: args.seed };

    if (args.outDir) {
      mkdirSync(args.outDir, { recursive: true });
    }

    for (const info of listDemoCatalog(options)) {
      const { label, table } = loadDemoDataset(info.id, options);
      console.log(`\n${label}`);
      console.log(`${info.description}`);
      console.log(`Shape: ${table.rows.length} × ${table.columns.length}`);
      if (args.head > 0 && table.rows.length > 0) {
        console.table(previewRows(table, args.head));
      }

      if (args.outDir) {
        const outputFile = path.join(args.outDir, `${info.id}.csv`);
        writeFileSync(outputFile, toCsvBuffer(table));
        console.log(`Saved: ${outputFile}`);
      }
    }
  } catch (error) {
    console.error('❌', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

main();
