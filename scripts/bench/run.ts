import 'dotenv/config';

import { mkdir, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { performance } from 'node:perf_hooks';
import { fileURLToPath } from 'node:url';

import { getSelectorCache } from '@/daemon/selectorCache';
import { loadSelectorConfig } from '@/lib/config';

import { readMessages } from './dataset';

type Suite = {
  name: string;
  selector: string;
  note: string;
};

type RunSummary = {
  suite: string;
  messages: number;
  matched: number;
  compile_ms: number;
  total_ms: number;
  evals_per_sec: number;
};

const suites: Suite[] = [
  {
    name: 'color_and_weight',
    selector: "color = 'red' AND weight > 10",
    note: 'string equality plus numeric coercion',
  },
  {
    name: 'grade_in_list',
    selector: "grade IN ('A', 'B', 'C')",
    note: 'membership with missing properties',
  },
  {
    name: 'sku_like',
    selector: "sku LIKE 'SKU-01%'",
    note: 'prefix pattern',
  },
  {
    name: 'price_between_arith',
    selector: 'price * 2 BETWEEN 5 AND 10.5 OR JMSPriority >= 8',
    note: 'mixed exact and approximate arithmetic',
  },
  {
    name: 'headers_only',
    selector: "JMSDeliveryMode = 'PERSISTENT' AND JMSCorrelationID IS NOT NULL",
    note: 'standard header identifiers',
  },
];

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args.file) {
    throw new Error('Usage: npm run bench:run -- --file=.bench/messages-100000.jsonl [--out-dir=.bench]');
  }

  const config = loadSelectorConfig();
  const cache = getSelectorCache();
  const messages = await readMessages(args.file);

  const summaries: RunSummary[] = [];

  for (const suite of suites) {
    const compileStart = performance.now();
    const selector = cache.getOrCompile(suite.selector);
    const compileMs = performance.now() - compileStart;

    let matched = 0;
    const start = performance.now();
    for (const message of messages) {
      if (selector.filter(message)) {
        matched += 1;
      }
    }
    const totalMs = performance.now() - start;

    const summary: RunSummary = {
      suite: suite.name,
      messages: messages.length,
      matched,
      compile_ms: round(compileMs),
      total_ms: round(totalMs),
      evals_per_sec: Math.round((messages.length / totalMs) * 1000),
    };

    summaries.push(summary);
    console.log(summary);
  }

  const outputDir = resolve(args.outDir ?? '.bench');
  await mkdir(outputDir, { recursive: true });

  const outputPath = resolve(outputDir, `run-${Date.now()}.json`);
  await writeFile(
    outputPath,
    `${JSON.stringify(
      {
        generated_at: new Date().toISOString(),
        dataset: args.file,
        size: messages.length,
        config,
        suites,
        summaries,
      },
      null,
      2,
    )}\n`,
    'utf8',
  );

  console.log(`wrote benchmark summary to ${outputPath}`);
}

function round(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function parseArgs(argv: string[]): { file?: string; outDir?: string } {
  const parsed: { file?: string; outDir?: string } = {};

  for (const arg of argv) {
    if (arg.startsWith('--file=')) {
      parsed.file = arg.slice('--file='.length);
      continue;
    }

    if (arg.startsWith('--out-dir=')) {
      parsed.outDir = arg.slice('--out-dir='.length);
    }
  }

  return parsed;
}

const isMain = process.argv[1]
  ? resolve(process.argv[1]) === resolve(fileURLToPath(import.meta.url))
  : false;

if (isMain) {
  void main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
