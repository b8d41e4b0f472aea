import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Message } from '@/lib/types';

const DEFAULT_SIZES = [10_000, 100_000];

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const sizes = args.sizes ?? DEFAULT_SIZES;
  const outputDir = resolve(args.outDir ?? '.bench');

  await mkdir(outputDir, { recursive: true });

  for (const size of sizes) {
    const outputPath = resolve(outputDir, `messages-${size}.jsonl`);
    await mkdir(dirname(outputPath), { recursive: true });

    const stream = createWriteStream(outputPath, { encoding: 'utf8' });

    for (let index = 0; index < size; index += 1) {
      const message = generateMessage(index);
      if (!stream.write(`${JSON.stringify(message)}\n`)) {
        await onceDrain(stream);
      }
    }

    await new Promise<void>((resolvePromise, reject) => {
      stream.on('error', reject);
      stream.end(() => resolvePromise());
    });

    console.log(`generated ${size} messages -> ${outputPath}`);
  }
}

export function generateMessage(index: number): Message {
  const color = pickOne(index, ['red', 'green', 'blue', 'white']);
  // Coprime steps keep the categories from cycling in lockstep.
  const region = pickOne(index * 5, ['emea', 'apac', 'amer']);
  const grade = pickOne(index * 7, ['A', 'B', 'C', 'D', 'E', 'F']);

  const properties: Message['properties'] = {
    color,
    region,
    weight: (index * 37) % 100,
    price: Math.round(((index * 13) % 1000) * 1.25) / 100,
    sku: `SKU-${String(index % 500).padStart(4, '0')}`,
    express: index % 4 === 0,
  };

  if (index % 3 !== 0) {
    properties.grade = grade;
  }

  return {
    messageId: `ID:bench-${String(index).padStart(9, '0')}`,
    correlationId: index % 10 === 0 ? `corr-${index / 10}` : null,
    priority: index % 10,
    deliveryMode: index % 2 === 0 ? 'persistent' : 'non_persistent',
    timestamp: 1_700_000_000_000 + index * 1000,
    type: pickOne(index * 11, ['order', 'quote', 'cancel']),
    redelivered: index % 50 === 0,
    properties,
  };
}

function pickOne<T>(seed: number, values: T[]): T {
  return values[Math.abs(seed) % values.length];
}

function parseArgs(argv: string[]): { sizes?: number[]; outDir?: string } {
  const parsed: { sizes?: number[]; outDir?: string } = {};

  for (const arg of argv) {
    if (arg.startsWith('--sizes=')) {
      const raw = arg.slice('--sizes='.length);
      parsed.sizes = raw
        .split(',')
        .map((value) => Number(value.trim()))
        .filter((value) => Number.isInteger(value) && value > 0);
      continue;
    }

    if (arg.startsWith('--out-dir=')) {
      parsed.outDir = arg.slice('--out-dir='.length);
    }
  }

  return parsed;
}

async function onceDrain(stream: ReturnType<typeof createWriteStream>): Promise<void> {
  await new Promise<void>((resolvePromise) => {
    stream.once('drain', () => resolvePromise());
  });
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
