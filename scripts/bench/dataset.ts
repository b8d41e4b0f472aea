import { createReadStream } from 'node:fs';
import { resolve } from 'node:path';
import readline from 'node:readline';

import { z } from 'zod';

import type { Message } from '@/lib/types';

const messageSchema = z.object({
  messageId: z.string().nullable().optional(),
  correlationId: z.string().nullable().optional(),
  priority: z.number().int().nullable().optional(),
  deliveryMode: z.enum(['persistent', 'non_persistent']).nullable().optional(),
  timestamp: z.number().int().nullable().optional(),
  type: z.string().nullable().optional(),
  redelivered: z.boolean().nullable().optional(),
  properties: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])),
});

/**
 * One JSONL line as written by `bench:generate`.
 */
export function parseMessageLine(line: string): Message {
  const parsed: unknown = JSON.parse(line);
  return messageSchema.parse(parsed);
}

export async function readMessages(file: string): Promise<Message[]> {
  const stream = createReadStream(resolve(file), { encoding: 'utf8' });
  const lineReader = readline.createInterface({ input: stream, crlfDelay: Infinity });

  const messages: Message[] = [];

  for await (const line of lineReader) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }

    messages.push(parseMessageLine(trimmed));
  }

  return messages;
}
