import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { z } from 'zod';

const ContentBlockSchema = z.union([
  z.string(),
  z
    .object({
      type: z.string(),
      text: z.string().optional(),
      name: z.string().optional(),
      input: z.record(z.unknown()).optional(),
      content: z.unknown().optional(),
    })
    .passthrough(),
]);
type ContentBlock = z.infer<typeof ContentBlockSchema>;

const UsageSchema = z
  .object({
    input_tokens: z.number().default(0),
    output_tokens: z.number().default(0),
    cache_creation_input_tokens: z.number().default(0),
    cache_read_input_tokens: z.number().default(0),
  })
  .passthrough();

/** One line of an agent transcript; unknown fields are kept */
export const TranscriptEntrySchema = z
  .object({
    type: z.string(),
    timestamp: z.string().optional(),
    message: z
      .object({
        model: z.string().optional(),
        content: z.union([z.string(), z.array(ContentBlockSchema)]).optional(),
        usage: UsageSchema.optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
export type TranscriptEntry = z.infer<typeof TranscriptEntrySchema>;

export interface TrajectorySummary {
  /** User and assistant entries */
  turnCount: number;
  toolCalls: string[];
  toolSummary: Record<string, number>;
  durationSeconds: number | null;
  model: string | null;
  usage: {
    inputTokens: number;
    outputTokens: number;
    cacheCreationTokens: number;
    cacheReadTokens: number;
  };
}

const AssistantEntrySchema = z
  .object({
    type: z.literal('assistant'),
    message: z.object({ content: z.array(ContentBlockSchema).default([]) }).passthrough(),
  })
  .passthrough();

function expandHome(path: string): string {
  return path.startsWith('~/') ? `${homedir()}${path.slice(1)}` : path;
}

/** Text of one assistant transcript line, or null if the line carries none */
export function assistantText(line: string): string | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }

  const entry = AssistantEntrySchema.safeParse(raw);
  if (!entry.success) {
    return null;
  }

  const parts: string[] = [];
  for (const block of entry.data.message.content) {
    if (typeof block === 'string') {
      parts.push(block);
    } else if (block.type === 'text' && block.text !== undefined) {
      parts.push(block.text);
    }
  }
  return parts.length > 0 ? parts.join('\n') : null;
}

async function readTranscriptFile(transcriptPath: string): Promise<string | null> {
  try {
    return await readFile(expandHome(transcriptPath), 'utf-8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * Every parseable entry of a JSONL transcript, in order; a missing file
 * yields null.
 */
export async function readTranscript(transcriptPath: string): Promise<TranscriptEntry[] | null> {
  const content = await readTranscriptFile(transcriptPath);
  if (content === null) {
    return null;
  }

  const entries: TranscriptEntry[] = [];
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch {
      continue;
    }
    const entry = TranscriptEntrySchema.safeParse(raw);
    if (entry.success) {
      entries.push(entry.data);
    }
  }
  return entries;
}

export function contentBlocks(entry: TranscriptEntry): ContentBlock[] {
  const content = entry.message?.content;
  if (content === undefined) {
    return [];
  }
  return typeof content === 'string' ? [content] : content;
}

export function summarizeTrajectory(entries: TranscriptEntry[]): TrajectorySummary {
  const summary: TrajectorySummary = {
    turnCount: 0,
    toolCalls: [],
    toolSummary: {},
    durationSeconds: null,
    model: null,
    usage: { inputTokens: 0, outputTokens: 0, cacheCreationTokens: 0, cacheReadTokens: 0 },
  };
  let first: string | null = null;
  let last: string | null = null;

  for (const entry of entries) {
    if (entry.timestamp) {
      if (first === null) {
        first = entry.timestamp;
      }
      last = entry.timestamp;
    }
    if (entry.type === 'user' || entry.type === 'assistant') {
      summary.turnCount++;
    }
    if (entry.type !== 'assistant') continue;

    if (summary.model === null) {
      summary.model = entry.message?.model ?? null;
    }
    for (const block of contentBlocks(entry)) {
      if (typeof block !== 'string' && block.type === 'tool_use') {
        const name = block.name ?? 'unknown';
        summary.toolCalls.push(name);
        summary.toolSummary[name] = (summary.toolSummary[name] ?? 0) + 1;
      }
    }
    const usage = entry.message?.usage;
    if (usage) {
      summary.usage.inputTokens += usage.input_tokens;
      summary.usage.outputTokens += usage.output_tokens;
      summary.usage.cacheCreationTokens += usage.cache_creation_input_tokens;
      summary.usage.cacheReadTokens += usage.cache_read_input_tokens;
    }
  }

  if (first !== null && last !== null) {
    const span = Date.parse(last) - Date.parse(first);
    summary.durationSeconds = Number.isNaN(span) ? null : Math.floor(span / 1000);
  }
  return summary;
}

/**
 * Last assistant message of a JSONL transcript. Unparseable lines are
 * ignored; a missing file yields null.
 */
export async function extractFinalResponse(transcriptPath: string): Promise<string | null> {
  const content = await readTranscriptFile(transcriptPath);
  if (content === null) {
    return null;
  }

  let last: string | null = null;
  for (const line of content.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const text = assistantText(trimmed);
    if (text !== null) {
      last = text;
    }
  }
  return last;
}
