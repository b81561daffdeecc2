import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { z } from 'zod';

import {
  CollaboratorUnavailableError,
  getErrorMessage,
  isObjectRecord,
} from '../lib/errors.js';
import { formatHistory, formatStackTree } from '../lib/formatting.js';
import { parseEmbeddedJson } from '../lib/json.js';
import { truncate } from '../lib/text.js';
import type {
  ChatMessage,
  ContinuityVerdict,
  FrameSummary,
  SelectionDecision,
} from '../lib/types.js';

import {
  DEFAULT_COLLABORATOR_MAX_TOKENS,
  DEFAULT_COLLABORATOR_TIMEOUT_MS,
} from './config.js';

export type CollaboratorPurpose = 'selection' | 'continuity';

export interface CollaboratorPrompt {
  readonly purpose: CollaboratorPurpose;
  readonly system: string;
  readonly user: string;
}

export interface CompletionOptions {
  readonly signal?: AbortSignal;
}

/** The reasoning model consulted for tool selection and topic continuity. */
export interface Collaborator {
  complete(
    prompt: CollaboratorPrompt,
    options?: CompletionOptions
  ): Promise<string>;
}

const FALLBACK_REPLY = "I'm not sure how to help with that.";
const NO_HISTORY = '(no earlier messages)';
const MAX_PROMPT_MESSAGE_BYTES = 2000;

const SELECTION_SYSTEM_PROMPT = [
  'You route chat requests to tools.',
  'Reply with a single JSON object and nothing else:',
  '{"tool": "<tool name>", "arguments": {"<parameter>": <value>}} to use a tool,',
  '{"tool": null, "reply": "<your answer>"} to answer without a tool.',
  'Only name tools from the list. Omit arguments the user has not given.',
].join('\n');

const CONTINUITY_SYSTEM_PROMPT = [
  'A tool workflow is in progress. Decide whether the new message continues it',
  '(answers its question, clarifies it) or starts an unrelated topic.',
  'Reply with a single JSON object and nothing else:',
  '{"verdict": "related"} or {"verdict": "unrelated"}',
].join('\n');

const argumentsSchema = z.record(z.string(), z.unknown());

const decisionSchema = z.object({
  tool: z.string().trim().min(1).nullable().optional(),
  arguments: argumentsSchema.optional(),
  parameters: argumentsSchema.optional(),
  reply: z.string().optional(),
});

const toolCallSchema = z.object({
  tool_call: z.object({
    name: z.string().trim().min(1),
    parameters: argumentsSchema.optional(),
  }),
});

const verdictSchema = z.object({
  verdict: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['related', 'unrelated'])),
});

export interface SelectionPromptInput {
  readonly request: string;
  readonly history: readonly ChatMessage[];
  readonly toolSummary: string;
  /** Appended when a previous answer has to be corrected. */
  readonly guidance?: string;
}

export interface ContinuityPromptInput {
  readonly text: string;
  readonly history: readonly ChatMessage[];
  readonly originalRequest: string | undefined;
  readonly frames: readonly FrameSummary[];
}

function renderHistory(history: readonly ChatMessage[]): string {
  if (history.length === 0) {
    return NO_HISTORY;
  }
  return formatHistory(
    history.map((message) => ({
      ...message,
      content: truncate(message.content, MAX_PROMPT_MESSAGE_BYTES),
    }))
  );
}

export function renderSelectionPrompt(
  input: SelectionPromptInput
): CollaboratorPrompt {
  const sections = [
    `Available tools:\n${input.toolSummary}`,
    `Conversation so far:\n${renderHistory(input.history)}`,
    `User request:\n${input.request}`,
  ];
  if (input.guidance !== undefined) {
    sections.push(`Note: ${input.guidance}`);
  }
  return {
    purpose: 'selection',
    system: SELECTION_SYSTEM_PROMPT,
    user: sections.join('\n\n'),
  };
}

export function renderContinuityPrompt(
  input: ContinuityPromptInput
): CollaboratorPrompt {
  const sections = [
    `Workflow started by:\n${input.originalRequest ?? '(unknown)'}`,
    `Tool stack:\n${formatStackTree(input.frames)}`,
    `Conversation so far:\n${renderHistory(input.history)}`,
    `New message:\n${input.text}`,
  ];
  return {
    purpose: 'continuity',
    system: CONTINUITY_SYSTEM_PROMPT,
    user: sections.join('\n\n'),
  };
}

function plainReply(raw: string): SelectionDecision {
  const text = raw.trim();
  return { kind: 'no_tool', reply: text.length > 0 ? text : FALLBACK_REPLY };
}

/**
 * Reads a selection decision. Anything that is not a recognisable decision
 * object is treated as a direct answer to the user.
 */
export function parseSelectionDecision(raw: string): SelectionDecision {
  const value = parseEmbeddedJson(raw);
  if (value === undefined) {
    return plainReply(raw);
  }

  const call = toolCallSchema.safeParse(value);
  if (call.success) {
    return {
      kind: 'use_tool',
      tool: call.data.tool_call.name,
      args: call.data.tool_call.parameters ?? {},
    };
  }

  const decision = decisionSchema.safeParse(value);
  if (!decision.success) {
    return malformedDecisionReply(value, raw);
  }
  const { tool, reply } = decision.data;
  if (typeof tool === 'string') {
    return {
      kind: 'use_tool',
      tool,
      args: decision.data.arguments ?? decision.data.parameters ?? {},
    };
  }
  if (reply !== undefined) {
    return plainReply(reply);
  }
  return malformedDecisionReply(value, raw);
}

/**
 * A decision object that cannot be used is never echoed to the user; only its
 * reply text is. Prose that merely contains some other JSON stays a reply.
 */
function malformedDecisionReply(value: unknown, raw: string): SelectionDecision {
  if (!isObjectRecord(value)) {
    return plainReply(raw);
  }
  if (typeof value.reply === 'string') {
    return plainReply(value.reply);
  }
  if ('tool' in value || 'tool_call' in value) {
    return { kind: 'no_tool', reply: FALLBACK_REPLY };
  }
  return plainReply(raw);
}

/** Unreadable verdicts count as related. */
export function parseContinuityVerdict(raw: string): ContinuityVerdict {
  const parsed = verdictSchema.safeParse(parseEmbeddedJson(raw));
  return parsed.success ? parsed.data.verdict : 'related';
}

function extractSamplingText(content: unknown): string | undefined {
  const blocks: unknown[] = Array.isArray(content) ? content : [content];
  const texts: string[] = [];
  for (const block of blocks) {
    if (
      isObjectRecord(block) &&
      block.type === 'text' &&
      typeof block.text === 'string'
    ) {
      texts.push(block.text);
    }
  }
  return texts.length > 0 ? texts.join('\n') : undefined;
}

export interface SamplingCollaboratorOptions {
  timeoutMs?: number;
  maxTokens?: number;
}

/** Asks the connected MCP client's model through `sampling/createMessage`. */
export class SamplingCollaborator implements Collaborator {
  private readonly server: McpServer;
  private readonly timeoutMs: number;
  private readonly maxTokens: number;

  constructor(server: McpServer, options: SamplingCollaboratorOptions = {}) {
    this.server = server;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS;
    this.maxTokens = options.maxTokens ?? DEFAULT_COLLABORATOR_MAX_TOKENS;
  }

  async complete(
    prompt: CollaboratorPrompt,
    options: CompletionOptions = {}
  ): Promise<string> {
    let content: unknown;
    try {
      const result = await this.server.server.createMessage(
        {
          messages: [
            { role: 'user', content: { type: 'text', text: prompt.user } },
          ],
          systemPrompt: prompt.system,
          maxTokens: this.maxTokens,
          includeContext: 'none',
        },
        {
          timeout: this.timeoutMs,
          ...(options.signal !== undefined ? { signal: options.signal } : {}),
        }
      );
      content = result.content;
    } catch (err) {
      throw new CollaboratorUnavailableError(
        `Reasoning collaborator unavailable: ${getErrorMessage(err)}`,
        { cause: err }
      );
    }

    const text = extractSamplingText(content);
    if (text === undefined) {
      throw new CollaboratorUnavailableError(
        'Reasoning collaborator returned no text'
      );
    }
    return text;
  }
}
