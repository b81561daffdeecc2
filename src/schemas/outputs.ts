import { z } from 'zod';

import {
  CANCEL_REASONS,
  CONFIRMATION_KINDS,
  ENGINE_STATES,
  FRAME_STATUSES,
  OUTCOME_KINDS,
  REPLY_KINDS,
} from '../lib/types.js';

const ErrorInfoSchema = z.strictObject({
  code: z.string(),
  message: z.string(),
});
const MISSING_RESULT_PATH: ['result'] = ['result'];
const MISSING_ERROR_PATH: ['error'] = ['error'];

const FrameSummarySchema = z.strictObject({
  toolName: z.string(),
  isTop: z.boolean(),
  status: z.enum(FRAME_STATUSES),
  missingParameterCount: z.number(),
  waitingFor: z
    .string()
    .optional()
    .describe('What the frame needs next, e.g. a parameter value or a child result.'),
  pendingChild: z.string().optional(),
  createdAt: z.number(),
});

export const StatusSnapshotSchema = z.strictObject({
  state: z.enum(ENGINE_STATES),
  originalRequest: z
    .string()
    .optional()
    .describe('The message that started the active workflow.'),
  depth: z.number(),
  maxDepth: z.number(),
  generation: z.number(),
  frames: z.array(FrameSummarySchema).describe('Bottom of the stack first.'),
});

const OutcomeSchema = z.strictObject({
  kind: z.enum(OUTCOME_KINDS),
  value: z.unknown().optional(),
  reason: z.enum(CANCEL_REASONS).optional(),
  error: ErrorInfoSchema.optional(),
});

export const ReplySchema = z.strictObject({
  kind: z.enum(REPLY_KINDS),
  text: z.string().describe('Human-readable rendering of the reply.'),
  tool: z.string().optional(),
  parameter: z.string().optional(),
  retry: z.boolean().optional(),
  confirmation: z.enum(CONFIRMATION_KINDS).optional(),
  outcome: OutcomeSchema.optional(),
  error: ErrorInfoSchema.optional(),
});

const ChatTurnResultSchema = z.strictObject({
  sessionId: z.string(),
  replies: z.array(ReplySchema),
  status: StatusSnapshotSchema,
  expiresAt: z.number(),
});

const ChatStatusResultSchema = z.strictObject({
  sessionId: z.string(),
  status: StatusSnapshotSchema,
  messageCount: z.number(),
  expiresAt: z.number(),
});

function getMissingFieldIssue(data: {
  ok: boolean;
  result?: unknown;
  error?: unknown;
}): { message: string; path: ['result'] | ['error'] } | undefined {
  if (data.ok && data.result === undefined) {
    return {
      message: 'result is required when ok is true',
      path: MISSING_RESULT_PATH,
    };
  }
  if (!data.ok && data.error === undefined) {
    return {
      message: 'error is required when ok is false',
      path: MISSING_ERROR_PATH,
    };
  }
  return undefined;
}

function createEnvelopeSchema<T extends z.ZodType>(resultSchema: T) {
  return z
    .strictObject({
      ok: z.boolean(),
      result: resultSchema.optional(),
      error: ErrorInfoSchema.optional(),
    })
    .superRefine((data, ctx) => {
      const issue = getMissingFieldIssue(data);
      if (issue) {
        ctx.addIssue({ code: 'custom', message: issue.message, path: issue.path });
      }
    });
}

/**
 * Tool-facing output schemas, kept as strict objects so SDK tooling can
 * advertise outputSchema via tools/list.
 */
export const ChatTurnOutputSchema = createEnvelopeSchema(ChatTurnResultSchema);
export const ChatStatusOutputSchema = createEnvelopeSchema(ChatStatusResultSchema);

export type WireReply = z.infer<typeof ReplySchema>;
export type ChatTurnResult = z.infer<typeof ChatTurnResultSchema>;
export type ChatStatusResult = z.infer<typeof ChatStatusResultSchema>;

/** Generic ok/error envelope, for contract tests. */
export const DefaultOutputSchema = z.union([
  z.strictObject({ ok: z.literal(true), result: z.unknown() }),
  z.strictObject({ ok: z.literal(false), error: ErrorInfoSchema }),
]);
