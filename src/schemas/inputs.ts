import { z } from 'zod';

const SESSION_ID_SCHEMA = z.string().min(1).max(128);
const MESSAGE_SCHEMA = z.string().max(10000);

export const ChatSendInputSchema = z.strictObject({
  sessionId: SESSION_ID_SCHEMA.optional().describe(
    'Session to continue. Omit to start a new session.'
  ),
  message: MESSAGE_SCHEMA.describe(
    'User message. An empty message while a workflow is active asks whether to continue it.'
  ),
});

export const ChatConfirmInputSchema = z.strictObject({
  sessionId: SESSION_ID_SCHEMA.describe('Session with an outstanding question'),
  accept: z
    .boolean()
    .describe(
      'Answer to the pending confirmation (continue the workflow, or extend the depth limit).'
    ),
});

export const ChatCancelInputSchema = z.strictObject({
  sessionId: SESSION_ID_SCHEMA.describe('Session whose workflow to cancel'),
});

export const ChatStatusInputSchema = z.strictObject({
  sessionId: SESSION_ID_SCHEMA.describe('Session to inspect'),
});

export type ChatSendInput = z.infer<typeof ChatSendInputSchema>;
export type ChatConfirmInput = z.infer<typeof ChatConfirmInputSchema>;
export type ChatCancelInput = z.infer<typeof ChatCancelInputSchema>;
export type ChatStatusInput = z.infer<typeof ChatStatusInputSchema>;
