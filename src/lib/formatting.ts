import type {
  ChatMessage,
  EngineReply,
  FrameSummary,
  StatusSnapshot,
  WorkflowOutcome,
} from './types.js';

const TREE_BRANCH = '└─ ';
const TREE_INDENT = '   ';
const EMPTY_STACK = '(empty)';

export function formatValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return 'undefined';
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function formatFrameLine(frame: FrameSummary): string {
  const waiting =
    frame.waitingFor !== undefined ? ` waiting for ${frame.waitingFor}` : '';
  return `${frame.toolName} [${frame.status}]${waiting}`;
}

/**
 * Renders the stack bottom first, each nested frame one level deeper.
 *
 * ```
 * create_code [paused] waiting for result from "save_file"
 * └─ save_file [active] waiting for value for "path"
 * ```
 */
export function formatStackTree(frames: readonly FrameSummary[]): string {
  if (frames.length === 0) {
    return EMPTY_STACK;
  }
  return frames
    .map((frame, index) => {
      const prefix =
        index === 0 ? '' : `${TREE_INDENT.repeat(index - 1)}${TREE_BRANCH}`;
      return `${prefix}${formatFrameLine(frame)}`;
    })
    .join('\n');
}

export function describeOutcome(outcome: WorkflowOutcome): string {
  switch (outcome.kind) {
    case 'completed':
      return `Done: ${formatValue(outcome.value)}`;
    case 'cancelled':
      return `Cancelled (${outcome.reason}).`;
    case 'failed':
      return `Failed: ${outcome.error.message}`;
  }
}

/** Text recorded in the chat history for an engine reply. */
export function describeReply(reply: EngineReply): string {
  switch (reply.kind) {
    case 'reply':
    case 'question':
    case 'noted':
    case 'confirmation':
      return reply.text;
    case 'ready':
      return `Running ${reply.tool}...`;
    case 'outcome':
      return describeOutcome(reply.outcome);
    case 'error':
      return `Error: ${reply.error.message}`;
    case 'discarded':
      return `Discarded a stale result (generation ${String(reply.generation)}).`;
    case 'idle':
      return 'Nothing is in progress.';
  }
}

export function formatHistory(messages: readonly ChatMessage[]): string {
  return messages
    .map((message) => `${message.role}: ${message.content}`)
    .join('\n');
}

export function formatSessionMarkdown(
  sessionId: string,
  snapshot: StatusSnapshot,
  history: readonly ChatMessage[]
): string {
  const lines = [
    `# Session ${sessionId}`,
    '',
    `- State: ${snapshot.state}`,
    `- Depth: ${String(snapshot.depth)}/${String(snapshot.maxDepth)}`,
    `- Generation: ${String(snapshot.generation)}`,
  ];
  if (snapshot.originalRequest !== undefined) {
    lines.push(`- Original request: ${snapshot.originalRequest}`);
  }
  lines.push('', '## Tool stack', '', '```', formatStackTree(snapshot.frames), '```');
  if (history.length > 0) {
    lines.push('', '## History', '');
    for (const message of history) {
      lines.push(`**${message.role}**: ${message.content}`, '');
    }
  }
  return lines.join('\n').trimEnd();
}
