import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CreateMessageRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type {
  Collaborator,
  CollaboratorPrompt,
  CompletionOptions,
} from '../engine/collaborator.js';
import { DEFAULT_ENGINE_CONFIG } from '../engine/config.js';
import { isObjectRecord } from '../lib/errors.js';
import type { ToolResult } from '../lib/types.js';
import { BUILTIN_TOOLS } from '../registry/builtin.js';
import type { ToolDescriptor } from '../registry/registry.js';
import { needsTool, toolValue, ToolRegistry } from '../registry/registry.js';
import { createServer } from '../server.js';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

type ScriptedResponse = string | Error | Promise<string>;

/** Answers collaborator prompts from a queue, recording every prompt. */
export class ScriptedCollaborator implements Collaborator {
  readonly prompts: CollaboratorPrompt[] = [];
  readonly signals: (AbortSignal | undefined)[] = [];
  private readonly queue: ScriptedResponse[];

  constructor(responses: readonly ScriptedResponse[] = []) {
    this.queue = [...responses];
  }

  async complete(
    prompt: CollaboratorPrompt,
    options: CompletionOptions = {}
  ): Promise<string> {
    this.prompts.push(prompt);
    this.signals.push(options.signal);
    const next = this.queue.shift();
    if (next === undefined) {
      throw new Error(`No scripted response for ${prompt.purpose}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export function selectTool(
  tool: string,
  args: Record<string, unknown> = {}
): string {
  return JSON.stringify({ tool, arguments: args });
}

export function answerDirectly(reply: string): string {
  return JSON.stringify({ tool: null, reply });
}

export function verdict(value: 'related' | 'unrelated'): string {
  return JSON.stringify({ verdict: value });
}

export const saveFileTool: ToolDescriptor = {
  name: 'save_file',
  description: 'Save content to a file',
  usage: '{"tool": "save_file", "arguments": {"path": "out.txt", "content": "hi"}}',
  parameters: [
    {
      name: 'path',
      description: 'Destination path',
      question: 'Where should I save the file?',
      schema: z.string().min(1),
    },
    {
      name: 'content',
      description: 'File content',
      question: 'What should the file contain?',
      schema: z.string(),
    },
  ],
  invoke(params) {
    const path = String(params.path);
    const content = String(params.content);
    return toolValue({ path, bytes: content.length });
  },
};

/** Generates code, then asks `save_file` to store it before completing. */
export const createCodeTool: ToolDescriptor = {
  name: 'create_code',
  description: 'Generate code and save it',
  usage: '{"tool": "create_code", "arguments": {"language": "typescript"}}',
  parameters: [
    {
      name: 'language',
      description: 'Programming language',
      question: 'Which language should I use?',
      schema: z.string().min(1),
    },
    {
      name: 'description',
      description: 'What the code should do',
      schema: z.string().min(1),
      seedFromRequest: true,
    },
    {
      name: 'saved_path',
      description: 'Where the code was saved',
      schema: z.string().min(1),
      required: false,
    },
  ],
  projectChildResult(result) {
    return isObjectRecord(result.value) && typeof result.value.path === 'string'
      ? { saved_path: result.value.path }
      : {};
  },
  invoke(params): ToolResult {
    const language = String(params.language);
    const description = String(params.description);
    if (typeof params.saved_path !== 'string') {
      return needsTool('save_file', {
        content: `// ${language}: ${description}`,
      });
    }
    return toolValue(
      `Created ${language} code for "${description}" at ${params.saved_path}`
    );
  },
};

export const digitsTool: ToolDescriptor = {
  name: 'echo_digits',
  description: 'Echo a code made of digits',
  usage: '{"tool": "echo_digits", "arguments": {"code": "1234"}}',
  parameters: [
    {
      name: 'code',
      description: 'Digits only',
      question: 'Which code?',
      guidance: 'Use digits 0-9.',
      schema: z.string().regex(/^\d+$/, { error: 'Digits only' }),
    },
  ],
  invoke(params) {
    return toolValue(params.code);
  },
};

export function createTestRegistry(
  extra: readonly ToolDescriptor[] = []
): ToolRegistry {
  return new ToolRegistry([
    ...BUILTIN_TOOLS,
    createCodeTool,
    saveFileTool,
    digitsTool,
    ...extra,
  ]);
}

export interface TestHarness {
  client: Client;
  server: McpServer;
  /** Replies the client's sampling handler returns, in order. */
  samplingReplies: (string | Error)[];
  close: () => Promise<void>;
}

export async function connectTestClient(
  samplingReplies: readonly (string | Error)[] = []
): Promise<TestHarness> {
  const server = createServer({
    config: DEFAULT_ENGINE_CONFIG,
    registry: createTestRegistry(),
  });
  const client = new Client(
    { name: 'test-client', version: '0.0.1' },
    { capabilities: { sampling: {} } }
  );
  const queue = [...samplingReplies];
  client.setRequestHandler(CreateMessageRequestSchema, () => {
    const next = queue.shift();
    if (next === undefined) {
      throw new Error('No scripted sampling reply');
    }
    if (next instanceof Error) {
      throw next;
    }
    return {
      role: 'assistant',
      model: 'test-model',
      content: { type: 'text', text: next },
    };
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);

  return {
    client,
    server,
    samplingReplies: queue,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}
