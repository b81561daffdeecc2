import type { z } from 'zod';

import type { ChildResult, ToolResult } from '../lib/types.js';

export interface ToolParameter {
  readonly name: string;
  readonly description: string;
  /** Validates and coerces the raw value supplied by the user or a seed. */
  readonly schema: z.ZodType;
  readonly question?: string;
  /** Extra hint shown when the first answer was rejected. */
  readonly guidance?: string;
  readonly required?: boolean;
  /** Filled from the workflow's original request when no value was given. */
  readonly seedFromRequest?: boolean;
}

export interface ToolInvocationContext {
  readonly sessionId: string;
  readonly originalRequest: string | undefined;
  readonly childResults: readonly ChildResult[];
  readonly notes: readonly string[];
  readonly signal: AbortSignal;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly usage: string;
  readonly parameters: readonly ToolParameter[];
  /**
   * Maps a finished child's value onto this tool's parameters. Keys that are
   * already collected are left untouched.
   */
  projectChildResult?(result: ChildResult): Readonly<Record<string, unknown>>;
  invoke(
    params: Readonly<Record<string, unknown>>,
    context: ToolInvocationContext
  ): ToolResult | Promise<ToolResult>;
}

export interface ToolCatalogEntry {
  name: string;
  description: string;
  usage: string;
  parameters: {
    name: string;
    description: string;
    required: boolean;
    seedFromRequest: boolean;
  }[];
}

export type ParameterCheck =
  | { ok: true; value: unknown }
  | { ok: false; message: string };

export interface InitialParameters {
  collected: Record<string, unknown>;
  missing: string[];
  rejected: { parameter: string; message: string }[];
}

const TOOL_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export function toolValue(value: unknown): ToolResult {
  return { kind: 'value', value };
}

export function needsTool(
  tool: string,
  seedArgs: Readonly<Record<string, unknown>> = {}
): ToolResult {
  return { kind: 'needs_tool', tool, seedArgs };
}

export function toolError(errorKind: string, message: string): ToolResult {
  return { kind: 'error', errorKind, message };
}

/** Sets an own property, so keys such as `__proto__` stay plain data. */
export function assignParameter(
  target: Record<string, unknown>,
  key: string,
  value: unknown
): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export function isRequired(parameter: ToolParameter): boolean {
  return parameter.required ?? true;
}

export function getParameterQuestion(parameter: ToolParameter): string {
  return parameter.question ?? `Please provide ${parameter.name}:`;
}

export function checkParameter(
  parameter: ToolParameter,
  raw: unknown
): ParameterCheck {
  const parsed = parameter.schema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  const issue = parsed.error.issues[0];
  return { ok: false, message: issue?.message ?? 'Invalid value' };
}

/**
 * Splits seed arguments into collected values and the ordered list of
 * required parameters still missing. Seeds that fail validation are reported
 * in `rejected` and the parameter is asked for instead.
 */
export function resolveInitialParameters(
  descriptor: ToolDescriptor,
  args: Readonly<Record<string, unknown>>,
  originalRequest: string | undefined
): InitialParameters {
  const declared = new Set(descriptor.parameters.map((p) => p.name));
  const collected: Record<string, unknown> = {};
  const missing: string[] = [];
  const rejected: { parameter: string; message: string }[] = [];

  for (const [name, value] of Object.entries(args)) {
    if (!declared.has(name)) {
      assignParameter(collected, name, value);
    }
  }

  for (const parameter of descriptor.parameters) {
    let raw: unknown = args[parameter.name];
    if (
      raw === undefined &&
      parameter.seedFromRequest === true &&
      originalRequest !== undefined
    ) {
      raw = originalRequest;
    }

    if (raw !== undefined) {
      const check = checkParameter(parameter, raw);
      if (check.ok) {
        collected[parameter.name] = check.value;
        continue;
      }
      rejected.push({ parameter: parameter.name, message: check.message });
    }

    if (isRequired(parameter)) {
      missing.push(parameter.name);
    }
  }

  return { collected, missing, rejected };
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();

  constructor(descriptors: readonly ToolDescriptor[] = []) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  register(descriptor: ToolDescriptor): void {
    if (!TOOL_NAME_PATTERN.test(descriptor.name)) {
      throw new Error(`Invalid tool name: "${descriptor.name}"`);
    }
    if (this.tools.has(descriptor.name)) {
      throw new Error(`Tool already registered: ${descriptor.name}`);
    }
    const seen = new Set<string>();
    for (const parameter of descriptor.parameters) {
      if (seen.has(parameter.name)) {
        throw new Error(
          `Duplicate parameter "${parameter.name}" on tool ${descriptor.name}`
        );
      }
      seen.add(parameter.name);
    }
    this.tools.set(descriptor.name, descriptor);
  }

  resolve(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()];
  }

  catalog(): ToolCatalogEntry[] {
    return this.list().map((descriptor) => ({
      name: descriptor.name,
      description: descriptor.description,
      usage: descriptor.usage,
      parameters: descriptor.parameters.map((parameter) => ({
        name: parameter.name,
        description: parameter.description,
        required: isRequired(parameter),
        seedFromRequest: parameter.seedFromRequest ?? false,
      })),
    }));
  }

  /** One entry per tool, in registration order, for selection prompts. */
  summarize(): string {
    if (this.tools.size === 0) {
      return '(no tools registered)';
    }
    return this.list()
      .map((descriptor) => {
        const params =
          descriptor.parameters.length === 0
            ? 'none'
            : descriptor.parameters
                .map((p) => `${p.name}${isRequired(p) ? '' : '?'}`)
                .join(', ');
        return `- ${descriptor.name}: ${descriptor.description}\n  parameters: ${params}`;
      })
      .join('\n');
  }
}
