import {
  CollaboratorUnavailableError,
  getErrorMessage,
  InvalidStateError,
  ParameterValidationError,
  ToolExecutionError,
  UnknownToolError,
} from '../lib/errors.js';
import type { OrchestrationError } from '../lib/errors.js';
import type {
  CancelReason,
  ChatMessage,
  ContinuityVerdict,
  EngineReply,
  EngineState,
  FrameSummary,
  StatusSnapshot,
  ToolFrame,
  ToolResult,
  WorkflowOutcome,
} from '../lib/types.js';
import {
  assignParameter,
  checkParameter,
  getParameterQuestion,
  resolveInitialParameters,
} from '../registry/registry.js';
import type {
  ToolDescriptor,
  ToolParameter,
  ToolRegistry,
} from '../registry/registry.js';

import type { Collaborator } from './collaborator.js';
import {
  parseContinuityVerdict,
  parseSelectionDecision,
  renderContinuityPrompt,
  renderSelectionPrompt,
} from './collaborator.js';
import { DEFAULT_DEPTH_INCREMENT, DEFAULT_MAX_DEPTH } from './config.js';
import { engineEvents } from './events.js';
import {
  looksLikeParameterValue,
  matchesContextSwitchPhrase,
} from './heuristics.js';
import type { StackFrame } from './tool-stack.js';
import { createFrame, ToolStack } from './tool-stack.js';

/** Rejected answers in a row before the workflow fails. */
const MAX_VALIDATION_ATTEMPTS = 2;

type PendingConfirmation =
  | { readonly kind: 'continue' }
  | {
      readonly kind: 'extend_depth';
      readonly tool: string;
      readonly args: Readonly<Record<string, unknown>>;
      readonly asChild: boolean;
    };

interface InFlight {
  readonly kind: 'selection' | 'execution' | 'continuity';
  readonly controller: AbortController;
}

export interface OrchestratorOptions {
  sessionId: string;
  registry: ToolRegistry;
  collaborator: Collaborator;
  maxDepth?: number;
  depthIncrement?: number;
  /** Recent conversation, rendered into collaborator prompts. */
  history?: () => readonly ChatMessage[];
}

function describeWait(frame: ToolFrame): string | undefined {
  if (frame.pendingChild !== undefined) {
    return `result from "${frame.pendingChild}"`;
  }
  const next = frame.missingParameters[0];
  return next !== undefined ? `value for "${next}"` : undefined;
}

function summarizeFrame(frame: ToolFrame, isTop: boolean): FrameSummary {
  const waitingFor = describeWait(frame);
  const summary: FrameSummary = {
    toolName: frame.toolName,
    isTop,
    status: isTop ? 'active' : 'paused',
    missingParameterCount: frame.missingParameters.length,
    ...(waitingFor !== undefined ? { waitingFor } : {}),
    ...(frame.pendingChild !== undefined
      ? { pendingChild: frame.pendingChild }
      : {}),
    createdAt: frame.createdAt,
  };
  return Object.freeze(summary);
}

/**
 * Per-session tool workflow state machine. Callers serialise every operation
 * except `cancel`, which may run while a collaborator or tool call is pending;
 * results that arrive for a cleared stack are discarded.
 */
export class Orchestrator {
  readonly sessionId: string;
  private readonly registry: ToolRegistry;
  private readonly collaborator: Collaborator;
  private readonly history: () => readonly ChatMessage[];
  private readonly stack: ToolStack;
  private originalRequest: string | undefined;
  private pendingConfirmation: PendingConfirmation | undefined;
  private inFlight: InFlight | undefined;
  private workflowOpen = false;

  constructor(options: OrchestratorOptions) {
    this.sessionId = options.sessionId;
    this.registry = options.registry;
    this.collaborator = options.collaborator;
    this.history = options.history ?? (() => []);
    this.stack = new ToolStack(
      options.maxDepth ?? DEFAULT_MAX_DEPTH,
      options.depthIncrement ?? DEFAULT_DEPTH_INCREMENT
    );
  }

  get state(): EngineState {
    if (this.pendingConfirmation !== undefined) {
      return 'awaiting_confirmation';
    }
    if (this.inFlight?.kind === 'selection') {
      return 'awaiting_selection';
    }
    if (this.inFlight?.kind === 'execution') {
      return 'executing';
    }
    const top = this.stack.top();
    if (top === undefined) {
      return 'idle';
    }
    return top.missingParameters.length > 0
      ? 'collecting_parameters'
      : 'ready_to_execute';
  }

  status(): StatusSnapshot {
    const frames = this.stack.snapshot();
    const lastIndex = frames.length - 1;
    const snapshot: StatusSnapshot = {
      state: this.state,
      ...(this.originalRequest !== undefined
        ? { originalRequest: this.originalRequest }
        : {}),
      depth: this.stack.depth,
      maxDepth: this.stack.maxDepth,
      generation: this.stack.generation,
      frames: Object.freeze(
        frames.map((frame, index) => summarizeFrame(frame, index === lastIndex))
      ),
    };
    return Object.freeze(snapshot);
  }

  async submitUserRequest(text: string): Promise<EngineReply> {
    this.assertState('submitUserRequest', ['idle']);
    this.originalRequest = text;
    this.workflowOpen = true;
    engineEvents.emit('workflow:started', {
      sessionId: this.sessionId,
      originalRequest: text,
    });
    return this.selectTool(text, undefined, false);
  }

  supplyParameterValue(value: unknown): EngineReply {
    this.assertState('supplyParameterValue', ['collecting_parameters']);
    const frame = this.requireTop();
    const name = frame.missingParameters[0];
    if (name === undefined) {
      return this.promptActiveFrame();
    }
    const parameter = this.requireParameter(frame, name);
    const check = checkParameter(parameter, value);

    if (check.ok) {
      frame.collectedParameters[name] = check.value;
      frame.missingParameters.shift();
      frame.validationFailures = 0;
      engineEvents.emit('parameter:collected', {
        sessionId: this.sessionId,
        tool: frame.toolName,
        parameter: name,
      });
      return this.promptActiveFrame();
    }

    frame.validationFailures++;
    engineEvents.emit('parameter:rejected', {
      sessionId: this.sessionId,
      tool: frame.toolName,
      parameter: name,
      attempt: frame.validationFailures,
      message: check.message,
    });

    if (frame.validationFailures >= MAX_VALIDATION_ATTEMPTS) {
      const cause = new ParameterValidationError(
        frame.toolName,
        name,
        check.message
      );
      return this.fail(
        new ToolExecutionError(frame.toolName, 'invalid_parameter', cause.message, {
          cause,
        })
      );
    }

    return this.retryQuestion(frame.toolName, name, check.message);
  }

  async executeActiveTool(): Promise<EngineReply> {
    this.assertState('executeActiveTool', ['ready_to_execute']);
    const frame = this.requireTop();
    const descriptor = this.requireDescriptor(frame.toolName);
    const generation = this.stack.generation;
    const controller = this.beginInFlight('execution');

    let result: ToolResult;
    try {
      result = await descriptor.invoke(
        { ...frame.collectedParameters },
        {
          sessionId: this.sessionId,
          originalRequest: this.originalRequest,
          childResults: [...frame.childResults],
          notes: [...frame.notes],
          signal: controller.signal,
        }
      );
    } catch (err) {
      if (this.isStale(generation)) {
        return this.discard(generation);
      }
      this.endInFlight(controller);
      return this.fail(
        new ToolExecutionError(frame.toolName, 'exception', getErrorMessage(err), {
          cause: err,
        })
      );
    }

    if (this.isStale(generation)) {
      return this.discard(generation);
    }
    this.endInFlight(controller);
    return this.applyResult(frame, result);
  }

  /** Explicit cancellation. A no-op outside a workflow. */
  cancel(): EngineReply {
    if (this.state === 'idle') {
      return { kind: 'idle' };
    }
    return this.cancelWith('explicit');
  }

  handleEmptyInput(): EngineReply {
    if (this.state === 'idle') {
      return { kind: 'idle' };
    }
    if (this.pendingConfirmation === undefined) {
      this.pendingConfirmation = { kind: 'continue' };
    }
    return this.confirmationReply(this.pendingConfirmation);
  }

  resolveConfirmation(accept: boolean): EngineReply {
    const pending = this.pendingConfirmation;
    if (pending === undefined) {
      throw new InvalidStateError('resolveConfirmation', this.state);
    }
    this.pendingConfirmation = undefined;

    if (pending.kind === 'continue') {
      return accept ? this.promptActiveFrame() : this.cancelWith('explicit');
    }
    if (!accept) {
      return this.cancelWith('depth_limit');
    }
    const maxDepth = this.stack.extend();
    engineEvents.emit('depth:extended', { sessionId: this.sessionId, maxDepth });
    return this.pushTool(pending.tool, pending.args, pending.asChild);
  }

  /**
   * Routes free text received while a workflow is active: either it feeds the
   * active step, or the workflow is abandoned and the text starts a new one.
   */
  async detectContextSwitch(text: string): Promise<EngineReply[]> {
    const state = this.state;
    if (state === 'idle') {
      return [await this.submitUserRequest(text)];
    }
    if (state !== 'collecting_parameters' && state !== 'ready_to_execute') {
      throw new InvalidStateError('detectContextSwitch', state);
    }

    let verdict: ContinuityVerdict;
    if (matchesContextSwitchPhrase(text)) {
      verdict = 'unrelated';
    } else if (
      state === 'collecting_parameters' &&
      looksLikeParameterValue(text)
    ) {
      verdict = 'related';
    } else {
      const asked = await this.askContinuity(text);
      if (asked.kind !== 'verdict') {
        return [asked.reply];
      }
      verdict = asked.verdict;
    }

    if (verdict === 'unrelated') {
      engineEvents.emit('context:switched', {
        sessionId: this.sessionId,
        reason: 'context_switch',
      });
      const cancelled = this.cancelWith('context_switch');
      return [cancelled, await this.submitUserRequest(text)];
    }

    if (this.state === 'collecting_parameters') {
      return [this.supplyParameterValue(text)];
    }
    const frame = this.requireTop();
    frame.notes.push(text);
    return [
      { kind: 'noted', tool: frame.toolName, text: `Noted for ${frame.toolName}.` },
    ];
  }

  private async selectTool(
    request: string,
    guidance: string | undefined,
    retried: boolean
  ): Promise<EngineReply> {
    const generation = this.stack.generation;
    const controller = this.beginInFlight('selection');
    const prompt = renderSelectionPrompt({
      request,
      history: this.history(),
      toolSummary: this.registry.summarize(),
      ...(guidance !== undefined ? { guidance } : {}),
    });

    let raw: string;
    try {
      raw = await this.collaborator.complete(prompt, {
        signal: controller.signal,
      });
    } catch (err) {
      if (this.isStale(generation)) {
        return this.discard(generation);
      }
      this.endInFlight(controller);
      this.closeWorkflow();
      return { kind: 'error', error: toCollaboratorError(err).toInfo() };
    }

    if (this.isStale(generation)) {
      return this.discard(generation);
    }
    this.endInFlight(controller);

    const decision = parseSelectionDecision(raw);
    if (decision.kind === 'no_tool') {
      this.closeWorkflow();
      return { kind: 'reply', text: decision.reply };
    }
    if (!this.registry.has(decision.tool)) {
      if (!retried) {
        const available = this.registry.names().join(', ');
        return this.selectTool(
          request,
          `"${decision.tool}" is not an available tool. Choose one of: ${available}, or answer directly.`,
          true
        );
      }
      this.closeWorkflow();
      return { kind: 'error', error: new UnknownToolError(decision.tool).toInfo() };
    }
    return this.pushTool(decision.tool, decision.args, false);
  }

  private async askContinuity(
    text: string
  ): Promise<
    | { kind: 'verdict'; verdict: ContinuityVerdict }
    | { kind: 'reply'; reply: EngineReply }
  > {
    const generation = this.stack.generation;
    const controller = this.beginInFlight('continuity');
    const prompt = renderContinuityPrompt({
      text,
      history: this.history(),
      originalRequest: this.originalRequest,
      frames: this.status().frames,
    });

    let raw: string;
    try {
      raw = await this.collaborator.complete(prompt, {
        signal: controller.signal,
      });
    } catch (err) {
      if (this.isStale(generation)) {
        return { kind: 'reply', reply: this.discard(generation) };
      }
      this.endInFlight(controller);
      return {
        kind: 'reply',
        reply: { kind: 'error', error: toCollaboratorError(err).toInfo() },
      };
    }

    if (this.isStale(generation)) {
      return { kind: 'reply', reply: this.discard(generation) };
    }
    this.endInFlight(controller);
    return { kind: 'verdict', verdict: parseContinuityVerdict(raw) };
  }

  private pushTool(
    name: string,
    args: Readonly<Record<string, unknown>>,
    asChild: boolean
  ): EngineReply {
    const descriptor = this.requireDescriptor(name);

    if (!this.stack.canPush()) {
      const pending: PendingConfirmation = {
        kind: 'extend_depth',
        tool: name,
        args,
        asChild,
      };
      this.pendingConfirmation = pending;
      engineEvents.emit('depth:exceeded', {
        sessionId: this.sessionId,
        tool: name,
        depth: this.stack.depth,
        maxDepth: this.stack.maxDepth,
      });
      return this.confirmationReply(pending);
    }

    const { collected, missing, rejected } = resolveInitialParameters(
      descriptor,
      args,
      this.originalRequest
    );
    if (asChild) {
      const parent = this.stack.top();
      if (parent !== undefined) {
        parent.pendingChild = name;
      }
    }
    this.stack.push(createFrame(name, collected, missing));
    engineEvents.emit('frame:pushed', {
      sessionId: this.sessionId,
      tool: name,
      depth: this.stack.depth,
      missing: missing.length,
    });

    // Seed rejections are reported but do not count towards the retry limit.
    for (const rejection of rejected) {
      engineEvents.emit('parameter:rejected', {
        sessionId: this.sessionId,
        tool: name,
        parameter: rejection.parameter,
        attempt: 0,
        message: rejection.message,
      });
    }
    const first = rejected.find((rejection) => rejection.parameter === missing[0]);
    if (first !== undefined) {
      return this.retryQuestion(name, first.parameter, first.message);
    }
    return this.promptActiveFrame();
  }

  private applyResult(frame: StackFrame, result: ToolResult): EngineReply {
    switch (result.kind) {
      case 'value':
        return this.deliverValue(frame, result.value);
      case 'needs_tool':
        if (!this.registry.has(result.tool)) {
          return this.fail(
            new ToolExecutionError(
              frame.toolName,
              'unknown_tool',
              new UnknownToolError(result.tool).message
            )
          );
        }
        return this.pushTool(result.tool, result.seedArgs, true);
      case 'error':
        return this.fail(
          new ToolExecutionError(frame.toolName, result.errorKind, result.message)
        );
    }
  }

  private deliverValue(frame: StackFrame, value: unknown): EngineReply {
    this.stack.pop();
    engineEvents.emit('frame:popped', {
      sessionId: this.sessionId,
      tool: frame.toolName,
      depth: this.stack.depth,
    });

    const parent = this.stack.top();
    if (parent === undefined) {
      return this.finish({ kind: 'completed', value });
    }

    const child = { tool: frame.toolName, value };
    parent.pendingChild = undefined;
    parent.childResults.push(child);
    const descriptor = this.requireDescriptor(parent.toolName);
    const projected = descriptor.projectChildResult?.(child) ?? {};
    this.mergeProjected(parent, descriptor, projected);
    return this.promptActiveFrame();
  }

  /** Fills parameters the parent has not collected yet; collected ones stay. */
  private mergeProjected(
    frame: StackFrame,
    descriptor: ToolDescriptor,
    projected: Readonly<Record<string, unknown>>
  ): void {
    for (const [key, raw] of Object.entries(projected)) {
      if (Object.hasOwn(frame.collectedParameters, key)) {
        continue;
      }
      const parameter = descriptor.parameters.find((p) => p.name === key);
      if (parameter === undefined) {
        assignParameter(frame.collectedParameters, key, raw);
        continue;
      }
      const check = checkParameter(parameter, raw);
      if (!check.ok) {
        continue;
      }
      frame.collectedParameters[key] = check.value;
      const index = frame.missingParameters.indexOf(key);
      if (index >= 0) {
        frame.missingParameters.splice(index, 1);
        if (index === 0) {
          frame.validationFailures = 0;
        }
      }
    }
  }

  private retryQuestion(
    toolName: string,
    parameterName: string,
    message: string
  ): EngineReply {
    const parameter = this.requireParameter(this.requireTop(), parameterName);
    const text = [
      `That value was not accepted: ${message}.`,
      parameter.guidance,
      getParameterQuestion(parameter),
    ]
      .filter((part) => part !== undefined)
      .join(' ');
    return {
      kind: 'question',
      tool: toolName,
      parameter: parameterName,
      text,
      retry: true,
    };
  }

  private promptActiveFrame(): EngineReply {
    const frame = this.stack.top();
    if (frame === undefined) {
      return { kind: 'idle' };
    }
    const name = frame.missingParameters[0];
    if (name === undefined) {
      return { kind: 'ready', tool: frame.toolName };
    }
    return {
      kind: 'question',
      tool: frame.toolName,
      parameter: name,
      text: getParameterQuestion(this.requireParameter(frame, name)),
      retry: false,
    };
  }

  private confirmationReply(pending: PendingConfirmation): EngineReply {
    let text: string;
    if (pending.kind === 'continue') {
      const tool = this.stack.top()?.toolName ?? 'the current task';
      text = `Continue with ${tool}? (yes/no)`;
    } else {
      text =
        `Tool stack depth limit reached (${String(this.stack.depth)}/${String(this.stack.maxDepth)}). ` +
        `Extend the limit by ${String(this.stack.increment)} and run ${pending.tool}? (yes/no)`;
    }
    return {
      kind: 'confirmation',
      confirmation: pending.kind,
      text,
      snapshot: this.status(),
    };
  }

  private cancelWith(reason: CancelReason): EngineReply {
    return this.finish({ kind: 'cancelled', reason });
  }

  private fail(error: OrchestrationError): EngineReply {
    return this.finish({ kind: 'failed', error: error.toInfo() });
  }

  /** Ends the workflow: clears all state and reports its single outcome. */
  private finish(outcome: WorkflowOutcome): EngineReply {
    this.abortInFlight();
    this.stack.clear();
    const originalRequest = this.originalRequest;
    this.originalRequest = undefined;
    this.pendingConfirmation = undefined;

    if (this.workflowOpen) {
      this.workflowOpen = false;
      engineEvents.emit('workflow:outcome', {
        sessionId: this.sessionId,
        originalRequest,
        outcome,
      });
    }
    return { kind: 'outcome', outcome };
  }

  /** Ends a workflow that never produced a tool frame; there is no outcome. */
  private closeWorkflow(): void {
    this.originalRequest = undefined;
    this.pendingConfirmation = undefined;
    this.workflowOpen = false;
  }

  private discard(generation: number): EngineReply {
    engineEvents.emit('result:discarded', {
      sessionId: this.sessionId,
      generation,
      currentGeneration: this.stack.generation,
    });
    return { kind: 'discarded', generation };
  }

  private isStale(generation: number): boolean {
    return generation !== this.stack.generation;
  }

  private beginInFlight(kind: InFlight['kind']): AbortController {
    const controller = new AbortController();
    this.inFlight = { kind, controller };
    return controller;
  }

  private endInFlight(controller: AbortController): void {
    if (this.inFlight?.controller === controller) {
      this.inFlight = undefined;
    }
  }

  private abortInFlight(): void {
    const inFlight = this.inFlight;
    this.inFlight = undefined;
    inFlight?.controller.abort();
  }

  private assertState(operation: string, allowed: readonly EngineState[]): void {
    const state = this.state;
    if (!allowed.includes(state)) {
      throw new InvalidStateError(operation, state);
    }
  }

  private requireTop(): StackFrame {
    const frame = this.stack.top();
    if (frame === undefined) {
      throw new InvalidStateError('accessing the active frame', this.state);
    }
    return frame;
  }

  private requireDescriptor(name: string): ToolDescriptor {
    const descriptor = this.registry.resolve(name);
    if (descriptor === undefined) {
      throw new UnknownToolError(name);
    }
    return descriptor;
  }

  private requireParameter(frame: ToolFrame, name: string): ToolParameter {
    const parameter = this.requireDescriptor(frame.toolName).parameters.find(
      (p) => p.name === name
    );
    if (parameter === undefined) {
      throw new Error(`Tool ${frame.toolName} declares no parameter "${name}"`);
    }
    return parameter;
  }
}

function toCollaboratorError(err: unknown): CollaboratorUnavailableError {
  if (err instanceof CollaboratorUnavailableError) {
    return err;
  }
  return new CollaboratorUnavailableError(
    `Reasoning collaborator unavailable: ${getErrorMessage(err)}`,
    { cause: err }
  );
}
