import { DepthExceededError } from '../lib/errors.js';
import type { ChildResult, ToolFrame } from '../lib/types.js';

import { DEFAULT_DEPTH_INCREMENT, DEFAULT_MAX_DEPTH } from './config.js';

type Mutable<T> = {
  -readonly [K in keyof T]: T[K];
};

export type StackFrame = Omit<
  Mutable<ToolFrame>,
  'collectedParameters' | 'missingParameters' | 'childResults' | 'notes'
> & {
  collectedParameters: Record<string, unknown>;
  missingParameters: string[];
  childResults: ChildResult[];
  notes: string[];
  /** Consecutive rejected answers for the parameter at the head of `missingParameters`. */
  validationFailures: number;
};

export function createFrame(
  toolName: string,
  collectedParameters: Record<string, unknown>,
  missingParameters: string[],
  now: number = Date.now()
): StackFrame {
  return {
    toolName,
    collectedParameters,
    missingParameters,
    createdAt: now,
    pendingChild: undefined,
    childResults: [],
    notes: [],
    validationFailures: 0,
  };
}

function freezeFrame(frame: StackFrame): ToolFrame {
  const view: ToolFrame = {
    toolName: frame.toolName,
    collectedParameters: Object.freeze({ ...frame.collectedParameters }),
    missingParameters: Object.freeze([...frame.missingParameters]),
    createdAt: frame.createdAt,
    pendingChild: frame.pendingChild,
    childResults: Object.freeze([...frame.childResults]),
    notes: Object.freeze([...frame.notes]),
  };
  return Object.freeze(view);
}

/**
 * LIFO stack of tool frames with a depth ceiling. Every clear advances the
 * generation so results produced for an older stack can be recognised.
 */
export class ToolStack {
  private readonly frames: StackFrame[] = [];
  private readonly baseMaxDepth: number;
  private readonly depthIncrement: number;
  private currentMaxDepth: number;
  private currentGeneration = 0;

  constructor(
    maxDepth: number = DEFAULT_MAX_DEPTH,
    depthIncrement: number = DEFAULT_DEPTH_INCREMENT
  ) {
    this.baseMaxDepth = maxDepth;
    this.depthIncrement = depthIncrement;
    this.currentMaxDepth = maxDepth;
  }

  get depth(): number {
    return this.frames.length;
  }

  get maxDepth(): number {
    return this.currentMaxDepth;
  }

  get increment(): number {
    return this.depthIncrement;
  }

  get generation(): number {
    return this.currentGeneration;
  }

  canPush(): boolean {
    return this.frames.length + 1 <= this.currentMaxDepth;
  }

  push(frame: StackFrame): void {
    if (!this.canPush()) {
      throw new DepthExceededError(this.frames.length, this.currentMaxDepth);
    }
    this.frames.push(frame);
  }

  top(): StackFrame | undefined {
    return this.frames.at(-1);
  }

  pop(): StackFrame | undefined {
    return this.frames.pop();
  }

  clear(): void {
    this.frames.length = 0;
    this.currentGeneration++;
    this.currentMaxDepth = this.baseMaxDepth;
  }

  extend(): number {
    this.currentMaxDepth += this.depthIncrement;
    return this.currentMaxDepth;
  }

  /** Frozen copies, bottom first. */
  snapshot(): readonly ToolFrame[] {
    return Object.freeze(this.frames.map(freezeFrame));
  }
}
