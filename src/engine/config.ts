import { parsePositiveIntEnv } from '../lib/validators.js';

export const DEFAULT_MAX_DEPTH = 20;
export const DEFAULT_DEPTH_INCREMENT = 20;
export const DEFAULT_SESSION_TTL_MS = 30 * 60 * 1000; // 30 minutes
export const DEFAULT_MAX_SESSIONS = 100;
export const DEFAULT_COLLABORATOR_TIMEOUT_MS = 60_000;
export const DEFAULT_COLLABORATOR_MAX_TOKENS = 1024;
export const DEFAULT_MAX_HISTORY = 50;

export interface EngineConfig {
  readonly maxDepth: number;
  readonly depthIncrement: number;
  readonly sessionTtlMs: number;
  readonly maxSessions: number;
  readonly collaboratorTimeoutMs: number;
  readonly collaboratorMaxTokens: number;
  readonly maxHistory: number;
}

export const DEFAULT_ENGINE_CONFIG = {
  maxDepth: DEFAULT_MAX_DEPTH,
  depthIncrement: DEFAULT_DEPTH_INCREMENT,
  sessionTtlMs: DEFAULT_SESSION_TTL_MS,
  maxSessions: DEFAULT_MAX_SESSIONS,
  collaboratorTimeoutMs: DEFAULT_COLLABORATOR_TIMEOUT_MS,
  collaboratorMaxTokens: DEFAULT_COLLABORATOR_MAX_TOKENS,
  maxHistory: DEFAULT_MAX_HISTORY,
} as const satisfies EngineConfig;

export function loadEngineConfig(): EngineConfig {
  return {
    maxDepth: parsePositiveIntEnv('TOOLSTACK_MAX_DEPTH', DEFAULT_MAX_DEPTH),
    depthIncrement: parsePositiveIntEnv(
      'TOOLSTACK_DEPTH_INCREMENT',
      DEFAULT_DEPTH_INCREMENT
    ),
    sessionTtlMs: parsePositiveIntEnv(
      'TOOLSTACK_SESSION_TTL_MS',
      DEFAULT_SESSION_TTL_MS
    ),
    maxSessions: parsePositiveIntEnv(
      'TOOLSTACK_MAX_SESSIONS',
      DEFAULT_MAX_SESSIONS
    ),
    collaboratorTimeoutMs: parsePositiveIntEnv(
      'TOOLSTACK_COLLABORATOR_TIMEOUT_MS',
      DEFAULT_COLLABORATOR_TIMEOUT_MS
    ),
    collaboratorMaxTokens: parsePositiveIntEnv(
      'TOOLSTACK_COLLABORATOR_MAX_TOKENS',
      DEFAULT_COLLABORATOR_MAX_TOKENS
    ),
    maxHistory: parsePositiveIntEnv('TOOLSTACK_MAX_HISTORY', DEFAULT_MAX_HISTORY),
  };
}
