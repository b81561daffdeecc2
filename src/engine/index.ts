export { ChatSession } from './chat-session.js';
export type { ChatSessionOptions, ChatTurn } from './chat-session.js';
export {
  SamplingCollaborator,
  parseContinuityVerdict,
  parseSelectionDecision,
} from './collaborator.js';
export type { Collaborator, CollaboratorPrompt } from './collaborator.js';
export { DEFAULT_ENGINE_CONFIG, loadEngineConfig } from './config.js';
export type { EngineConfig } from './config.js';
export { engineEvents } from './events.js';
export { Orchestrator } from './orchestrator.js';
export type { OrchestratorOptions } from './orchestrator.js';
export { SessionStore } from './session-store.js';
export { ToolStack } from './tool-stack.js';
