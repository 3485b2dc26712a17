// Learning protocol
export {
  LearningProtocol,
  AGENT_PROVIDED,
  type CreateLearningProtocolOptions,
  type LearningProtocolOptions,
} from './learning-protocol.js';

// Providers and detection
export type { CommandProvider, ProjectDetector, ProposalRequest } from './types.js';
export { HeuristicCommandProvider, StaticCommandProvider } from './providers/index.js';
export { MarkerFileDetector } from './detect.js';
export { COMMAND_SUGGESTIONS, getCommandSuggestions, type SuggestionTable } from './suggestions.js';
