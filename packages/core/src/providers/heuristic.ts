import type { CommandProvider, ProposalRequest } from '../types.js';

/**
 * Proposes the first table suggestion that has not been tried yet.
 */
export class HeuristicCommandProvider implements CommandProvider {
  readonly name = 'heuristic';

  async proposeCommand(request: ProposalRequest): Promise<string | undefined> {
    const tried = new Set(request.tried);
    return request.suggestions.find((suggestion) => !tried.has(suggestion));
  }
}
