import { toIntent } from '@cmdtrust/shared';
import type { CommandProvider, ProposalRequest } from '../types.js';

/**
 * Answers from a fixed intent -> command map, e.g. commands read from a
 * config file. A command that was already tried is not proposed again.
 */
export class StaticCommandProvider implements CommandProvider {
  readonly name: string;
  private readonly commands: Map<string, string>;

  constructor(commands: Record<string, string>, name = 'static') {
    this.name = name;
    this.commands = new Map(
      Object.entries(commands).map(([intent, command]) => [toIntent(intent), command]),
    );
  }

  async proposeCommand(request: ProposalRequest): Promise<string | undefined> {
    const command = this.commands.get(toIntent(request.intent));
    if (!command || request.tried.includes(command)) {
      return undefined;
    }
    return command;
  }
}
