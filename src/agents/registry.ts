import { ConfigurationError } from '../engine/errors';
import { FirstLegalAgent } from './first-legal-agent';
import { MinimaxAgent } from './minimax-agent';
import { RandomAgent } from './random-agent';
import type { AgentFactory } from './types';

export interface AgentEntry {
  name: string;
  factory: AgentFactory;
}

/**
 * Returns the agents available to the simulator and the HTTP API.
 */
export function getAgents(): AgentEntry[] {
  return [
    {
      name: 'Minimax',
      factory: (game, options, evaluator) =>
        new MinimaxAgent(game, {
          maxDepth: options.maxSearchDepth,
          evaluator,
          tieBreak: options.tieBreak,
          name: 'Minimax',
        }),
    },
    {
      name: 'Random',
      factory: (game, options) => new RandomAgent(game, options.seed, 'Random'),
    },
    {
      name: 'FirstLegal',
      factory: (game) => new FirstLegalAgent(game, 'FirstLegal'),
    },
  ];
}

export function getAgent(name: string): AgentEntry {
  const entry = getAgents().find((a) => a.name === name);
  if (!entry) {
    throw new ConfigurationError(`Unknown agent "${name}"`);
  }
  return entry;
}
