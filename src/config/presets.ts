import { createSimulationConfig } from './index';
import type { SimulationConfig } from './index';

export interface ConfigPreset {
  id: string;
  label: string;
  config: SimulationConfig;
}

export const CONFIG_PRESETS: ConfigPreset[] = [
  {
    id: 'default',
    label: 'Tic-tac-toe, 20 contests per pairing',
    config: createSimulationConfig({ forfeitOnViolation: true }),
  },
  {
    id: 'quick',
    label: 'Quick (4 contests, depth 4)',
    config: createSimulationConfig({ forfeitOnViolation: true, contestCount: 4, maxSearchDepth: 4 }),
  },
  {
    id: 'blitz',
    label: 'Blitz (50ms per move)',
    config: createSimulationConfig({ forfeitOnViolation: true, timeBudgetPerMoveMs: 50, timeToleranceMs: 20 }),
  },
  {
    id: 'counting',
    label: 'Counting to 21 (depth 12)',
    config: createSimulationConfig({ forfeitOnViolation: true, gameName: 'counting-21', maxSearchDepth: 12 }),
  },
  {
    id: 'connect-four',
    label: 'Connect-4 (4 contests, 200ms per move, depth 8)',
    config: createSimulationConfig({
      forfeitOnViolation: true,
      gameName: 'connect-four',
      contestCount: 4,
      timeBudgetPerMoveMs: 200,
      maxSearchDepth: 8,
    }),
  },
  {
    id: 'debug',
    label: 'Debug (4 contests, full histories)',
    config: createSimulationConfig({ forfeitOnViolation: true, contestCount: 4, loggingMode: 'debug' }),
  },
  {
    id: 'strict',
    label: 'Strict (violations abort the run)',
    config: createSimulationConfig({ forfeitOnViolation: false, contestCount: 10 }),
  },
];

export function getPreset(id: string): ConfigPreset | undefined {
  return CONFIG_PRESETS.find((p) => p.id === id);
}
