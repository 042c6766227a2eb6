import { z } from 'zod';
import { ConfigurationError } from '../engine/errors';

export type LoggingMode = 'normal' | 'debug';
export type TieBreak = 'first' | 'last';

export interface ContestConfig {
  timeBudgetPerMoveMs: number;
  /** Overshoot allowed past the budget before a decision counts as a timeout. */
  timeToleranceMs: number;
  maxSearchDepth: number;
  /** true: a violating player loses the contest; false: the contest aborts with a ContestError. */
  forfeitOnViolation: boolean;
  forfeitUtility: number;
  tieBreak: TieBreak;
}

export interface SimulationConfig extends ContestConfig {
  gameName: string;
  contestCount: number;
  /** Alternate which agent moves first on every other contest. */
  swapSeats: boolean;
  seed: number;
  loggingMode: LoggingMode;
}

/** forfeitOnViolation has no default: callers must choose forfeit or abort. */
export type ContestConfigInput = Partial<ContestConfig> & Pick<ContestConfig, 'forfeitOnViolation'>;
export type SimulationConfigInput = Partial<SimulationConfig> & Pick<ContestConfig, 'forfeitOnViolation'>;

export const DEFAULT_CONTEST_CONFIG: Omit<ContestConfig, 'forfeitOnViolation'> = {
  timeBudgetPerMoveMs: 1000,
  timeToleranceMs: 50,
  maxSearchDepth: 9,
  forfeitUtility: 1,
  tieBreak: 'first',
};

export const DEFAULT_SIMULATION_CONFIG: Omit<SimulationConfig, keyof ContestConfig> = {
  gameName: 'tic-tac-toe',
  contestCount: 20,
  swapSeats: true,
  seed: 42,
  loggingMode: 'normal',
};

const contestConfigSchema = z.object({
  timeBudgetPerMoveMs: z.number().finite().positive(),
  timeToleranceMs: z.number().finite().nonnegative(),
  maxSearchDepth: z.number().int().min(1),
  forfeitOnViolation: z.boolean({ required_error: 'forfeitOnViolation must be chosen explicitly' }),
  forfeitUtility: z.number().finite().positive(),
  tieBreak: z.enum(['first', 'last']),
});

const simulationConfigSchema = contestConfigSchema.extend({
  gameName: z.string().min(1),
  contestCount: z.number().int().min(1),
  swapSeats: z.boolean(),
  seed: z.number().int(),
  loggingMode: z.enum(['normal', 'debug']),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('; ');
}

/**
 * Fills defaults and validates. Throws ConfigurationError on any invalid key.
 */
export function createContestConfig(input: ContestConfigInput): ContestConfig {
  const parsed = contestConfigSchema.safeParse({ ...DEFAULT_CONTEST_CONFIG, ...input });
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid contest config: ${describeIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}

export function createSimulationConfig(input: SimulationConfigInput): SimulationConfig {
  const parsed = simulationConfigSchema.safeParse({
    ...DEFAULT_CONTEST_CONFIG,
    ...DEFAULT_SIMULATION_CONFIG,
    ...input,
  });
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid simulation config: ${describeIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}
