import { parentPort } from 'worker_threads';
import type { MessagePort } from 'worker_threads';
import { z } from 'zod';
import type { Agent } from './types';
import type { DecisionResponse } from './worker-agent';

const requestSchema = z.object({
  id: z.number(),
  state: z.unknown(),
  timeBudgetMs: z.number(),
});

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Answers WorkerAgent decision requests on `port` (the worker's parent port
 * by default). Call once from the worker module.
 */
export function serveAgent<S, A>(
  agent: Agent<S, A>,
  stateSchema: z.ZodType<S>,
  port: MessagePort | null = parentPort
): void {
  if (!port) {
    throw new Error('serveAgent must run inside a worker thread');
  }
  const reply = (response: DecisionResponse): void => port.postMessage(response);

  const answer = async (id: number, state: S, timeBudgetMs: number): Promise<void> => {
    try {
      const action = await agent.decide(state, timeBudgetMs);
      reply({ id, ok: true, action });
    } catch (err) {
      reply({ id, ok: false, message: `${agent.name}: ${errorMessage(err)}` });
    }
  };

  port.on('message', (message: unknown) => {
    const request = requestSchema.safeParse(message);
    if (!request.success) {
      throw new Error(`malformed decision request: ${request.error.issues.map((i) => i.message).join('; ')}`);
    }
    const { id, timeBudgetMs } = request.data;
    const state = stateSchema.safeParse(request.data.state);
    if (!state.success) {
      reply({ id, ok: false, message: `invalid state: ${state.error.issues.map((i) => i.message).join('; ')}` });
      return;
    }
    void answer(id, state.data, timeBudgetMs);
  });
}
