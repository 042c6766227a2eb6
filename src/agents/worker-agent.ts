import { Worker } from 'worker_threads';
import { z } from 'zod';
import type { Agent } from './types';

export interface DecisionRequest<S> {
  id: number;
  state: S;
  timeBudgetMs: number;
}

export const decisionResponseSchema = z.discriminatedUnion('ok', [
  z.object({ id: z.number(), ok: z.literal(true), action: z.unknown() }),
  z.object({ id: z.number(), ok: z.literal(false), message: z.string() }),
]);

export type DecisionResponse = z.infer<typeof decisionResponseSchema>;

export interface WorkerAgentOptions<A> {
  name: string;
  /** Validates actions coming back from the worker. */
  actionSchema: z.ZodType<A>;
  /** Passed to the worker as `workerData`. */
  workerData?: unknown;
}

interface PendingDecision<A> {
  resolve: (action: A) => void;
  reject: (error: Error) => void;
}

/**
 * Runs an agent in a worker thread. The worker module answers
 * DecisionRequests (see `serveAgent`). `abort` terminates the thread, so a
 * strategy stuck in a loop is stopped at the deadline; the next decision
 * starts a fresh worker.
 */
export class WorkerAgent<S, A> implements Agent<S, A> {
  readonly name: string;
  private readonly modulePath: string;
  private readonly actionSchema: z.ZodType<A>;
  private readonly workerData: unknown;
  private readonly pending = new Map<number, PendingDecision<A>>();
  private worker: Worker | null = null;
  private nextId = 0;

  constructor(modulePath: string, options: WorkerAgentOptions<A>) {
    this.modulePath = modulePath;
    this.name = options.name;
    this.actionSchema = options.actionSchema;
    this.workerData = options.workerData;
  }

  get running(): boolean {
    return this.worker !== null;
  }

  decide(state: S, timeBudgetMs: number): Promise<A> {
    const worker = this.ensureWorker();
    const id = this.nextId++;
    const request: DecisionRequest<S> = { id, state, timeBudgetMs };
    return new Promise<A>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      worker.postMessage(request);
    });
  }

  abort(): Promise<void> {
    return this.close();
  }

  async close(): Promise<void> {
    const worker = this.worker;
    if (!worker) return;
    this.worker = null;
    this.rejectAll(new Error(`${this.name}: worker terminated`));
    await worker.terminate();
  }

  private ensureWorker(): Worker {
    if (this.worker) return this.worker;
    const worker = new Worker(this.modulePath, { workerData: this.workerData });
    worker.unref();
    worker.on('message', (message: unknown) => this.onMessage(message));
    worker.on('error', (err: Error) => this.onWorkerGone(worker, err));
    worker.on('exit', (code: number) =>
      this.onWorkerGone(worker, new Error(`${this.name}: worker exited with code ${code}`))
    );
    this.worker = worker;
    return worker;
  }

  private onMessage(message: unknown): void {
    const response = decisionResponseSchema.safeParse(message);
    if (!response.success) {
      this.rejectAll(new Error(`${this.name}: malformed worker response`));
      return;
    }
    const pending = this.pending.get(response.data.id);
    if (!pending) return;
    this.pending.delete(response.data.id);

    if (!response.data.ok) {
      pending.reject(new Error(response.data.message));
      return;
    }
    const action = this.actionSchema.safeParse(response.data.action);
    if (action.success) {
      pending.resolve(action.data);
    } else {
      pending.reject(
        new Error(`${this.name}: invalid action from worker: ${action.error.issues.map((i) => i.message).join('; ')}`)
      );
    }
  }

  private onWorkerGone(worker: Worker, err: Error): void {
    // Exits after close() belong to a worker that was already replaced.
    if (this.worker !== worker) return;
    this.worker = null;
    this.rejectAll(err);
  }

  private rejectAll(err: Error): void {
    for (const pending of this.pending.values()) {
      pending.reject(err);
    }
    this.pending.clear();
  }
}
