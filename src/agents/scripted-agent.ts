import type { Agent } from './types';

/**
 * Replays a fixed list of actions, one per call, without checking legality.
 * Throws once the script runs out.
 */
export class ScriptedAgent<S, A> implements Agent<S, A> {
  readonly name: string;
  private readonly script: A[];
  private cursor = 0;

  constructor(script: A[], name = 'Scripted') {
    this.script = [...script];
    this.name = name;
  }

  get remaining(): number {
    return this.script.length - this.cursor;
  }

  decide(_state: S): A {
    if (this.cursor >= this.script.length) {
      throw new Error(`${this.name}: script exhausted after ${this.script.length} actions`);
    }
    return this.script[this.cursor++];
  }
}
