import type { GameModel } from './types';

export interface PerftResult {
  depth: number;
  nodes: number;
  elapsedMs: number;
}

export interface PerftOptions {
  /** Memoize subtree counts on `stateKey` + remaining depth. Requires `game.stateKey`. */
  useTranspositions?: boolean;
  now?: () => number;
}

/**
 * Counts the leaves of the legal-move tree `depth` plies below `state`.
 * Terminal states count as a single leaf.
 */
export function perft<S, A>(
  game: GameModel<S, A>,
  state: S,
  depth: number,
  options: PerftOptions = {}
): PerftResult {
  const now = options.now ?? (() => performance.now());
  const keyOf = options.useTranspositions ? game.stateKey?.bind(game) : undefined;
  if (options.useTranspositions && !keyOf) {
    throw new Error(`${game.name} does not provide stateKey; transpositions unavailable`);
  }
  const table = new Map<string, number>();

  const count = (node: S, remaining: number): number => {
    if (remaining === 0 || game.isTerminal(node)) return 1;
    const actions = game.legalActions(node);
    if (remaining === 1) return actions.length;

    let key: string | undefined;
    if (keyOf) {
      key = `${keyOf(node)}@${remaining}`;
      const hit = table.get(key);
      if (hit !== undefined) return hit;
    }

    let nodes = 0;
    for (const action of actions) {
      nodes += count(game.apply(node, action), remaining - 1);
    }
    if (key !== undefined) table.set(key, nodes);
    return nodes;
  };

  const t0 = now();
  const nodes = count(state, depth);
  return { depth, nodes, elapsedMs: now() - t0 };
}

const NPS_UNITS = ['n/s', 'Kn/s', 'Mn/s', 'Gn/s'];

export function formatNodesPerSecond(result: PerftResult): string {
  if (result.elapsedMs <= 0) return '∞ n/s';
  let rate = result.nodes / (result.elapsedMs / 1000);
  let unit = 0;
  while (rate >= 1000 && unit < NPS_UNITS.length - 1) {
    rate /= 1000;
    unit++;
  }
  return `${rate.toFixed(2)} ${NPS_UNITS[unit]}`;
}
