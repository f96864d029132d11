export interface GameConfig {
  gameId: string;
  version: string;
  settings?: Record<string, unknown>;
}

/**
 * Envelope a game module hands back from `init` and `applyAction`.
 * `data` is owned by the module and opaque to the orchestrator.
 */
export interface GameState<TData> {
  gameId: string;
  players: string[];
  currentPlayer: string;
  turnNumber: number;
  data: TData;
}

export interface Action {
  type: string;
  data: Record<string, unknown>;
}

export interface Outcome {
  winner: string | null;
  draw: boolean;
  scores: Record<string, number>;
  reason: string;
}

export interface Observation<TPublic> {
  gameId: string;
  players: string[];
  currentPlayer: string;
  turnNumber: number;
  publicData: TPublic;
}
