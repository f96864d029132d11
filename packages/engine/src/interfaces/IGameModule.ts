import { GameConfig, GameState, Action, Outcome, Observation } from "@flipside/core";

// ---------------------------------------------------------------------------
// Text UI specification, shipped by each game module for rendering
// ---------------------------------------------------------------------------

/**
 * Text UI specification that a game module provides so a terminal front end
 * can render and read moves for it without per-game logic of its own.
 */
export interface GameUISpec<TPublic> {
  /** Hint text shown to the current player (e.g. "Enter <col> <row> or pass") */
  inputHint: string;

  /** Render the board as a plain-text grid from publicData. */
  renderBoard(publicData: TPublic): string;

  /** Render a one-line status string, or null if nothing special. */
  renderStatus(publicData: TPublic): string | null;

  /** Parse raw user input into an Action, or return null if unreadable. */
  parseInput(raw: string, publicData: TPublic): Action | null;

  /** Format an Action for move history and logs. */
  formatAction(action: Action): string;

  /** Display label for a player given the seat assignment in publicData. */
  getPlayerLabel(playerId: string, publicData: TPublic): string;
}

// ---------------------------------------------------------------------------
// Game module ABI
// ---------------------------------------------------------------------------

/**
 * The functions every game module implements.
 *
 * Every function must be deterministic given the same inputs, and
 * `applyAction` must leave the state it was given untouched so earlier
 * states stay valid for the transcript.
 */
export interface IGameModule<TData, TPublic> {
  /** Unique identifier for this game (e.g., "reversi") */
  readonly gameId: string;

  /** Human-readable name */
  readonly name: string;

  /** Short description of the game */
  readonly description: string;

  /** Number of players required */
  readonly minPlayers: number;
  readonly maxPlayers: number;

  /** Text UI specification. */
  readonly ui?: GameUISpec<TPublic>;

  /** Initialize a new game state */
  init(config: GameConfig, players: string[]): GameState<TData>;

  /** Check if an action is valid in the current state */
  validateAction(state: GameState<TData>, playerId: string, action: Action): boolean;

  /** Apply an action and return the new state */
  applyAction(state: GameState<TData>, playerId: string, action: Action): GameState<TData>;

  /** Check if the game has ended */
  isTerminal(state: GameState<TData>): boolean;

  /** Get the outcome of a game state (reason "game_in_progress" until terminal) */
  getOutcome(state: GameState<TData>): Outcome;

  /** Get the observable state for a specific player */
  getObservation(state: GameState<TData>, playerId: string): Observation<TPublic>;

  /** Get all legal actions for a player in the current state */
  getLegalActions(state: GameState<TData>, playerId: string): Action[];
}
