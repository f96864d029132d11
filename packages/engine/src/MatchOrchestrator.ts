import {
  GameState,
  Action,
  Outcome,
  Observation,
  MatchTranscript,
  TranscriptBuilder,
  InvalidMoveError,
} from "@flipside/core";
import { IGameModule } from "./interfaces/IGameModule";

export interface MatchOrchestratorOptions<TData, TPublic> {
  game: IGameModule<TData, TPublic>;
  players: string[];
  matchId: string;
  settings?: Record<string, unknown>;
  /** Timestamp source for transcript entries */
  clock?: () => number;
}

export interface SubmitResult<TPublic> {
  observation: Observation<TPublic>;
  terminal: boolean;
  outcome?: Outcome;
}

/**
 * Orchestrates a single match: manages turns, validates moves,
 * applies state transitions, and builds the transcript.
 */
export class MatchOrchestrator<TData, TPublic> {
  private readonly game: IGameModule<TData, TPublic>;
  private readonly transcript: TranscriptBuilder;
  private state: GameState<TData>;

  constructor(opts: MatchOrchestratorOptions<TData, TPublic>) {
    this.game = opts.game;

    const config = {
      gameId: opts.game.gameId,
      version: "0.1.0",
      settings: opts.settings,
    };
    this.state = opts.game.init(config, opts.players);
    this.transcript = new TranscriptBuilder(
      opts.matchId,
      opts.game.gameId,
      this.state,
      opts.clock
    );
  }

  getState(): GameState<TData> {
    return this.state;
  }

  getCurrentPlayer(): string {
    return this.state.currentPlayer;
  }

  isTerminal(): boolean {
    return this.game.isTerminal(this.state);
  }

  getOutcome(): Outcome {
    return this.game.getOutcome(this.state);
  }

  getObservation(playerId: string): Observation<TPublic> {
    return this.game.getObservation(this.state, playerId);
  }

  getLegalActions(playerId: string): Action[] {
    return this.game.getLegalActions(this.state, playerId);
  }

  getTranscript(): MatchTranscript {
    return this.transcript.getTranscript();
  }

  /**
   * Submit a move. Returns the new observation, or throws InvalidMoveError
   * with the state unchanged.
   */
  submitAction(playerId: string, action: Action): SubmitResult<TPublic> {
    if (this.isTerminal()) {
      throw new InvalidMoveError("Game is already over");
    }

    if (this.state.currentPlayer !== playerId) {
      throw new InvalidMoveError(
        `Not your turn. Current player: ${this.state.currentPlayer}`,
        { playerId }
      );
    }

    if (!this.game.validateAction(this.state, playerId, action)) {
      throw new InvalidMoveError("Invalid action", { action });
    }

    this.state = this.game.applyAction(this.state, playerId, action);
    this.transcript.addEntry(playerId, action, this.state);

    const terminal = this.game.isTerminal(this.state);
    const observation = this.game.getObservation(this.state, playerId);

    return {
      observation,
      terminal,
      outcome: terminal ? this.game.getOutcome(this.state) : undefined,
    };
  }
}
