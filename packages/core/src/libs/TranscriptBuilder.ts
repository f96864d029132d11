import { TranscriptEntry, MatchTranscript } from "../types/match";
import { hashState, chainHash } from "./Crypto";

/**
 * Builds a hash-chained move transcript as actions are applied.
 * Each entry links to the previous one via chainHash, starting from the
 * hash of the initial state.
 */
export class TranscriptBuilder {
  private readonly entries: TranscriptEntry[] = [];
  private currentHash: string;

  constructor(
    private readonly matchId: string,
    private readonly gameId: string,
    initialState: unknown,
    private readonly clock: () => number = Date.now
  ) {
    this.currentHash = hashState(initialState);
  }

  addEntry(player: string, action: unknown, newState: unknown): TranscriptEntry {
    const entry: TranscriptEntry = {
      sequence: this.entries.length,
      player,
      action,
      stateHash: hashState(newState),
      prevHash: this.currentHash,
      timestamp: this.clock(),
    };

    this.currentHash = chainHash(this.currentHash, entry);
    this.entries.push(entry);

    return entry;
  }

  getTranscript(): MatchTranscript {
    return {
      matchId: this.matchId,
      gameId: this.gameId,
      entries: [...this.entries],
      rootHash: this.currentHash,
    };
  }

  getCurrentHash(): string {
    return this.currentHash;
  }

  getEntryCount(): number {
    return this.entries.length;
  }
}
