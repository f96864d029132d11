export interface TranscriptEntry {
  sequence: number;
  player: string;
  action: unknown;
  stateHash: string;
  prevHash: string;
  timestamp: number;
}

export interface MatchTranscript {
  matchId: string;
  gameId: string;
  entries: TranscriptEntry[];
  rootHash: string;
}
