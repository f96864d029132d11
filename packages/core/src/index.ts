export * from "./types/game";
export * from "./types/match";
export * from "./libs/Encoding";
export * from "./libs/Crypto";
export * from "./errors";
export { TranscriptBuilder } from "./libs/TranscriptBuilder";
