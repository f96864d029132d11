import { strict as assert } from "assert";
import {
  canonicalEncode,
  hashState,
  chainHash,
  TranscriptBuilder,
  InvalidMoveError,
  InvariantViolationError,
  GameError,
  GameErrorCode,
  isGameError,
} from "./index";

describe("canonicalEncode", () => {
  it("sorts object keys and drops undefined members", () => {
    assert.equal(
      canonicalEncode({ b: 1, a: { d: undefined, c: [2, 1] } }),
      '{"a":{"c":[2,1]},"b":1}'
    );
  });

  it("encodes maps as objects with sorted keys", () => {
    const map = new Map<string, number>([
      ["z", 1],
      ["a", 2],
    ]);
    assert.equal(canonicalEncode(map), '{"a":2,"z":1}');
  });

  it("encodes sets as sorted arrays", () => {
    assert.equal(canonicalEncode(new Set(["b", "a"])), '["a","b"]');
  });

  it("keeps array order", () => {
    assert.equal(canonicalEncode([3, 1, 2]), "[3,1,2]");
  });
});

describe("hashState / chainHash", () => {
  it("produces a 0x-prefixed sha256 hex digest", () => {
    assert.match(hashState({ a: 1 }), /^0x[0-9a-f]{64}$/);
  });

  it("ignores key insertion order", () => {
    assert.equal(hashState({ a: 1, b: 2 }), hashState({ b: 2, a: 1 }));
  });

  it("distinguishes different states", () => {
    assert.notEqual(hashState({ a: 1 }), hashState({ a: 2 }));
  });

  it("chains on the previous hash", () => {
    const root = hashState({ start: true });
    assert.notEqual(chainHash(root, { move: 1 }), hashState({ move: 1 }));
    assert.equal(chainHash(root, { move: 1 }), chainHash(root, { move: 1 }));
  });
});

describe("TranscriptBuilder", () => {
  it("links each entry to the previous hash", () => {
    const builder = new TranscriptBuilder("m1", "reversi", { turn: 0 }, () => 42);
    const initialHash = builder.getCurrentHash();

    const first = builder.addEntry("alice", { type: "pass" }, { turn: 1 });
    const afterFirst = builder.getCurrentHash();
    const second = builder.addEntry("bob", { type: "pass" }, { turn: 2 });

    assert.equal(first.sequence, 0);
    assert.equal(first.prevHash, initialHash);
    assert.equal(first.stateHash, hashState({ turn: 1 }));
    assert.equal(first.timestamp, 42);
    assert.equal(afterFirst, chainHash(initialHash, first));

    assert.equal(second.sequence, 1);
    assert.equal(second.prevHash, afterFirst);
    assert.equal(builder.getEntryCount(), 2);

    const transcript = builder.getTranscript();
    assert.equal(transcript.matchId, "m1");
    assert.equal(transcript.gameId, "reversi");
    assert.equal(transcript.entries.length, 2);
    assert.equal(transcript.rootHash, builder.getCurrentHash());
  });

  it("returns a copy of the entries", () => {
    const builder = new TranscriptBuilder("m1", "reversi", {});
    builder.addEntry("alice", null, {});
    builder.getTranscript().entries.pop();
    assert.equal(builder.getTranscript().entries.length, 1);
  });
});

describe("errors", () => {
  it("tags invalid moves", () => {
    const err = new InvalidMoveError("not legal", { col: 0, row: 0 });
    assert.ok(err instanceof GameError);
    assert.ok(err instanceof Error);
    assert.equal(err.code, GameErrorCode.INVALID_MOVE);
    assert.equal(err.name, "InvalidMoveError");
    assert.deepEqual(err.details, { col: 0, row: 0 });
    assert.equal(isGameError(err), true);
  });

  it("tags invariant violations", () => {
    const err = new InvariantViolationError("out of sync");
    assert.equal(err.code, GameErrorCode.INVARIANT_VIOLATION);
    assert.equal(err.message, "out of sync");
    assert.equal(isGameError(new Error("plain")), false);
  });
});
