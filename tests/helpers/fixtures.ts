import { FakeHeaderSv, binary, json } from "./fakeHeaderSv";

export const TIP_HASH = "ab".repeat(32);
export const STALE_HASH = "cd".repeat(32);
export const NEXT_HASH = "ef".repeat(32);

export const TIP_HEIGHT = 120;

export const RAW_HEADER = Buffer.alloc(80, 7);
export const NEXT_RAW_HEADER = Buffer.alloc(80, 9);

export function header(hash: string) {
  return {
    hash,
    version: 536870912,
    prevBlockHash: "00".repeat(32),
    merkleRoot: "11".repeat(32),
    creationTimestamp: 1700000000,
    difficultyTarget: 545259519,
    nonce: 2,
    transactionCount: 1,
    work: 2,
  };
}

export function tip(hash: string, height: number, state = "LONGEST_CHAIN") {
  return { header: header(hash), state, chainWork: 242, height, confirmations: 1 };
}

export const CHAIN_TIPS = [tip(TIP_HASH, TIP_HEIGHT), tip(STALE_HASH, 117, "STALE")];

/** Serves one LONGEST_CHAIN tip and its raw header. */
export function withHealthyChain(fake: FakeHeaderSv): FakeHeaderSv {
  return fake
    .on("/api/v1/chain/tips", json(CHAIN_TIPS))
    .on(`/api/v1/chain/header/${TIP_HASH}`, (req, res) => {
      if (req.headers["content-type"] === "application/octet-stream") {
        binary(RAW_HEADER)(req, res);
      } else {
        json(header(TIP_HASH))(req, res);
      }
    });
}
