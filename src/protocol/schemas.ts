import { z } from "zod";

// ---------------------------------------------------------------------------
// HeaderSV (upstream) JSON
// ---------------------------------------------------------------------------

const Hash = z.string().regex(/^[0-9a-fA-F]{64}$/, "expected 64 hex characters");

export const ChainHeaderSchema = z.object({
  hash: Hash,
  version: z.number().int(),
  prevBlockHash: Hash,
  merkleRoot: Hash,
  creationTimestamp: z.number().int(),
  difficultyTarget: z.number().int(),
  nonce: z.number().int(),
  transactionCount: z.number().int(),
  work: z.number(), // can exceed 2^53 on mainnet, so not checked as int
});

export const LONGEST_CHAIN = "LONGEST_CHAIN";

export const ChainTipSchema = z.object({
  header: ChainHeaderSchema,
  state: z.string(), // "LONGEST_CHAIN" | "STALE" | ...
  chainWork: z.number(),
  height: z.number().int().min(0).max(0xffffffff),
  confirmations: z.number().int(),
});

export const ChainTipsSchema = z.array(ChainTipSchema);

// ---------------------------------------------------------------------------
// REST (client → gateway)
// ---------------------------------------------------------------------------

export const HeaderParamsSchema = z.object({
  hash: z.string().min(1, "'hash' path parameter not supplied"),
});

export const HeadersByHeightQuerySchema = z.object({
  height: z.coerce.number().int().nonnegative().default(0),
  count: z.coerce.number().int().positive().default(1),
});

// ---------------------------------------------------------------------------
// Inferred TS types
// ---------------------------------------------------------------------------

export type ChainTip = z.infer<typeof ChainTipSchema>;
export type HeadersByHeightQuery = z.infer<typeof HeadersByHeightQuerySchema>;

/** Representation requested from HeaderSV. */
export type HeaderFormat = "json" | "binary";
