/**
 * Ledger service wire schemas
 *
 * Every body read from the ledger service passes through one of these.
 * Unknown fields are kept so that blocks and transactions survive a round
 * trip unchanged.
 */

import { z } from "zod";

// ── Transaction ─────────────────────────────────────────────────

export const TransactionSchema = z.object({
  src: z.string().nullish()
    .describe("Identity the value moves from"),
  dst: z.string().nullish()
    .describe("Identity the value moves to"),
  nonce: z.unknown()
    .describe("Unique opaque id of the transaction; may be null or absent")
}).passthrough();

export type Transaction = z.infer<typeof TransactionSchema>;

// ── Block ───────────────────────────────────────────────────────

export const BlockSchema = z.object({
  index: z.number().int().min(0),
  prev_hash: z.string().nullish()
    .describe("Digest of the parent block; absent or null on genesis"),
  nonce: z.number().int().min(0),
  txs: z.array(TransactionSchema).default([]),
  nice: z.string().nullish()
    .describe("Marker identity; absent or null on unmarked blocks")
}).passthrough();

export type Block = z.infer<typeof BlockSchema>;

// ── GET /block ──────────────────────────────────────────────────

export const HeadResponseSchema = z.object({
  hash: z.string().min(1),
  block: BlockSchema
});

export type HeadSnapshot = z.infer<typeof HeadResponseSchema>;

// ── GET /block?hash= ────────────────────────────────────────────

export const BlockResponseSchema = z.object({
  block: BlockSchema.nullish()
});

// ── GET /txpool ─────────────────────────────────────────────────

export const PoolResponseSchema = z.object({
  hash: z.string().min(1),
  txs: z.array(TransactionSchema).default([])
});

export type PoolSnapshot = z.infer<typeof PoolResponseSchema>;
