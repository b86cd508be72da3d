import { z } from "zod";
import type { Block, Coin, Input, Signature, Transaction } from "../interfaces";

const HashSchema = z.string().regex(/^[0-9a-f]{64}$/, "expected a hex sha256 digest");

const AddressSchema = z.string().min(1);

const AmountSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

// Ledger data may carry zero-value coins; the wallet's own builders reject them.
const CoinSchema: z.ZodType<Coin> = z.object({
  value: AmountSchema,
  owner: AddressSchema,
});

const SignatureSchema: z.ZodType<Signature> = z.discriminatedUnion("type", [
  z.object({ type: z.literal("valid"), address: AddressSchema }),
  z.object({ type: z.literal("invalid") }),
]);

const InputSchema: z.ZodType<Input> = z.object({
  coinId: HashSchema,
  signature: SignatureSchema,
});

export const TransactionSchema: z.ZodType<Transaction> = z.object({
  inputs: z.array(InputSchema),
  outputs: z.array(CoinSchema),
});

export const BlockSchema: z.ZodType<Block> = z.object({
  parent: HashSchema,
  number: z.number().int().nonnegative(),
  body: z.array(TransactionSchema),
});

export const BestBlockResponseSchema = z.object({
  height: z.number().int().nonnegative(),
  blockId: HashSchema,
});

export const HeightParamsSchema = z.object({
  height: z.coerce.number().int().nonnegative(),
});

export const NewBlockBodySchema = z.object({
  parent: HashSchema,
  body: z.array(TransactionSchema).default([]),
  best: z.boolean().default(false),
});

export const SetBestBodySchema = z.object({
  id: HashSchema,
});

export const ManualTransactionBodySchema = z.object({
  inputs: z.array(HashSchema),
  outputs: z.array(CoinSchema),
});

export const AutomaticTransactionBodySchema = z.object({
  recipient: AddressSchema,
  amount: AmountSchema,
  tip: AmountSchema.default(0),
});
