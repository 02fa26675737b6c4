import { z } from 'zod';

export const toncenterMessageSchema = z.object({
  source: z.string().nullish(),
  destination: z.string().nullish(),
  value: z.string().nullish(),
});

export const toncenterTransactionSchema = z.object({
  hash: z.string().min(1),
  now: z.number().int(),
  account: z.string().nullish(),
  in_msg: toncenterMessageSchema.nullish(),
});

export const toncenterTransactionsResponseSchema = z.object({
  transactions: z.array(z.unknown()),
});

export type ToncenterTransaction = z.infer<typeof toncenterTransactionSchema>;
