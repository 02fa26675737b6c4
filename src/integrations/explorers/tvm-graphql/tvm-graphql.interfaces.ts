import { z } from 'zod';

export const tvmInMessageSchema = z.object({
  value: z.string().nullish(),
  src: z.string().nullish(),
  dst: z.string().nullish(),
});

export const tvmTransactionSchema = z.object({
  id: z.string().min(1),
  now: z.number().int(),
  balance_delta: z.string().nullish(),
  account_addr: z.string().nullish(),
  in_message: tvmInMessageSchema.nullish(),
});

export const tvmTransactionsResponseSchema = z.object({
  data: z
    .object({
      transactions: z.array(z.unknown()).nullish(),
    })
    .nullish(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

export type TvmTransaction = z.infer<typeof tvmTransactionSchema>;

export const buildLatestTransactionsQuery = (limit: number): string => `query {
  transactions(limit: ${String(limit)}, orderBy: { path: "now", direction: DESC }) {
    id
    now
    balance_delta
    account_addr
    in_message {
      value
      src
      dst
    }
  }
}`;
