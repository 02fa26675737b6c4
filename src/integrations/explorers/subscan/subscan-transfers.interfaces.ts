import { z } from 'zod';

export const SUBSCAN_SUCCESS_CODE = 0;
export const SUBSCAN_MAX_ROWS = 100;

export const subscanTransferSchema = z.object({
  hash: z.string().min(1),
  from: z.string(),
  to: z.string(),
  amount: z.string(),
  block_timestamp: z.number().int(),
  success: z.boolean().optional(),
});

export const subscanTransfersResponseSchema = z.object({
  code: z.number().int(),
  message: z.string().optional(),
  data: z
    .object({
      transfers: z.array(z.unknown()).nullish(),
    })
    .nullish(),
});

export type SubscanTransfer = z.infer<typeof subscanTransferSchema>;
