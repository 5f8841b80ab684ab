import { z } from 'zod';
import { EVM_CHAINS } from '../types/chain.js';

export const postMessageSchema = z.object({
  sender: z.string().min(1).max(128),
  text: z.string().max(4096),
});

export const listPositionsQuerySchema = z.object({
  status: z.enum(['OPEN', 'PARTIAL', 'CLOSED']).optional(),
});

export const positionParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const listTradesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(20),
});

export const createWalletSchema = z.object({
  address: z.string().trim().min(32).max(44),
  chain: z.enum(['solana', 'evm-like', ...EVM_CHAINS]).optional(),
  nickname: z
    .string()
    .trim()
    .min(1)
    .max(64)
    .regex(/^[^\s,;]+$/, 'Nickname cannot contain spaces, commas or semicolons')
    .optional(),
});

export type PostMessageInput = z.infer<typeof postMessageSchema>;
export type CreateWalletInput = z.infer<typeof createWalletSchema>;
