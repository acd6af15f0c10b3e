// ============================================================
// Request Schemas
// ============================================================
// zod schemas for every JSON body the HTTP layer accepts.
// Field names follow the wire format (snake_case).
// ============================================================

import { z } from 'zod';

// --------------- Shared Fields ---------------

const action = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['buy', 'sell'], { errorMap: () => ({ message: 'Must be "buy" or "sell"' }) }));

/** Venue names are case-sensitive (kBONK); "dex:COIN" selects a HIP-3 market. */
const coin = z.string().trim().min(1, 'Coin is required');
const dex = z.string().trim().toLowerCase().optional();

const leverage = z.coerce
  .number({ invalid_type_error: 'Invalid leverage value' })
  .int('Leverage must be a whole number')
  .min(1, 'Leverage must be between 1 and 100')
  .max(100, 'Leverage must be between 1 and 100');

const collateralUsd = z.coerce
  .number({ invalid_type_error: 'Invalid collateral value' })
  .min(1, 'Minimum collateral is $1')
  .max(100_000, 'Maximum collateral is $100,000 per trade');

const pct = z.coerce.number().positive();
const sizePct = z.coerce.number().gt(0).max(100);
const price = z.coerce.number().positive();

// --------------- Webhook ---------------

export const webhookSchema = z
  .object({
    secret: z.string(),
    action: action.optional(),
    coin,
    dex,
    leverage: leverage.optional(),
    collateral_usd: collateralUsd.optional(),
    stop_loss_pct: pct.optional(),
    take_profit_pct: pct.optional(),
    indicator: z.string().trim().min(1).optional(),
    close_position: z.boolean().default(false),
    idempotency_key: z.string().trim().min(1).max(200).optional(),
  })
  .refine((body) => body.close_position || body.action !== undefined, {
    message: 'Invalid action. Must be "buy" or "sell"',
    path: ['action'],
  });

export type WebhookBody = z.infer<typeof webhookSchema>;

// --------------- Manual Orders ---------------

const entryBase = {
  coin,
  dex,
  action,
  leverage: leverage.optional(),
  collateral_usd: collateralUsd.optional(),
  idempotency_key: z.string().trim().min(1).max(200).optional(),
};

const protectiveFields = {
  stop_loss_pct: pct.optional(),
  take_profit_pct: pct.optional(),
  tp1_pct: pct.optional(),
  tp1_size_pct: sizePct.optional(),
  tp2_pct: pct.optional(),
  tp2_size_pct: sizePct.optional(),
};

export const tradeSchema = z.object({
  ...entryBase,
  ...protectiveFields,
  slippage: z.coerce.number().gt(0).max(0.1).optional(),
});

export type TradeBody = z.infer<typeof tradeSchema>;

export const limitOrderSchema = z.object({
  ...entryBase,
  ...protectiveFields,
  limit_price: price,
  reduce_only: z.boolean().default(false),
});

export type LimitOrderBody = z.infer<typeof limitOrderSchema>;

export const twapOrderSchema = z
  .object({
    ...entryBase,
    hours: z.coerce.number().int().min(0).max(24).default(0),
    minutes: z.coerce.number().int().min(0).max(59).default(30),
    slices: z.coerce.number().int().optional(),
    randomize: z.boolean().default(false),
  })
  .refine((body) => body.hours * 60 + body.minutes > 0, {
    message: 'Duration must be greater than zero',
    path: ['minutes'],
  });

export type TwapOrderBody = z.infer<typeof twapOrderSchema>;

export const twapCancelSchema = z.object({
  twap_id: z.string().trim().min(1),
});

export const scaleOrderSchema = z.object({
  ...entryBase,
  price_from: price,
  price_to: price,
  num_orders: z.coerce.number().int().default(5),
  skew: z.coerce.number().default(1),
  reduce_only: z.boolean().default(false),
});

export type ScaleOrderBody = z.infer<typeof scaleOrderSchema>;

export const batchTradeSchema = z.object({
  category: z.enum(['L1s', 'APPS', 'MEMES', 'HIP-3']),
  action,
  leverage: leverage.optional(),
  collateral_usd: collateralUsd.optional(),
  stop_loss_pct: pct.optional(),
});

export type BatchTradeBody = z.infer<typeof batchTradeSchema>;

// --------------- Position & Order Management ---------------

export const closeSchema = z.object({ coin, dex });

export const cancelOrderSchema = z.object({
  coin,
  dex,
  oid: z.union([z.string().trim().min(1), z.number().int().nonnegative()]).transform(String),
});

export const modifyOrderSchema = z.object({
  coin,
  dex,
  oid: z.union([z.string().trim().min(1), z.number().int().nonnegative()]).transform(String),
  new_price: price,
  new_size: z.coerce.number().positive().optional(),
});

export const botToggleSchema = z.object({
  enabled: z.boolean().default(true),
});

export const pauseSchema = z.object({
  minutes: z.coerce.number().int().min(1).max(7 * 24 * 60),
});

// --------------- Queries ---------------

export const tradesQuerySchema = z.object({
  status: z.enum(['open', 'closed', 'liquidated']).optional(),
  coin: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type TradesQuery = z.infer<typeof tradesQuerySchema>;
