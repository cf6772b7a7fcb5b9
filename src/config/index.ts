import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

export const ENTRY_STRATEGY_NAMES = [
  'midpoint',
  'range_break',
  'momentum',
  'adaptive',
  'dual_entry',
  'triple_entry',
  'multi_tp_entry',
  'multi_position_entry',
] as const;

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const phraseList = z
  .string()
  .transform((v) => v.split(',').map((p) => p.trim()).filter((p) => p.length > 0));

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Broker
  broker: z.enum(['paper', 'hyperliquid']).default('paper'),
  hlPrivateKey: z.string().optional(),
  hlWalletAddress: z.string().optional(),
  hlUseTestnet: booleanFlag.default('true'),
  hlSlippagePct: z.coerce.number().positive().max(10).default(0.5),

  // Telegram (source feed + alert chat)
  tgBotToken: z.string().optional(),
  tgSourceChatId: z.string().optional(),
  tgAlertChatId: z.string().optional(),

  // Outbound notifications
  notifyWebhookUrl: z.string().url().optional(),

  // Entry
  entryStrategy: z.enum(ENTRY_STRATEGY_NAMES).default('adaptive'),
  symbolMode: z.enum(['fixed', 'extract']).default('fixed'),
  tradingSymbol: z.string().min(1).default('XAUUSD'),
  defaultVolume: z.coerce.number().positive().default(0.09),
  defaultVolumeMulti: z.coerce.number().positive().default(0.01),
  numberPositionsMulti: z.coerce.number().int().min(3).max(50).default(9),
  positionVolumeMulti: z.coerce.number().positive().default(0.01),
  minMarketDistance: z.coerce.number().nonnegative().default(1.0),
  orderCommentPrefix: z.string().max(12).default('TG'),

  // Position management
  bePartialVolume: z.coerce.number().positive().default(0.01),
  bePartialVolumeMulti: z.coerce.number().positive().default(0.01),
  partialsVolume: z.coerce.number().positive().default(0.02),
  partialsVolumeMulti: z.coerce.number().positive().default(0.01),
  tpHitCancelEnabled: booleanFlag.default('false'),

  // Message filtering
  minMessageLength: z.coerce.number().int().nonnegative().default(10),
  rangeCeiling: z.coerce.number().positive().default(50000),
  ignorePhrases: phraseList.optional(),

  // Ops
  dashboardPort: z.coerce.number().int().min(0).max(65535).default(8000),
  opsToken: z.string().optional(),
  dbPath: z.string().default('data/signal-bridge.db'),
}).superRefine((cfg, ctx) => {
  if (cfg.broker === 'hyperliquid' && !cfg.hlPrivateKey) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['hlPrivateKey'],
      message: 'HL_PRIVATE_KEY is required when BROKER=hyperliquid',
    });
  }
});

type Config = z.infer<typeof configSchema>;
type EntryStrategyName = (typeof ENTRY_STRATEGY_NAMES)[number];

// Empty strings in .env mean "unset"
function env(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

function loadConfig(): Config {
  const result = configSchema.safeParse({
    nodeEnv: env('NODE_ENV'),
    logLevel: env('LOG_LEVEL'),
    broker: env('BROKER'),
    hlPrivateKey: env('HL_PRIVATE_KEY'),
    hlWalletAddress: env('HL_WALLET_ADDRESS'),
    hlUseTestnet: env('HL_USE_TESTNET'),
    hlSlippagePct: env('HL_SLIPPAGE_PCT'),
    tgBotToken: env('TG_BOT_TOKEN'),
    tgSourceChatId: env('TG_SOURCE_CHAT_ID'),
    tgAlertChatId: env('TG_ALERT_CHAT_ID'),
    notifyWebhookUrl: env('NOTIFY_WEBHOOK_URL'),
    entryStrategy: env('ENTRY_STRATEGY'),
    symbolMode: env('SYMBOL_MODE'),
    tradingSymbol: env('TRADING_SYMBOL'),
    defaultVolume: env('DEFAULT_VOLUME'),
    defaultVolumeMulti: env('DEFAULT_VOLUME_MULTI'),
    numberPositionsMulti: env('NUMBER_POSITIONS_MULTI'),
    positionVolumeMulti: env('POSITION_VOLUME_MULTI'),
    minMarketDistance: env('MIN_MARKET_DISTANCE'),
    orderCommentPrefix: env('ORDER_COMMENT_PREFIX'),
    bePartialVolume: env('BE_PARTIAL_VOLUME'),
    bePartialVolumeMulti: env('BE_PARTIAL_VOLUME_MULTI'),
    partialsVolume: env('PARTIALS_VOLUME'),
    partialsVolumeMulti: env('PARTIALS_VOLUME_MULTI'),
    tpHitCancelEnabled: env('TP_HIT_CANCEL_ENABLED'),
    minMessageLength: env('MIN_MESSAGE_LENGTH'),
    rangeCeiling: env('RANGE_CEILING'),
    ignorePhrases: env('IGNORE_PHRASES'),
    dashboardPort: env('DASHBOARD_PORT'),
    opsToken: env('OPS_TOKEN'),
    dbPath: env('DB_PATH'),
  });

  if (!result.success) {
    console.error('Configuration validation failed:');
    for (const issue of result.error.issues) {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();
export type { Config, EntryStrategyName };
