import { Bot, type Context } from 'grammy';
import { config } from '../config/index.js';
import type { SignalBridgeEngine } from '../core/engine.js';
import { createChildLogger } from './logger.js';
import { formatEngineStatus } from './messages.js';

const log = createChildLogger('telegram');

const MAX_MESSAGE_LENGTH = 4000;

let bot: Bot | null = null;
let heartbeatInterval: ReturnType<typeof setInterval> | null = null;
let lastBotAlive = 0;

/**
 * Starts the bot: posts in the source chat feed the engine, and `/status` in
 * the alert chat reports the live book. Returns null when no token is set.
 */
export function initTelegram(engine: SignalBridgeEngine): Bot | null {
  if (!config.tgBotToken) {
    log.warn('Telegram not configured (TG_BOT_TOKEN missing)');
    return null;
  }
  if (!config.tgSourceChatId) {
    log.warn('TG_SOURCE_CHAT_ID missing, no signals will be received');
  }

  bot = new Bot(config.tgBotToken);

  // === /status : open positions and pending orders ===

  bot.command('status', async (ctx: Context) => {
    if (!isAlertChat(ctx)) return;
    try {
      const status = await engine.getStatus();
      await replyLong(ctx, formatEngineStatus(status));
    } catch (err) {
      log.error({ err }, 'Failed to build status');
      await ctx.reply('Status unavailable, check the logs.');
    }
  });

  // NOTE: registered after the commands so /status is not fed to the engine
  bot.on(['channel_post', 'message'], async (ctx: Context) => {
    if (!isSourceChat(ctx)) return;
    const text = messageText(ctx.msg);
    if (!text) return;

    log.info({ chatId: ctx.chat?.id, messageId: ctx.msg?.message_id, length: text.length }, 'Message received');
    try {
      await engine.handleMessage(text);
    } catch (err) {
      log.error({ err }, 'Engine failed to handle message');
    }
  });

  bot.catch((err) => {
    log.error({ err: err.error, updateId: err.ctx.update.update_id }, 'Telegram update handler failed');
  });

  bot.start({
    allowed_updates: ['message', 'channel_post'],
    onStart: () => {
      log.info('Telegram bot started');
      lastBotAlive = Date.now();
    },
  }).catch((err: unknown) => {
    log.error({ err }, 'Telegram polling stopped');
  });

  // Heartbeat: verify bot connection every 5 minutes
  heartbeatInterval = setInterval(() => {
    if (!bot) return;
    bot.api.getMe().then(() => {
      lastBotAlive = Date.now();
    }).catch((err: unknown) => {
      const downtime = Date.now() - lastBotAlive;
      log.error({ err, downtimeMs: downtime }, 'Telegram heartbeat failed, bot may be disconnected');
    });
  }, 5 * 60_000);

  return bot;
}

/** Text of a post, or the caption of a media post */
export function messageText(msg: { text?: string; caption?: string } | undefined): string | null {
  const text = msg?.text ?? msg?.caption;
  return text && text.trim().length > 0 ? text : null;
}

function isSourceChat(ctx: Context): boolean {
  return ctx.chat?.id?.toString() === config.tgSourceChatId;
}

function isAlertChat(ctx: Context): boolean {
  return config.tgAlertChatId !== undefined && ctx.chat?.id?.toString() === config.tgAlertChatId;
}

async function replyLong(ctx: Context, text: string): Promise<void> {
  for (const chunk of splitMessage(text)) {
    await ctx.reply(chunk, { parse_mode: 'HTML' });
  }
}

export async function sendAlert(message: string): Promise<void> {
  if (!bot || !config.tgAlertChatId) return;
  try {
    for (const chunk of splitMessage(message)) {
      await bot.api.sendMessage(config.tgAlertChatId, chunk, { parse_mode: 'HTML' });
    }
  } catch (err) {
    log.error({ err }, 'Failed to send Telegram alert');
  }
}

export function splitMessage(text: string, maxLen: number = MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= maxLen) return [text];

  const chunks: string[] = [];
  let current = '';
  for (const line of text.split('\n')) {
    if (current && current.length + line.length + 1 > maxLen) {
      chunks.push(current);
      current = line;
    } else {
      current = current ? `${current}\n${line}` : line;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

export async function stopTelegram(): Promise<void> {
  if (heartbeatInterval) {
    clearInterval(heartbeatInterval);
    heartbeatInterval = null;
  }
  if (bot) {
    await bot.stop();
    bot = null;
  }
}
