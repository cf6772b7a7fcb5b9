import type { Server } from 'node:http';
import { config } from './config/index.js';
import type { Broker } from './core/broker.js';
import { createEngine } from './core/engine.js';
import { startDashboard, stopDashboard } from './dashboard/server.js';
import { closeDb, getDb } from './data/storage.js';
import { HyperliquidBroker } from './exchanges/hyperliquid/broker.js';
import { HyperliquidClient } from './exchanges/hyperliquid/client.js';
import { PaperBroker } from './exchanges/paper/broker.js';
import { createChildLogger } from './monitoring/logger.js';
import { CallbackNotifier, FanoutNotifier, WebhookNotifier, type Notifier } from './monitoring/notifier.js';
import { initTelegram, sendAlert, stopTelegram } from './monitoring/telegram.js';

const log = createChildLogger('main');

function createBroker(): Broker {
  if (config.broker === 'paper') {
    log.warn('BROKER=paper: orders are simulated, nothing reaches a venue');
    return new PaperBroker();
  }

  // Presence is enforced by the config schema when BROKER=hyperliquid
  const privateKey = config.hlPrivateKey ?? '';
  const client = new HyperliquidClient({
    privateKey,
    walletAddress: config.hlWalletAddress,
    testnet: config.hlUseTestnet,
  });
  return new HyperliquidBroker(client, { slippagePct: config.hlSlippagePct });
}

function createNotifier(): FanoutNotifier {
  const targets: Notifier[] = [];
  if (config.notifyWebhookUrl) {
    targets.push(new WebhookNotifier(config.notifyWebhookUrl));
  }
  if (config.tgBotToken && config.tgAlertChatId) {
    targets.push(new CallbackNotifier(sendAlert));
  }
  return new FanoutNotifier(targets);
}

async function main(): Promise<void> {
  log.info({ strategy: config.entryStrategy, broker: config.broker }, 'signal-bridge starting...');

  getDb();

  const notifier = createNotifier();
  if (notifier.size === 0) {
    log.warn('No notification targets configured (NOTIFY_WEBHOOK_URL / TG_ALERT_CHAT_ID)');
  }

  const engine = createEngine(createBroker(), notifier);
  let dashboard: Server | null = null;
  let shuttingDown = false;

  // Graceful shutdown
  const shutdown = async (exitCode: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('Shutdown signal received');
    try {
      await stopTelegram();
      if (dashboard) await stopDashboard(dashboard);
      await engine.stop();
    } catch (err) {
      log.error({ err }, 'Error during shutdown');
    } finally {
      closeDb();
      process.exit(exitCode);
    }
  };

  process.on('SIGINT', () => {
    void shutdown(0);
  });
  process.on('SIGTERM', () => {
    void shutdown(0);
  });
  process.on('uncaughtException', (err) => {
    log.fatal({ err }, 'Uncaught exception');
    void shutdown(1);
  });
  process.on('unhandledRejection', (err) => {
    log.error({ err }, 'Unhandled rejection');
  });

  // Broker connection failure is fatal
  await engine.start();

  dashboard = await startDashboard(config.dashboardPort, engine, { token: config.opsToken });
  initTelegram(engine);

  log.info({ dashboard: `http://0.0.0.0:${config.dashboardPort}` }, 'signal-bridge is running. Press Ctrl+C to stop.');
}

main().catch((err) => {
  log.fatal({ err }, 'Fatal error during startup');
  process.exit(1);
});
