import { config, type Config } from '../config/index.js';
import {
  buildEntryConfig,
  buildExecutionConfig,
  buildManagementConfig,
  buildParserConfig,
} from '../config/strategies.js';
import { sqliteJournal, type Journal } from '../data/storage.js';
import { createChildLogger } from '../monitoring/logger.js';
import {
  formatCommandOutcome,
  formatEntryPlan,
  formatError,
  formatExecution,
  formatSignalReceived,
  formatSuppressed,
  formatSystemStatus,
} from '../monitoring/messages.js';
import type { NotificationData, Notifier } from '../monitoring/notifier.js';
import { SignalParser } from '../signals/parser.js';
import { createEntryStrategy, type EntryStrategy } from '../strategies/index.js';
import type { Broker, BrokerOrder, BrokerPosition } from './broker.js';
import { detectCommands, matchedKinds } from './commands.js';
import { OrderExecutor } from './executor.js';
import { PositionManager } from './position-manager.js';
import type { CommandOutcome, EntryPlan, ExecutionResult, MarketContext, Signal } from './types.js';

const log = createChildLogger('engine');

export type MessageOutcome =
  | { kind: 'commands'; outcomes: CommandOutcome[] }
  | { kind: 'rejected'; reason: string }
  | { kind: 'suppressed'; signal: Signal; orders: number; positions: number }
  | { kind: 'executed'; signal: Signal; plan: EntryPlan; result: ExecutionResult }
  | { kind: 'error'; error: string };

export interface EngineStatus {
  running: boolean;
  uptimeMs: number;
  broker: string;
  strategy: string;
  processed: Record<MessageOutcome['kind'], number>;
  positions: BrokerPosition[];
  orders: BrokerOrder[];
}

export interface EngineDeps {
  broker: Broker;
  notifier: Notifier;
  journal: Journal;
  parser: SignalParser;
  strategy: EntryStrategy;
  executor: OrderExecutor;
  positions: PositionManager;
  defaultVolume: number;
}

/**
 * Routes each chat message through command detection, or else through
 * parse, suppression check, entry calculation and execution. Messages and
 * manual actions share one queue so broker calls never interleave.
 */
export class SignalBridgeEngine {
  private queue: Promise<void> = Promise.resolve();
  private running = false;
  private startTime = 0;
  private processed: Record<MessageOutcome['kind'], number> = {
    commands: 0,
    rejected: 0,
    suppressed: 0,
    executed: 0,
    error: 0,
  };

  constructor(private readonly deps: EngineDeps) {}

  async start(): Promise<void> {
    log.info({ broker: this.deps.broker.name, strategy: this.deps.strategy.name }, 'Starting engine...');
    this.notify(formatSystemStatus('starting', this.statusDetails()), { action: 'system_status', status: 'starting' });

    await this.deps.broker.connect();

    this.running = true;
    this.startTime = Date.now();
    this.notify(formatSystemStatus('started', this.statusDetails()), { action: 'system_status', status: 'started' });
    log.info('Engine started');
  }

  async stop(): Promise<void> {
    log.info('Stopping engine...');
    this.running = false;
    // Let the in-flight message finish before dropping the connection
    await this.queue;
    await this.deps.broker.disconnect();
    await this.deps.notifier.send(formatSystemStatus('stopped', this.statusDetails()), {
      action: 'system_status',
      status: 'stopped',
    });
    log.info('Engine stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  handleMessage(text: string): Promise<MessageOutcome> {
    return this.enqueue(async () => {
      const outcome = await this.process(text);
      this.processed[outcome.kind]++;
      return outcome;
    });
  }

  // === Manual actions (ops server, operator commands) ===

  breakEven(): Promise<CommandOutcome> {
    return this.enqueue(() => this.runManual(() => this.deps.positions.breakEven()));
  }

  async closeAll(): Promise<CommandOutcome[]> {
    return this.enqueue(async () => [
      await this.runManual(() => this.deps.positions.fullClose()),
      await this.runManual(() => this.deps.positions.cancelPending()),
    ]);
  }

  cancelOrders(): Promise<CommandOutcome> {
    return this.enqueue(() => this.runManual(() => this.deps.positions.cancelPending()));
  }

  async getStatus(): Promise<EngineStatus> {
    const [positions, orders] = await Promise.all([
      this.deps.broker.listOpenPositions(),
      this.deps.broker.listOpenOrders(),
    ]);
    return {
      running: this.running,
      uptimeMs: this.running ? Date.now() - this.startTime : 0,
      broker: this.deps.broker.name,
      strategy: this.deps.strategy.name,
      processed: { ...this.processed },
      positions,
      orders,
    };
  }

  private async process(text: string): Promise<MessageOutcome> {
    try {
      const detected = detectCommands(text);
      const kinds = matchedKinds(detected);
      if (kinds.length > 0) {
        log.info({ commands: kinds }, 'Management command detected');
        const messageId = this.deps.journal.recordMessage(text, 'command', kinds.join(','));
        const outcomes = await this.deps.positions.run(detected);
        this.deps.journal.recordCommandOutcomes(messageId, outcomes);
        for (const outcome of outcomes) {
          this.notify(formatCommandOutcome(outcome), { action: outcome.command, ...outcome });
        }
        return { kind: 'commands', outcomes };
      }

      const parsed = this.deps.parser.parse(text);
      if (!parsed.ok) {
        log.debug({ reason: parsed.reason }, 'Message is not a signal');
        this.deps.journal.recordMessage(text, 'rejected', parsed.reason);
        return { kind: 'rejected', reason: parsed.reason };
      }

      return await this.handleSignal(text, parsed.signal);
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      log.error({ err, text }, 'Error processing message');
      this.deps.journal.recordMessage(text, 'error', error);
      this.notify(formatError('signal_processing', error), { action: 'error', message: text });
      return { kind: 'error', error };
    }
  }

  private async handleSignal(text: string, signal: Signal): Promise<MessageOutcome> {
    const { broker, journal, strategy, executor } = this.deps;

    const [orders, positions] = await Promise.all([broker.listOpenOrders(), broker.listOpenPositions()]);
    if (orders.length > 0 || positions.length > 0) {
      log.info({ orders: orders.length, positions: positions.length }, 'Ignoring signal, trades already active');
      const messageId = journal.recordMessage(text, 'suppressed', formatSuppressed(signal, orders.length, positions.length));
      journal.recordSignal(messageId, signal, null, 'suppressed');
      return { kind: 'suppressed', signal, orders: orders.length, positions: positions.length };
    }

    const messageId = journal.recordMessage(text, 'signal');
    log.info({
      symbol: signal.symbol,
      direction: signal.direction,
      range: [signal.rangeStart, signal.rangeEnd],
      stopLoss: signal.stopLoss,
      takeProfit: signal.takeProfit,
    }, 'Signal parsed');
    this.notify(formatSignalReceived(signal), { action: 'signal_received', signal: { ...signal } });

    const market = await this.marketContext(signal.symbol);
    const plan = strategy.compute(signal, market);
    log.info({
      strategy: plan.strategy,
      price: plan.representativePrice,
      legs: plan.legs.length,
      totalVolume: plan.totalVolume,
    }, 'Entry calculated');
    this.notify(formatEntryPlan(signal, plan), { action: 'entry_calculated', plan: { ...plan } });

    const result = await executor.execute(signal, plan);
    const signalId = journal.recordSignal(messageId, signal, plan, result.status);
    if (signalId !== null) {
      journal.recordExecution(signalId, result);
    }

    if (result.overallSuccess) {
      log.info({ status: result.status, volume: result.aggregateVolume }, 'Signal executed');
    } else {
      log.error({ error: result.error }, 'Signal execution failed');
    }
    this.notify(formatExecution(signal, plan, result), { action: 'trade_executed', result: { ...result } });

    return { kind: 'executed', signal, plan, result };
  }

  /** Quote and precision are best-effort; strategies fall back when either is missing */
  private async marketContext(symbol: string): Promise<MarketContext> {
    const [quote, info] = await Promise.all([
      this.deps.broker.getQuote(symbol).catch((err: unknown) => {
        log.warn({ err, symbol }, 'Quote unavailable');
        return null;
      }),
      this.deps.broker.getSymbolInfo(symbol).catch((err: unknown) => {
        log.warn({ err, symbol }, 'Symbol info unavailable');
        return null;
      }),
    ]);
    return { quote, digits: info?.digits ?? null };
  }

  private async runManual(action: () => Promise<CommandOutcome>): Promise<CommandOutcome> {
    const outcome = await action();
    this.deps.journal.recordCommandOutcomes(null, [outcome]);
    this.notify(formatCommandOutcome(outcome), { action: outcome.command, manual: true, ...outcome });
    return outcome;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      (err: unknown) => {
        log.error({ err }, 'Queued task failed');
      },
    );
    return run;
  }

  private notify(message: string, data: NotificationData): void {
    this.deps.notifier.send(message, data).catch((err: unknown) => {
      log.error({ err }, 'Failed to send notification');
    });
  }

  private statusDetails(): Record<string, string | number> {
    return {
      Broker: this.deps.broker.name,
      Strategy: this.deps.strategy.name,
      'Default Volume': this.deps.defaultVolume,
    };
  }
}

/** Wires the parser, calculator, executor and position manager from config */
export function createEngine(
  broker: Broker,
  notifier: Notifier,
  cfg: Config = config,
  journal: Journal = sqliteJournal,
): SignalBridgeEngine {
  const strategy = createEntryStrategy(cfg.entryStrategy, buildEntryConfig(cfg));
  return new SignalBridgeEngine({
    broker,
    notifier,
    journal,
    parser: new SignalParser(buildParserConfig(cfg)),
    strategy,
    executor: new OrderExecutor(broker, buildExecutionConfig(cfg)),
    positions: new PositionManager(broker, buildManagementConfig(cfg)),
    defaultVolume: cfg.defaultVolume,
  });
}
