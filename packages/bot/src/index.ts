import { Bot } from 'grammy';
import { TallyEngine, type ProcessOutcome } from '@suit-tally/core';
import { RedisStateProvider } from '@suit-tally/provider-redis';
import { loadConfig } from './config';
import { Logger, errorFields } from './logger';
import { createHealthServer } from './health';
import { setupSignalHandlers } from './signals';
import { createReplySink, registerHandlers } from './telegram';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger(config.logging.level);

  logger.info('Starting suit-tally bot', {
    persistence: config.redis ? 'redis' : 'memory',
    quietMs: config.debounce.quietMs,
  });

  const provider = config.redis
    ? new RedisStateProvider({ redis: config.redis.url, keyPrefix: config.redis.keyPrefix })
    : undefined;

  const bot = new Bot(config.telegram.token);

  const engine = new TallyEngine({
    reply: createReplySink(bot.api),
    provider,
    debounce: { quietMs: config.debounce.quietMs },
    processing: {
      confirmationMarkers: config.processing.confirmationMarkers,
      displayStyle: config.processing.displayStyle,
    },
    autoReport: { purgeLedger: config.autoReport.purgeLedger },
    persistence: { flushIntervalMs: config.persistence.flushIntervalMs },
  });

  // Wire engine events to logger
  engine.on('started', () => logger.info('Engine started'));
  engine.on('stopped', () => logger.info('Engine stopped'));
  engine.on('processed', (outcome: ProcessOutcome) => logger.debug('Message counted', { channel: outcome.channel }));
  engine.on('rejected', (outcome: ProcessOutcome) => logger.debug('Message rejected', { ...outcome }));
  engine.on('edit-scheduled', (info) => logger.debug('Edit scheduled', info));
  engine.on('report', (info) => logger.info('Auto-report sent', info));
  engine.on('reset', (summary) => logger.info('Channel reset', summary));
  engine.on('auto-report-configured', (info) => logger.info('Auto-report configured', info));
  engine.on('auto-report-cancelled', (info) => logger.info('Auto-report cancelled', info));
  engine.on('restored', (info) => logger.info('State restored', info));
  engine.on('flush', (info) => logger.debug('Flush completed', info));
  engine.on('error', (err: unknown, context: Record<string, unknown>) =>
    logger.error('Engine error', { ...context, ...errorFields(err) })
  );

  registerHandlers(bot, {
    engine,
    logger: logger.child({ component: 'telegram' }),
    confirmationMarkers: config.processing.confirmationMarkers,
  });

  let healthServer: ReturnType<typeof createHealthServer> | undefined;
  if (config.health.enabled) {
    healthServer = createHealthServer({ port: config.health.port, engine });
    logger.info('Health server listening', { port: config.health.port });
  }

  setupSignalHandlers({
    logger,
    onShutdown: async () => {
      logger.info('Shutting down...');
      await bot.stop();
      await engine.stop();
      const server = healthServer;
      if (server) {
        await new Promise<void>((resolve) => server.close(() => resolve()));
      }
      logger.info('Shutdown complete');
    },
  });

  await engine.start();
  await bot.start({
    allowed_updates: ['message', 'edited_message', 'channel_post', 'edited_channel_post'],
    onStart: (me) => logger.info('Bot is running', { username: me.username }),
  });
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
