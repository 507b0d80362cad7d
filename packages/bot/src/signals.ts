import type { Logger } from './logger';

export interface SignalTarget {
  on(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface ShutdownContext {
  onShutdown: () => Promise<void>;
  logger: Pick<Logger, 'info' | 'warn'>;
  /** Default: process.exit */
  exit?: (code: number) => void;
  /** Default: process */
  target?: SignalTarget;
}

export function setupSignalHandlers(ctx: ShutdownContext): void {
  const exit = ctx.exit ?? ((code: number) => process.exit(code));
  const target = ctx.target ?? process;
  let shuttingDown = false;

  const handler = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      ctx.logger.warn('Forced exit on second signal', { signal });
      exit(1);
      return;
    }

    shuttingDown = true;
    ctx.logger.info('Received shutdown signal', { signal });

    try {
      await ctx.onShutdown();
      exit(0);
    } catch (err) {
      ctx.logger.warn('Error during shutdown', { error: String(err) });
      exit(1);
    }
  };

  target.on('SIGTERM', () => void handler('SIGTERM'));
  target.on('SIGINT', () => void handler('SIGINT'));
}
