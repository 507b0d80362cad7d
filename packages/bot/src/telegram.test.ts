import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { TallyEngine, type ReplySink } from '@suit-tally/core';
import {
  RESET_CONFIRMATION,
  WELCOME_TEXT,
  autoReportConfirmation,
  startText,
} from './commands';
import { Logger } from './logger';
import { createReplySink, registerHandlers, toTallyEvent } from './telegram';

type Handler = (ctx: any) => Promise<void>;

function createStubBot() {
  const commands = new Map<string, Handler>();
  const listeners = new Map<string, Handler>();
  const errorHandlers: Array<(err: unknown) => void> = [];
  return {
    commands,
    listeners,
    errorHandlers,
    command: vi.fn((name: string, handler: Handler) => {
      commands.set(name, handler);
    }),
    on: vi.fn((filter: string | string[], handler: Handler) => {
      for (const query of [filter].flat()) listeners.set(query, handler);
    }),
    catch: vi.fn((handler: (err: unknown) => void) => {
      errorHandlers.push(handler);
    }),
  };
}

function post(text: string, messageId = 5, chatId = -100) {
  return { chat: { id: chatId }, msg: { chat: { id: chatId }, message_id: messageId, text }, reply: vi.fn() };
}

function commandContext(match = '', chatId = -100) {
  return { chat: { id: chatId }, match, reply: vi.fn().mockResolvedValue({}) };
}

describe('telegram adapter', () => {
  describe('toTallyEvent', () => {
    it('should stringify the chat id and keep the message id', () => {
      const event = toTallyEvent({ chat: { id: -100123 }, message_id: 42, text: '✅ (♣️)' }, false);

      expect(event).toEqual({ channel: '-100123', eventId: 42, text: '✅ (♣️)', isEdit: false });
    });

    it('should flag edits', () => {
      const event = toTallyEvent({ chat: { id: 7 }, message_id: 3, text: 'x' }, true);
      expect(event?.isEdit).toBe(true);
    });

    it('should ignore messages without text', () => {
      expect(toTallyEvent({ chat: { id: 7 }, message_id: 3 }, false)).toBeNull();
      expect(toTallyEvent(undefined, false)).toBeNull();
    });
  });

  describe('createReplySink', () => {
    it('should send the text to the channel', async () => {
      const api = { sendMessage: vi.fn().mockResolvedValue({}) };
      const reply = createReplySink(api);

      await reply('-100123', 'hello');

      expect(api.sendMessage).toHaveBeenCalledWith('-100123', 'hello');
    });

    it('should propagate delivery failures', async () => {
      const api = { sendMessage: vi.fn().mockRejectedValue(new Error('Forbidden')) };
      const reply = createReplySink(api);

      await expect(reply('c1', 'hello')).rejects.toThrow('Forbidden');
    });
  });
});

describe('registerHandlers', () => {
  const markers = ['✅', '🔰'];
  let bot: ReturnType<typeof createStubBot>;
  let engine: TallyEngine;
  let reply: Mock<Parameters<ReplySink>, ReturnType<ReplySink>>;
  let logLines: Record<string, unknown>[];

  function handler(map: Map<string, Handler>, key: string): Handler {
    const found = map.get(key);
    if (!found) throw new Error(`no handler registered for ${key}`);
    return found;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    bot = createStubBot();
    reply = vi.fn<Parameters<ReplySink>, ReturnType<ReplySink>>().mockResolvedValue(undefined);
    engine = new TallyEngine({ reply });
    logLines = [];
    const logger = new Logger('debug', {}, (line) => {
      logLines.push(JSON.parse(line));
    });
    registerHandlers(bot as any, { engine, logger, confirmationMarkers: markers });
  });

  afterEach(async () => {
    await engine.stop();
    vi.useRealTimers();
  });

  it('should answer /start with the help text', async () => {
    const ctx = commandContext();
    await handler(bot.commands, 'start')(ctx);
    expect(ctx.reply).toHaveBeenCalledWith(startText(markers));
  });

  it('should route /time to the chat it was sent in', async () => {
    const ctx = commandContext('15');
    await handler(bot.commands, 'time')(ctx);

    expect(ctx.reply).toHaveBeenCalledWith(autoReportConfirmation(15));
    expect(engine.getAutoReportInterval('-100')).toBe(15);
  });

  it('should reset the chat on /reset', async () => {
    await handler(bot.listeners, 'channel_post:text')(post('✅ #n1 (♥️)'));
    const ctx = commandContext();

    await handler(bot.commands, 'reset')(ctx);

    expect(ctx.reply).toHaveBeenCalledWith(RESET_CONFIRMATION);
    expect(engine.get('-100').hearts).toBe(0);
  });

  it('should count channel posts immediately', async () => {
    await handler(bot.listeners, 'channel_post:text')(post('✅ #n1 (♥️♦️)'));

    expect(engine.get('-100')).toEqual({ clubs: 0, diamonds: 1, spades: 0, hearts: 1 });
    expect(reply).toHaveBeenCalledWith('-100', '♣️ Clubs: 0\n♦️ Diamonds: 1\n♠️ Spades: 0\n❤️ Hearts: 1');
  });

  it('should count group messages through the same path', async () => {
    await handler(bot.listeners, 'message:text')(post('🔰 (♠️)', 7, 42));
    expect(engine.get('42').spades).toBe(1);
  });

  it('should hold edited posts until the quiet window passes', async () => {
    await handler(bot.listeners, 'edited_channel_post:text')(post('✅ #n2 (♣️)', 9));

    expect(engine.get('-100').clubs).toBe(0);
    expect(engine.hasPendingEdit('-100', 9)).toBe(true);

    await vi.advanceTimersByTimeAsync(3000);
    expect(engine.get('-100').clubs).toBe(1);
  });

  it('should route edited group messages to the debouncer', async () => {
    await handler(bot.listeners, 'edited_message:text')(post('✅ (♣️)', 3));
    expect(engine.hasPendingEdit('-100', 3)).toBe(true);
  });

  it('should welcome the chat when the bot is added', async () => {
    const ctx = post('');
    await handler(bot.listeners, 'message:new_chat_members:me')(ctx);
    expect(ctx.reply).toHaveBeenCalledWith(WELCOME_TEXT);
  });

  it('should log errors caught by the bot', () => {
    expect(bot.errorHandlers).toHaveLength(1);
    bot.errorHandlers[0]({ error: new Error('boom') });

    expect(logLines).toHaveLength(1);
    expect(logLines[0]).toMatchObject({ level: 'error', msg: 'Unhandled bot error', error: 'boom', errorName: 'Error' });
  });
});
