import type { Bot, Context } from 'grammy';
import type { ChannelId, ReplySink, TallyEngine, TallyEvent } from '@suit-tally/core';
import { WELCOME_TEXT, resetCommand, startText, timeCommand } from './commands';
import { errorFields, type Logger } from './logger';

export interface MessageSender {
  sendMessage(chatId: string, text: string): Promise<unknown>;
}

export interface InboundMessage {
  chat: { id: number };
  message_id: number;
  text?: string;
}

export interface HandlerDeps {
  engine: TallyEngine;
  logger: Logger;
  confirmationMarkers: readonly string[];
}

export function createReplySink(api: MessageSender): ReplySink {
  return async (channel, text) => {
    await api.sendMessage(channel, text);
  };
}

/** Map a Telegram message (or channel post) to an engine event. */
export function toTallyEvent(msg: InboundMessage | undefined, isEdit: boolean): TallyEvent | null {
  if (!msg || typeof msg.text !== 'string') return null;
  return {
    channel: String(msg.chat.id),
    eventId: msg.message_id,
    text: msg.text,
    isEdit,
  };
}

function channelOf(ctx: Context): ChannelId | null {
  const id = ctx.chat?.id;
  return id === undefined ? null : String(id);
}

export function registerHandlers(bot: Bot, deps: HandlerDeps): void {
  const { engine, logger } = deps;

  bot.command('start', async (ctx) => {
    await ctx.reply(startText(deps.confirmationMarkers));
  });

  bot.command('reset', async (ctx) => {
    const channel = channelOf(ctx);
    if (channel === null) return;
    await ctx.reply(resetCommand(engine, channel));
  });

  bot.command('time', async (ctx) => {
    const channel = channelOf(ctx);
    if (channel === null) return;
    await ctx.reply(timeCommand(engine, channel, ctx.match));
  });

  bot.on('message:new_chat_members:me', async (ctx) => {
    await ctx.reply(WELCOME_TEXT);
  });

  const forward = (isEdit: boolean) => async (ctx: Context) => {
    const event = toTallyEvent(ctx.msg, isEdit);
    if (!event) return;
    try {
      await engine.handle(event);
    } catch (err) {
      logger.error('Failed to handle message', { channel: event.channel, ...errorFields(err) });
    }
  };

  bot.on(['message:text', 'channel_post:text'], forward(false));
  bot.on(['edited_message:text', 'edited_channel_post:text'], forward(true));

  bot.catch((err) => {
    logger.error('Unhandled bot error', errorFields(err.error));
  });
}
