import {
  MAX_INTERVAL_MINUTES,
  MIN_INTERVAL_MINUTES,
  ValidationError,
  type ChannelId,
  type TallyEngine,
} from '@suit-tally/core';

const HELP_FOOTER = [
  '💡 Commands:',
  "• /reset - reset this channel's counters",
  `• /time [minutes] - automatic reports (${MIN_INTERVAL_MINUTES}-${MAX_INTERVAL_MINUTES} min)`,
  '• /start - show this help',
];

const SUIT_LINE = '🎯 Recognized suits: ❤️ Hearts • ♦️ Diamonds • ♣️ Clubs • ♠️ Spades';

export function startText(markers: readonly string[]): string {
  return [
    '🤖 Card counting bot 🃏',
    '',
    'I count card suits separately for every channel.',
    '',
    '📝 How it works:',
    `• Post a message with cards in parentheses and one of ${markers.join(' ')}`,
    `• Example: ${markers[0] ?? ''} Draw #n12 (❤️♦️♣️♠️)`,
    '• A repeated #n number is counted only once',
    '• Edited messages are counted once the edits stop',
    '',
    SUIT_LINE,
    '',
    ...HELP_FOOTER,
  ].join('\n');
}

export const WELCOME_TEXT = [
  '👋 Hello everyone! 🃏',
  '',
  'I count the card suits you put in parentheses in your messages.',
  'Every channel keeps its own totals.',
  '',
  SUIT_LINE,
  '',
  ...HELP_FOOTER,
].join('\n');

export const RESET_CONFIRMATION = [
  '✅ Channel reset',
  '',
  '📊 Counters set to zero',
  '⏰ Automatic reports stopped',
  '🔄 Message history cleared',
  '⏳ Pending edits cancelled',
].join('\n');

export const TIME_USAGE = [
  '⏰ /time command',
  '',
  'Sets the interval of automatic reports.',
  '',
  '📝 Usage: /time [minutes]',
  '📊 Example: /time 15',
  '',
  `⏱️ Allowed interval: ${MIN_INTERVAL_MINUTES} to ${MAX_INTERVAL_MINUTES} minutes`,
  '',
  '💡 Counters are reset after every report.',
].join('\n');

export function intervalError(minutes: number): string {
  return [
    '❌ Invalid interval',
    '',
    `The interval must be between ${MIN_INTERVAL_MINUTES} and ${MAX_INTERVAL_MINUTES} minutes.`,
    `You entered: ${minutes} minutes`,
  ].join('\n');
}

export function autoReportConfirmation(minutes: number): string {
  return [
    '✅ Automatic report configured',
    '',
    `⏰ Interval: ${minutes} minutes`,
    `🕐 Next report: in ${minutes} minutes`,
    '',
    '📊 Reports show UTC+1 time, then the counters are reset.',
  ].join('\n');
}

export function resetCommand(engine: Pick<TallyEngine, 'reset'>, channel: ChannelId): string {
  engine.reset(channel);
  return RESET_CONFIRMATION;
}

/** `/time <minutes>`: only the first argument is read. */
export function timeCommand(
  engine: Pick<TallyEngine, 'configureAutoReport'>,
  channel: ChannelId,
  args: string
): string {
  const [first = ''] = args.trim().split(/\s+/);
  if (!/^\d+$/.test(first)) return TIME_USAGE;

  const minutes = Number(first);
  try {
    engine.configureAutoReport(channel, minutes);
  } catch (err) {
    if (err instanceof ValidationError) return intervalError(minutes);
    throw err;
  }
  return autoReportConfirmation(minutes);
}
