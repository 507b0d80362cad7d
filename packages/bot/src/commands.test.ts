import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TallyEngine } from '@suit-tally/core';
import {
  RESET_CONFIRMATION,
  TIME_USAGE,
  autoReportConfirmation,
  intervalError,
  resetCommand,
  startText,
  timeCommand,
} from './commands';

describe('commands', () => {
  let engine: TallyEngine;

  beforeEach(() => {
    vi.useFakeTimers();
    engine = new TallyEngine({ reply: vi.fn().mockResolvedValue(undefined) });
  });

  afterEach(async () => {
    await engine.stop();
    vi.useRealTimers();
  });

  describe('timeCommand', () => {
    it('should configure the auto-report and confirm', () => {
      expect(timeCommand(engine, 'c1', '15')).toBe(autoReportConfirmation(15));
      expect(engine.getAutoReportInterval('c1')).toBe(15);
    });

    it('should read only the first argument', () => {
      timeCommand(engine, 'c1', ' 20 minutes');
      expect(engine.getAutoReportInterval('c1')).toBe(20);
    });

    it('should answer with usage for missing or non-numeric input', () => {
      expect(timeCommand(engine, 'c1', '')).toBe(TIME_USAGE);
      expect(timeCommand(engine, 'c1', 'soon')).toBe(TIME_USAGE);
      expect(timeCommand(engine, 'c1', '-5')).toBe(TIME_USAGE);
      expect(engine.getAutoReportInterval('c1')).toBeNull();
    });

    it('should reject out-of-range intervals without changing state', () => {
      expect(timeCommand(engine, 'c1', '4')).toBe(intervalError(4));
      expect(timeCommand(engine, 'c1', '33')).toBe(intervalError(33));
      expect(engine.getAutoReportInterval('c1')).toBeNull();
    });

    it('should render the range error with the entered value', () => {
      expect(intervalError(40)).toBe(
        '❌ Invalid interval\n\nThe interval must be between 5 and 32 minutes.\nYou entered: 40 minutes'
      );
    });
  });

  describe('resetCommand', () => {
    it('should reset the channel and return the fixed confirmation', async () => {
      await engine.handle({ channel: 'c1', eventId: 1, text: '✅ (♥️)', isEdit: false });
      timeCommand(engine, 'c1', '5');

      expect(resetCommand(engine, 'c1')).toBe(RESET_CONFIRMATION);
      expect(engine.get('c1').hearts).toBe(0);
      expect(engine.getAutoReportInterval('c1')).toBeNull();
    });
  });

  describe('startText', () => {
    it('should mention the configured markers', () => {
      const lines = startText(['✅', '🔰']).split('\n');
      expect(lines[5]).toBe('• Post a message with cards in parentheses and one of ✅ 🔰');
      expect(lines[6]).toBe('• Example: ✅ Draw #n12 (❤️♦️♣️♠️)');
    });
  });
});
