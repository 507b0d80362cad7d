import { describe, it, expect, vi } from 'vitest';
import type { EngineStats } from '@suit-tally/types';
import { createHealthHandler } from './health';

const STATS: EngineStats = {
  eventsReceived: 3,
  eventsCounted: 2,
  eventsRejected: 1,
  duplicatesRejected: 1,
  editsScheduled: 0,
  editsSuperseded: 0,
  reportsSent: 0,
  resets: 0,
  flushCount: 0,
  errorCount: 0,
  pendingEdits: 0,
  activeAutoReports: 1,
  channels: 1,
};

function createResponse() {
  return { writeHead: vi.fn(), end: vi.fn() };
}

describe('createHealthHandler', () => {
  it('should report status, uptime and engine stats', () => {
    let now = 10_000;
    const handle = createHealthHandler({ getStats: () => STATS }, () => now);
    now = 75_500;
    const res = createResponse();

    handle({ url: '/healthz' }, res);

    expect(res.writeHead).toHaveBeenCalledWith(200, { 'Content-Type': 'application/json' });
    expect(JSON.parse(res.end.mock.calls[0][0])).toEqual({ status: 'ok', uptime: 65, stats: STATS });
  });

  it('should answer /health as well', () => {
    const handle = createHealthHandler({ getStats: () => STATS });
    const res = createResponse();

    handle({ url: '/health' }, res);

    expect(res.writeHead).toHaveBeenCalledWith(200, { 'Content-Type': 'application/json' });
  });

  it('should return 404 for other paths', () => {
    const handle = createHealthHandler({ getStats: () => STATS });
    const res = createResponse();

    handle({ url: '/metrics' }, res);

    expect(res.writeHead).toHaveBeenCalledWith(404);
    expect(res.end).toHaveBeenCalledWith();
  });
});
