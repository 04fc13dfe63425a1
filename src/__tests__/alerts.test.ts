import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios, { AxiosHeaders } from 'axios';
import { AlertCategory, AlertSink, RateLimitedAlerter, telegramSink } from '../speed/alerts';

class RecordingSink implements AlertSink {
  readonly sent: Array<[AlertCategory, string]> = [];
  fail = false;

  async send(category: AlertCategory, text: string): Promise<void> {
    if (this.fail) throw new Error('telegram down');
    this.sent.push([category, text]);
  }
}

describe('RateLimitedAlerter', () => {
  let sink: RecordingSink;
  let clock: number;
  let alerter: RateLimitedAlerter;

  beforeEach(() => {
    sink = new RecordingSink();
    clock = 0;
    alerter = new RateLimitedAlerter(sink, 10_000, () => clock);
  });

  it('allows one alert per category per interval', async () => {
    expect(alerter.notify('trade-open', 'first')).toBe(true);
    clock = 9_999;
    expect(alerter.notify('trade-open', 'second')).toBe(false);
    clock = 10_000;
    expect(alerter.notify('trade-open', 'third')).toBe(true);
    await alerter.flush();

    expect(sink.sent.map(([, text]) => text)).toEqual(['first', 'third']);
    expect(alerter.getStats()).toEqual({ sent: 2, dropped: 1, failed: 0 });
  });

  it('limits categories independently', async () => {
    alerter.notify('trade-open', 'open');
    alerter.notify('tier-change', 'tier');
    await alerter.flush();
    expect(sink.sent.map(([category]) => category)).toEqual(['trade-open', 'tier-change']);
  });

  it('absorbs sink failures', async () => {
    sink.fail = true;
    expect(alerter.notify('daily-summary', 'summary')).toBe(true);
    await alerter.flush();
    expect(alerter.getStats()).toEqual({ sent: 0, dropped: 0, failed: 1 });
  });
});

describe('telegramSink', () => {
  it('posts to the Bot API sendMessage endpoint', async () => {
    const post = vi.spyOn(axios, 'post').mockResolvedValue({
      data: { ok: true },
      status: 200,
      statusText: 'OK',
      headers: {},
      config: { headers: new AxiosHeaders() },
    });
    await telegramSink('test-token', '42').send('trade-open', 'hello');

    expect(post).toHaveBeenCalledWith(
      'https://api.telegram.org/bottest-token/sendMessage',
      { chat_id: '42', text: 'hello', disable_web_page_preview: true },
      { timeout: 5_000 }
    );
    post.mockRestore();
  });
});
