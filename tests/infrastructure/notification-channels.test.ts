import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createLogNotifier,
  createNotifier,
  createWebhookNotifier,
  DEFAULT_CONFIG,
} from '../../src/infrastructure/notifications/index.js';
import type { AlertMessage } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers.js';

const sampleMessage: AlertMessage = {
  subject: 'Alert: lead_hot (score=0.95)',
  body: 'Event ID: 1',
  recipient: 'ops@example.com',
};

const webhookConfig = { enabled: true, url: 'https://hooks.example.com/test', timeout_ms: 1000 };

describe('createWebhookNotifier', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('POSTs the alert as JSON and reports success', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ ok: true, status: 200 });
    vi.stubGlobal('fetch', mockFetch);

    const result = await createWebhookNotifier(webhookConfig, log).send(sampleMessage);

    expect(result).toEqual({ ok: true });
    expect(mockFetch).toHaveBeenCalledOnce();
    expect(mockFetch).toHaveBeenCalledWith('https://hooks.example.com/test', expect.objectContaining({
      method: 'POST',
      body: JSON.stringify({
        recipient: 'ops@example.com',
        subject: 'Alert: lead_hot (score=0.95)',
        body: 'Event ID: 1',
        text: '*Alert: lead_hot (score=0.95)*\nEvent ID: 1',
      }),
    }));
    expect(log.info).toHaveBeenCalledWith(
      { recipient: 'ops@example.com', subject: 'Alert: lead_hot (score=0.95)' },
      'Webhook alert sent',
    );
  });

  it('reports a non-2xx status as a failure', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue({ ok: false, status: 503 }));

    const result = await createWebhookNotifier(webhookConfig, log).send(sampleMessage);

    expect(result).toEqual({ ok: false, reason: 'webhook responded with HTTP 503' });
    expect(log.warn).toHaveBeenCalledWith(
      { status: 503, recipient: 'ops@example.com' },
      'Webhook returned non-OK status',
    );
  });

  it('reports a network error as a failure', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('Network error')));

    const result = await createWebhookNotifier(webhookConfig, log).send(sampleMessage);

    expect(result).toEqual({ ok: false, reason: 'Network error' });
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Failed to send webhook alert',
    );
  });
});

describe('createLogNotifier', () => {
  it('logs the alert and always succeeds', async () => {
    const log = fakeLogger();

    const result = await createLogNotifier(log).send(sampleMessage);

    expect(result).toEqual({ ok: true });
    expect(log.info).toHaveBeenCalledWith(
      { recipient: 'ops@example.com', subject: 'Alert: lead_hot (score=0.95)', body: 'Event ID: 1' },
      'Alert notification (log transport)',
    );
  });
});

describe('createNotifier', () => {
  it('uses the log notifier by default', () => {
    expect(createNotifier(DEFAULT_CONFIG, fakeLogger()).name).toBe('log');
  });

  it('uses the webhook notifier when enabled with a url', () => {
    const config = { ...DEFAULT_CONFIG, webhook: webhookConfig };
    expect(createNotifier(config, fakeLogger()).name).toBe('webhook');
  });

  it('falls back to the log notifier when the webhook url is empty', () => {
    const log = fakeLogger();
    const config = { ...DEFAULT_CONFIG, webhook: { ...webhookConfig, url: '' } };

    expect(createNotifier(config, log).name).toBe('log');
    expect(log.warn).toHaveBeenCalledWith('Webhook enabled but url is empty, falling back to log notifier');
  });
});
