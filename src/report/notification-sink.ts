/**
 * NotificationSink - delivers governance digests to Slack, webhooks or the log
 *
 * Each channel has its own minimum severity. Channel failures are logged
 * with the webhook URL masked and never thrown to the caller.
 *
 * @module report/notification-sink
 */

import { maskUrl, type NotificationChannel } from '../config/config.js';
import { describeError } from '../errors.js';
import { SEVERITY_ORDER, type Severity } from '../types.js';

// =============================================================================
// Types and Interfaces
// =============================================================================

export interface NotificationSink {
  notify(severity: Severity, message: string, context?: Record<string, unknown>): Promise<NotificationResult[]>;
}

export interface NotificationPayload {
  timestamp: string;
  severity: Severity;
  message: string;
  context?: Record<string, unknown>;
  source: string;
}

export interface NotificationResult {
  channel: NotificationChannel['type'];
  /** false when filtered out by the channel's minimum severity */
  attempted: boolean;
  success: boolean;
  error?: string;
}

export interface NotificationSinkOptions {
  channels: readonly NotificationChannel[];
  source?: string;
  fetchImpl?: typeof fetch;
  now?: () => Date;
  /** Per-request timeout for webhook posts */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

const SLACK_EMOJI: Record<Severity, string> = {
  debug: ':mag:',
  info: ':information_source:',
  warning: ':warning:',
  error: ':rotating_light:',
};

function channelTarget(channel: NotificationChannel): string {
  switch (channel.type) {
    case 'slack':
      return maskUrl(channel.webhookUrl);
    case 'webhook':
      return maskUrl(channel.url);
    case 'log':
      return 'console';
  }
}

// =============================================================================
// CompositeNotificationSink Class
// =============================================================================

export class CompositeNotificationSink implements NotificationSink {
  private readonly channels: readonly NotificationChannel[];
  private readonly source: string;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;
  private readonly timeoutMs: number;

  constructor(options: NotificationSinkOptions) {
    this.channels = options.channels;
    this.source = options.source ?? 'governance-audit';
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Send to every channel whose minimum severity is met.
   */
  async notify(severity: Severity, message: string, context?: Record<string, unknown>): Promise<NotificationResult[]> {
    const payload: NotificationPayload = {
      timestamp: this.now().toISOString(),
      severity,
      message,
      context,
      source: this.source,
    };

    const eligible = this.channels.filter((c) => SEVERITY_ORDER[severity] >= SEVERITY_ORDER[c.minSeverity]);
    const settled = await Promise.allSettled(eligible.map((channel) => this.sendToChannel(channel, payload)));

    const results: NotificationResult[] = this.channels
      .filter((c) => !eligible.includes(c))
      .map((c) => ({ channel: c.type, attempted: false, success: false }));

    settled.forEach((outcome, index) => {
      const channel = eligible[index];
      if (outcome.status === 'fulfilled') {
        results.push({ channel: channel.type, attempted: true, success: true });
        return;
      }
      const error = describeError(outcome.reason);
      // Only the masked target is logged
      console.error(`[notification-sink] Failed to send to ${channel.type} (${channelTarget(channel)}): ${error}`);
      results.push({ channel: channel.type, attempted: true, success: false, error });
    });

    return results;
  }

  private async sendToChannel(channel: NotificationChannel, payload: NotificationPayload): Promise<void> {
    switch (channel.type) {
      case 'slack':
        await this.post(channel.webhookUrl, slackBody(payload), 'Slack');
        break;
      case 'webhook':
        await this.post(channel.url, payload, 'Webhook');
        break;
      case 'log':
        sendLog(payload);
        break;
    }
  }

  private async post(url: string, body: unknown, label: string): Promise<void> {
    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`${label} error: ${response.status} ${response.statusText}`);
    }
  }
}

/**
 * Slack incoming-webhook body; the message goes in a code block so the
 * digest's alignment survives.
 */
export function slackBody(payload: NotificationPayload): Record<string, unknown> {
  return {
    text: `${SLACK_EMOJI[payload.severity]} *${payload.severity.toUpperCase()}* ${payload.source}\n\`\`\`${payload.message}\`\`\``,
  };
}

function sendLog(payload: NotificationPayload): void {
  const line = `[${payload.timestamp}] [${payload.severity.toUpperCase()}] ${payload.message}`;
  if (payload.severity === 'error') {
    console.error(line);
  } else if (payload.severity === 'warning') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createNotificationSink(
  channels: readonly NotificationChannel[],
  options: Omit<NotificationSinkOptions, 'channels'> = {},
): NotificationSink {
  return new CompositeNotificationSink({ ...options, channels });
}
