import { type Alert, type AlertSink, AlertLevel } from '@clipline/core';

const MESSAGE_LIMIT = 2_000;
const FIELD_VALUE_LIMIT = 1_024;
const REQUEST_TIMEOUT_MS = 5_000;

const COLORS: Record<AlertLevel, number> = {
  [AlertLevel.INFO]: 0x0000ff,
  [AlertLevel.WARNING]: 0xffa500,
  [AlertLevel.CRITICAL]: 0xff0000,
};

/**
 * Posts alerts to a Discord webhook as a single embed. Throws on any non-2xx answer so the
 * alert dispatcher can retry.
 */
export class DiscordAlertSink implements AlertSink {
  constructor(private readonly webhookUrl: string) {}

  async send(alert: Alert): Promise<void> {
    const level = alert.level.toUpperCase();
    const message = alert.message.slice(0, MESSAGE_LIMIT);
    const response = await fetch(this.webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        content: `**${level}**: ${alert.title}`.slice(0, MESSAGE_LIMIT),
        embeds: [
          {
            title: alert.title,
            description: message,
            color: COLORS[alert.level],
            timestamp: alert.occurredAt.toISOString(),
            fields: Object.entries(alert.fields ?? {}).map(([name, value]) => ({
              name,
              value: String(value).slice(0, FIELD_VALUE_LIMIT),
              inline: true,
            })),
          },
        ],
      }),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new Error(`Discord webhook responded ${response.status}`);
    }
  }
}
