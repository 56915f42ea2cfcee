/**
 * Webhook payload builders
 * The destination URL picks the shape: Slack, Discord, or a generic envelope
 */

import type { DriftEvent, Severity } from '../types';

export type WebhookFlavor = 'slack' | 'discord' | 'generic';

export const SEVERITY_COLORS: Record<Severity, string> = {
  LOW: '#36a64f',
  MED: '#daa520',
  HIGH: '#ff6600',
  CRITICAL: '#ff0000'
};

export const SEVERITY_EMOJI: Record<Severity, string> = {
  LOW: '🟢',
  MED: '🟡',
  HIGH: '🟠',
  CRITICAL: '🔴'
};

export interface SlackPayload {
  attachments: Array<{
    color: string;
    blocks: Array<{
      type: 'section';
      text: { type: 'mrkdwn'; text: string };
    }>;
  }>;
}

export interface DiscordPayload {
  embeds: Array<{
    title: string;
    color: number;
    fields: Array<{ name: string; value: string; inline: boolean }>;
  }>;
}

export interface GenericPayload {
  source: string;
  event: DriftEvent;
}

export type WebhookPayload = SlackPayload | DiscordPayload | GenericPayload;

export function detectFlavor(url: string): WebhookFlavor {
  if (url.includes('hooks.slack.com')) return 'slack';
  if (url.includes('discord.com') || url.includes('discordapp.com')) return 'discord';
  return 'generic';
}

/**
 * `2026-01-21 12:00 UTC`
 */
export function formatAlertTime(timestamp: number): string {
  return `${new Date(timestamp).toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function slackPayload(event: DriftEvent): SlackPayload {
  const text =
    `${SEVERITY_EMOJI[event.severity]} *[${event.severity}] Drift Monitor Alert*\n` +
    `*Agent:* \`${event.agentId}\`\n` +
    `*Detector:* ${event.detector}\n` +
    `*Time:* ${formatAlertTime(event.timestamp)}\n\n` +
    `${event.message}\n\n` +
    `💡 *Suggested action:* ${event.suggestedAction}`;

  return {
    attachments: [
      {
        color: SEVERITY_COLORS[event.severity],
        blocks: [{ type: 'section', text: { type: 'mrkdwn', text } }]
      }
    ]
  };
}

export function discordPayload(event: DriftEvent): DiscordPayload {
  return {
    embeds: [
      {
        title: `${SEVERITY_EMOJI[event.severity]} [${event.severity}] Drift Monitor Alert`,
        color: parseInt(SEVERITY_COLORS[event.severity].slice(1), 16),
        fields: [
          { name: 'Agent', value: `\`${event.agentId}\``, inline: true },
          { name: 'Detector', value: event.detector, inline: true },
          { name: 'Time', value: formatAlertTime(event.timestamp), inline: true },
          { name: 'Details', value: event.message, inline: false },
          { name: '💡 Suggested Action', value: event.suggestedAction, inline: false }
        ]
      }
    ]
  };
}

export function genericPayload(event: DriftEvent, source: string): GenericPayload {
  return { source, event: { ...event, context: { ...event.context } } };
}

export function buildPayload(url: string, event: DriftEvent, source: string): WebhookPayload {
  switch (detectFlavor(url)) {
    case 'slack':
      return slackPayload(event);
    case 'discord':
      return discordPayload(event);
    case 'generic':
      return genericPayload(event, source);
  }
}
