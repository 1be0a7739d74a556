/**
 * Telegram ops alerts.
 *
 * Outbound messages are fire-and-forget: errors are logged, never thrown, so a
 * Telegram outage cannot hold up a chat reply. Without TELEGRAM_BOT_TOKEN and
 * TELEGRAM_CHAT_ID every call is a no-op.
 */
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

export type AlertLevel = 'info' | 'warning' | 'critical';

const PREFIX: Record<AlertLevel, string> = {
  info:     'ℹ️',
  warning:  '⚠️',
  critical: '🚨',
};

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

async function send(text: string): Promise<void> {
  if (!env.TELEGRAM_BOT_TOKEN || !env.TELEGRAM_CHAT_ID) return;
  try {
    const res = await fetch(`https://api.telegram.org/bot${env.TELEGRAM_BOT_TOKEN}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: env.TELEGRAM_CHAT_ID, text, parse_mode: 'HTML' }),
    });
    if (!res.ok) logger.warn('Telegram: sendMessage failed', { status: res.status });
  } catch (err) {
    logger.warn('Telegram: unreachable', { error: String(err) });
  }
}

export async function sendAlert(message: string, level: AlertLevel = 'info'): Promise<void> {
  await send(`${PREFIX[level]} <b>${level.toUpperCase()}</b>\n${escapeHtml(message)}`);
}

export const telegram = {
  alert:  (msg: string) => sendAlert(msg, 'warning'),
  info:   (msg: string) => sendAlert(msg, 'info'),
  error:  (msg: string) => sendAlert(msg, 'critical'),
} as const;
