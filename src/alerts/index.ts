import type { AlertsConfig } from '../config/schema.js';
import type { AlertSink } from './types.js';
import { TelegramAlertSink } from './TelegramAlertSink.js';
import { LogAlertSink } from './LogAlertSink.js';

/**
 * Telegram when a bot token and chat id are configured, the log otherwise
 */
export function createAlertSink(config: AlertsConfig): AlertSink {
  if (config.telegramBotToken && config.telegramChatId) {
    return new TelegramAlertSink({ botToken: config.telegramBotToken, chatId: config.telegramChatId });
  }
  return new LogAlertSink();
}

export type { Alert, AlertKind, AlertSink } from './types.js';
export * from './messages.js';
export { TelegramAlertSink } from './TelegramAlertSink.js';
export { LogAlertSink } from './LogAlertSink.js';
