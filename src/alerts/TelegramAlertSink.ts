import { TELEGRAM_API_HOST } from '../config/constants.js';
import { RetryClient } from '../clients/shared/retryClient.js';
import type { Alert, AlertSink } from './types.js';
import { logger, type Logger } from '../utils/logger.js';
import { alertsSent } from '../utils/metrics.js';

export interface TelegramAlertSinkConfig {
  botToken: string;
  chatId: string;
  /** Override for tests */
  baseURL?: string;
  timeoutMs?: number;
}

/**
 * Sends alerts through the Telegram Bot API sendMessage endpoint
 */
export class TelegramAlertSink implements AlertSink {
  readonly name = 'telegram';

  private log: Logger;
  private http: RetryClient;
  private botToken: string;
  private chatId: string;

  constructor(config: TelegramAlertSinkConfig) {
    this.log = logger('TelegramAlertSink');
    this.botToken = config.botToken;
    this.chatId = config.chatId;
    this.http = new RetryClient({
      service: 'telegram',
      baseURL: config.baseURL ?? TELEGRAM_API_HOST,
      timeout: config.timeoutMs ?? 10000,
      retryOptions: { maxAttempts: 3, initialDelayMs: 500, maxDelayMs: 4000 },
    });
  }

  async send(alert: Alert): Promise<void> {
    try {
      await this.http.post(`/bot${this.botToken}/sendMessage`, {
        chat_id: this.chatId,
        text: alert.text,
        disable_web_page_preview: true,
      });
      alertsSent.labels(alert.kind, 'success').inc();
      this.log.debug('Alert sent', { kind: alert.kind });
    } catch (error) {
      alertsSent.labels(alert.kind, 'failure').inc();
      throw error;
    }
  }
}
