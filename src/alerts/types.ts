export type AlertKind =
  | 'panic_started'
  | 'panic_succeeded'
  | 'panic_failed'
  | 'reset_succeeded'
  | 'reset_failed'
  | 'risk_mode_changed'
  | 'daily_breaker_tripped';

export interface Alert {
  kind: AlertKind;
  text: string;
}

/**
 * Delivers operator notifications. `send` rejects when delivery failed.
 */
export interface AlertSink {
  readonly name: string;
  send(alert: Alert): Promise<void>;
}
