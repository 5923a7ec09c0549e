/**
 * One credential strategy that was tried during startup and why it did not
 * produce a credential.
 */
export interface StrategyAttempt {
  strategy: string;
  reason: string;
}

/**
 * Raised when startup cannot obtain any credential. This is the only error
 * that is allowed to stop the server.
 */
export class ConfigurationError extends Error {
  readonly attempts: readonly StrategyAttempt[];

  constructor(message: string, attempts: readonly StrategyAttempt[] = []) {
    const details = attempts.map((attempt) => `  - ${attempt.strategy}: ${attempt.reason}`);
    super(details.length > 0 ? `${message}\n${details.join('\n')}` : message);
    this.name = 'ConfigurationError';
    this.attempts = attempts;
  }
}
