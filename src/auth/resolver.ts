import { ConfigurationError } from '../errors.js';
import type { StrategyAttempt } from '../errors.js';
import { describeError, log } from '../logging.js';
import type { CredentialStrategy, ResolvedCredential, StrategyOutcome } from './credential.js';

async function runStrategy(strategy: CredentialStrategy): Promise<StrategyOutcome> {
  try {
    return await strategy.attempt();
  } catch (error) {
    return { status: 'skipped', reason: describeError(error) };
  }
}

/**
 * Try each strategy in order and return the first credential obtained.
 * Strategies after the successful one are never attempted.
 *
 * @throws ConfigurationError when a strategy reports a fatal outcome or every
 *   strategy is skipped. The error lists each attempt and its reason.
 */
export async function resolveCredential(strategies: readonly CredentialStrategy[]): Promise<ResolvedCredential> {
  const attempts: StrategyAttempt[] = [];

  for (const strategy of strategies) {
    const outcome = await runStrategy(strategy);

    if (outcome.status === 'succeeded') {
      log('Authentication method selected', { method: outcome.method, strategy: strategy.name });
      return { credential: outcome.credential, method: outcome.method };
    }

    attempts.push({ strategy: strategy.name, reason: outcome.reason });

    if (outcome.status === 'fatal') {
      log('Authentication failed', { strategy: strategy.name, reason: outcome.reason });
      throw new ConfigurationError('Authentication failed! Check your configuration.', attempts);
    }

    log('Authentication strategy skipped', { strategy: strategy.name, reason: outcome.reason });
  }

  throw new ConfigurationError('All authentication methods failed! Check your configuration.', attempts);
}
