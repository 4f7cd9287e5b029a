import { LlmConfig } from '../types/config.types';
import { ValidationError } from '../middleware/error.middleware';
import { logger } from '../utils/logger';
import { Clock } from './auth.service';
import { LlmClient, ProbeOutcome } from './llm.service';

/**
 * Validates user-supplied LLM keys by probing the external service.
 *
 * A circuit breaker sits in front of the probe: after
 * `circuitFailureThreshold` consecutive unavailable results, probes
 * short-circuit to 'unavailable' for `circuitCooldownMs`.
 */
export class ApiKeyService {
  private readonly client: LlmClient;
  private readonly options: LlmConfig;
  private readonly clock: Clock;
  private consecutiveFailures = 0;
  private openUntil = 0;

  constructor(client: LlmClient, options: LlmConfig, clock: Clock = Date.now) {
    this.client = client;
    this.options = options;
    this.clock = clock;
  }

  isCircuitOpen(): boolean {
    return this.clock() < this.openUntil;
  }

  async probe(apiKey: string): Promise<ProbeOutcome> {
    if (this.isCircuitOpen()) {
      logger.warn('API key probe skipped: circuit open', {
        retryInMs: this.openUntil - this.clock(),
      });
      return 'unavailable';
    }

    const outcome = await this.client.probe(apiKey);

    if (outcome === 'unavailable') {
      this.consecutiveFailures += 1;
      if (this.consecutiveFailures >= this.options.circuitFailureThreshold) {
        this.openUntil = this.clock() + this.options.circuitCooldownMs;
        this.consecutiveFailures = 0;
        logger.error('LLM service unavailable, opening probe circuit', {
          kind: 'ExternalServiceError',
          cooldownMs: this.options.circuitCooldownMs,
        });
      }
    } else {
      this.consecutiveFailures = 0;
    }

    return outcome;
  }

  /**
   * Probe and throw unless the key is confirmed valid.
   * An unreachable service is reported to the caller as an invalid key.
   */
  async assertValid(apiKey: string): Promise<void> {
    const outcome = await this.probe(apiKey);
    if (outcome !== 'valid') {
      throw new ValidationError('Invalid external API key', 400);
    }
  }
}
