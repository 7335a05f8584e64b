/**
 * Builds the configured ProviderGateway.
 */

import type { AppSettings } from '../../shared/types';
import type { ProviderGateway } from './providerGateway';
import { ConfigError } from './errors';
import { ProviderHttpClient } from './httpClient';
import { Logger } from './logger';
import { TuneHubProvider } from './tuneHubProvider';
import { LrcApiProvider } from './lrcApiProvider';

/**
 * Builds the provider selected in settings, with its own rate-limited client.
 *
 * @throws ConfigError for an unknown provider name
 */
export function createProvider(settings: AppSettings, logger?: Logger): ProviderGateway {
  const clientOptions = {
    timeoutMs: settings.requestTimeoutMs,
    maxRetries: settings.maxRetries,
    requestIntervalMs: settings.requestIntervalMs,
  };

  switch (settings.provider) {
    case 'tunehub':
      return new TuneHubProvider(
        { baseUrl: settings.apiBaseUrl, platforms: settings.platforms },
        new ProviderHttpClient({ ...clientOptions, provider: 'tunehub' }),
        logger,
      );
    case 'lrcapi':
      return new LrcApiProvider(
        { baseUrl: settings.lrcApiUrl },
        new ProviderHttpClient({
          ...clientOptions,
          provider: 'lrcapi',
          headers: settings.lrcApiAuth ? { Authorization: settings.lrcApiAuth } : undefined,
        }),
        logger,
      );
    default: {
      const _exhaustive: never = settings.provider;
      throw new ConfigError(`Unknown provider: ${String(_exhaustive)}`);
    }
  }
}
