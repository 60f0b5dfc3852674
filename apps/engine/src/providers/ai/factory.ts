/**
 * AI Provider Factory
 *
 * Builds one adapter per configured provider.
 */

import { createLogger } from '../../logger';
import { AiProvider, ProviderConfig, ProviderId } from './AiProvider';
import { AnthropicProvider } from './AnthropicProvider';
import { GeminiProvider } from './GeminiProvider';
import { OpenAiProvider } from './OpenAiProvider';
import { StubProvider } from './StubProvider';

const logger = createLogger('ai-provider');

export interface ProviderRegistration {
    config: ProviderConfig;
    adapter: AiProvider;
}

/**
 * Create the adapter for a single provider configuration
 */
export function createAdapter(providerConfig: ProviderConfig): AiProvider {
    switch (providerConfig.id) {
        case 'gemini':
            return new GeminiProvider(providerConfig);
        case 'anthropic':
            return new AnthropicProvider(providerConfig);
        case 'openai':
            return new OpenAiProvider(providerConfig);
        case 'stub':
            return new StubProvider();
    }
}

/**
 * Pair every configuration with its adapter, dropping unconfigured ones
 */
export function createProviderRegistrations(configs: ProviderConfig[]): ProviderRegistration[] {
    const seen = new Set<ProviderId>();
    const registrations: ProviderRegistration[] = [];

    for (const providerConfig of configs) {
        if (seen.has(providerConfig.id)) {
            throw new Error(`Provider configured twice: ${providerConfig.id}`);
        }
        seen.add(providerConfig.id);

        const adapter = createAdapter(providerConfig);
        if (!adapter.isConfigured()) {
            logger.warn('Provider not configured, skipping', { provider: providerConfig.id });
            continue;
        }

        registrations.push({ config: providerConfig, adapter });
        logger.info('Registered AI provider', {
            provider: providerConfig.id,
            model: providerConfig.model,
            priority: providerConfig.priority,
        });
    }

    return registrations;
}

export default { createAdapter, createProviderRegistrations };
