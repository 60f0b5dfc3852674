/**
 * In-process stand-ins for LLM vendors
 */

import { ProviderError } from '../src/errors';
import {
    AdapterResult,
    AiProvider,
    GenerationOptions,
    ProviderConfig,
    ProviderErrorKind,
    ProviderId,
} from '../src/providers/ai/AiProvider';
import { ProviderRegistration } from '../src/providers/ai/factory';

export type Script = (prompt: string, options?: GenerationOptions) => Promise<AdapterResult>;

export interface RecordedCall {
    prompt: string;
    options?: GenerationOptions;
}

export class FakeProvider implements AiProvider {
    readonly name: string;
    readonly calls: RecordedCall[] = [];

    constructor(readonly id: ProviderId, private readonly script: Script) {
        this.name = `Fake ${id}`;
    }

    isConfigured(): boolean {
        return true;
    }

    async generate(prompt: string, options?: GenerationOptions): Promise<AdapterResult> {
        this.calls.push({ prompt, options });
        return this.script(prompt, options);
    }
}

export function succeed(content = '{"ok":true}', tokensUsed = 10): Script {
    return async () => ({ content, tokensUsed });
}

export function fail(provider: ProviderId, kind: ProviderErrorKind, message = `${provider} ${kind}`): Script {
    return async () => {
        throw new ProviderError(provider, kind, message);
    };
}

/**
 * Answer each call with the next script; the last one repeats
 */
export function sequence(...scripts: Script[]): Script {
    let index = 0;
    return (prompt, options) => {
        const script = scripts[Math.min(index, scripts.length - 1)];
        index++;
        return script(prompt, options);
    };
}

/**
 * Never settles unless the signal aborts
 */
export function hang(): Script {
    return (_prompt, options) => new Promise<AdapterResult>((_, reject) => {
        options?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
}

export interface Deferred {
    promise: Promise<void>;
    resolve: () => void;
}

export function deferred(): Deferred {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

/**
 * Signals `started` on the first call and holds every call until `gate` opens
 */
export function gated(started: Deferred, gate: Deferred, content = '{"ok":true}'): Script {
    return async () => {
        started.resolve();
        await gate.promise;
        return { content, tokensUsed: 1 };
    };
}

export function providerConfig(
    id: ProviderId,
    priority: number,
    quotas: Pick<ProviderConfig, 'dailyQuota' | 'monthlyQuota'> = {},
): ProviderConfig {
    return {
        id,
        apiKey: 'test-secret',
        model: `${id}-test`,
        priority,
        costPerRequest: 0.01,
        ...quotas,
    };
}

export function registration(config: ProviderConfig, script: Script): ProviderRegistration & { adapter: FakeProvider } {
    return { config, adapter: new FakeProvider(config.id, script) };
}
