import OpenAI from 'openai';
import { ConfigurationError, ServiceError } from '../models/errors';
import { errorMeta, logger } from '../utils/logger';
import { InvokeOptions, ModelInvoker } from './ModelInvoker';

type ChatCompletionParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;
type ChatCompletion = OpenAI.Chat.Completions.ChatCompletion;

/**
 * The slice of the OpenAI SDK client this invoker uses. Tests pass an
 * in-process stand-in.
 */
export interface ChatCompletionClient {
    chat: {
        completions: {
            create(body: ChatCompletionParams, options?: { signal?: AbortSignal }): Promise<ChatCompletion>;
        };
    };
}

export interface OpenAIChatInvokerOptions {
    apiKey: string;
    baseURL: string;
    timeoutMs: number;
    maxRetries: number;
    temperature?: number;
    maxTokens?: number;
}

const log = logger.child('llm');

export const createChatCompletionClient = (options: OpenAIChatInvokerOptions): ChatCompletionClient => {
    return new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        timeout: options.timeoutMs,
        maxRetries: options.maxRetries
    });
};

/**
 * Model invoker for any OpenAI-compatible chat completions endpoint
 * (OpenRouter by default). Each role maps to one model name.
 */
export class OpenAIChatInvoker implements ModelInvoker {
    private client: ChatCompletionClient;
    private models: Readonly<Record<string, string>>;
    private temperature?: number;
    private maxTokens?: number;

    constructor(client: ChatCompletionClient, models: Readonly<Record<string, string>>, defaults: { temperature?: number; maxTokens?: number } = {}) {
        this.client = client;
        this.models = models;
        this.temperature = defaults.temperature;
        this.maxTokens = defaults.maxTokens;
    }

    async invoke(role: string, renderedPrompt: string, options: InvokeOptions = {}): Promise<string> {
        const model = this.models[role];
        if (!model) {
            throw new ConfigurationError(`No model bound for module "${role}"`);
        }

        const temperature = options.temperature ?? this.temperature;
        const maxTokens = options.maxTokens ?? this.maxTokens;
        const startTime = Date.now();

        log.debug('Requesting completion', { role, model, promptChars: renderedPrompt.length });

        let completion: ChatCompletion;
        try {
            completion = await this.client.chat.completions.create(
                {
                    model,
                    messages: [{ role: 'user', content: renderedPrompt }],
                    ...(temperature !== undefined ? { temperature } : {}),
                    ...(maxTokens !== undefined ? { max_tokens: maxTokens } : {})
                },
                options.signal ? { signal: options.signal } : undefined
            );
        } catch (error) {
            const elapsedMs = Date.now() - startTime;
            log.warn('Completion request failed', { role, model, elapsedMs, ...errorMeta(error) });
            throw this.toServiceError(role, error);
        }

        const content = completion.choices[0]?.message?.content;
        if (typeof content !== 'string') {
            throw new ServiceError(`Completion for "${role}" returned no content`, role);
        }

        log.debug('Completion received', { role, model, elapsedMs: Date.now() - startTime, chars: content.length });
        return content;
    }

    private toServiceError(role: string, error: unknown): ServiceError {
        if (error instanceof OpenAI.APIConnectionTimeoutError) {
            return new ServiceError(`Completion for "${role}" timed out`, role, undefined, true, error);
        }
        if (error instanceof OpenAI.APIUserAbortError) {
            return new ServiceError(`Completion for "${role}" was aborted`, role, undefined, true, error);
        }
        if (error instanceof OpenAI.APIError) {
            return new ServiceError(`Completion for "${role}" failed: ${error.message}`, role, error.status, false, error);
        }
        const message = error instanceof Error ? error.message : String(error);
        return new ServiceError(`Completion for "${role}" failed: ${message}`, role, undefined, false, error);
    }
}
