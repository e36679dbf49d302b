export interface InvokeOptions {
    signal?: AbortSignal;
    temperature?: number;
    maxTokens?: number;
}

/**
 * Issues one completion request for a module role. Implementations resolve
 * the role to a model binding and throw ServiceError on failure; any retry
 * policy lives behind this interface.
 */
export interface ModelInvoker {
    invoke(role: string, renderedPrompt: string, options?: InvokeOptions): Promise<string>;
}
