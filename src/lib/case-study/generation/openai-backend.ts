/**
 * Case Study Builder — OpenAI Backend
 *
 * Chat-completions client behind the `GenerativeBackend` contract.  SDK
 * retries are disabled; the narrative generator owns the retry policy.
 */

import OpenAI from "openai";
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import type { BackendConfig } from "../config";
import {
    BackendConnectionError,
    BackendContextLimitError,
    BackendError,
    BackendInvalidResponseError,
    BackendRateLimitedError,
    BackendTimeoutError,
} from "../errors";
import type { GenerativeBackend, StructuredCompletionRequest, TextCompletionRequest } from "./backend";

const DEFAULT_TEMPERATURE = 0.7;

/** The one SDK call this backend makes; swapped out in tests */
export type ChatCompletionCall = (
    body: ChatCompletionCreateParamsNonStreaming,
    options: { signal?: AbortSignal }
) => Promise<ChatCompletion>;

export interface OpenAIBackendOptions {
    createCompletion?: ChatCompletionCall;
}

export class OpenAIBackend implements GenerativeBackend {
    readonly name = "openai";

    private readonly model: string;
    private readonly createCompletion: ChatCompletionCall;

    constructor(config: BackendConfig, options: OpenAIBackendOptions = {}) {
        if (!config.apiKey) {
            throw new Error("[OpenAIBackend] Missing OPENAI_API_KEY");
        }
        this.model = config.model;

        if (options.createCompletion) {
            this.createCompletion = options.createCompletion;
        } else {
            const client = new OpenAI({
                apiKey: config.apiKey,
                maxRetries: 0,
                ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
            });
            this.createCompletion = (body, requestOptions) => client.chat.completions.create(body, requestOptions);
        }
    }

    async completeStructured<T>(request: StructuredCompletionRequest<T>): Promise<T> {
        const content = await this.send(request, true);

        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            throw new BackendInvalidResponseError("Response is not valid JSON", { cause: error });
        }

        const result = request.schema.safeParse(parsed);
        if (!result.success) {
            const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
            throw new BackendInvalidResponseError(`Response does not match the expected fields (${issues.join("; ")})`, {
                cause: result.error,
            });
        }
        return result.data;
    }

    async completeText(request: TextCompletionRequest): Promise<string> {
        return this.send(request, false);
    }

    private async send(request: TextCompletionRequest, json: boolean): Promise<string> {
        let completion: ChatCompletion;
        try {
            completion = await this.createCompletion(
                {
                    model: this.model,
                    messages: [
                        { role: "system", content: request.system },
                        { role: "user", content: request.prompt },
                    ],
                    temperature: request.temperature ?? DEFAULT_TEMPERATURE,
                    max_tokens: request.maxTokens,
                    ...(json ? { response_format: { type: "json_object" as const } } : {}),
                },
                { signal: request.signal }
            );
        } catch (error) {
            throw toBackendError(error);
        }

        const content = completion.choices[0]?.message.content;
        if (!content?.trim()) {
            throw new BackendInvalidResponseError("Empty response from the generative backend");
        }
        return content;
    }
}

/** Map SDK errors onto the backend error family */
export function toBackendError(error: unknown): BackendError {
    if (error instanceof BackendError) {
        return error;
    }

    // Timeout extends connection error in the SDK, so it is checked first
    if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof OpenAI.APIUserAbortError) {
        return new BackendTimeoutError(error.message, { cause: error });
    }
    if (error instanceof OpenAI.APIConnectionError) {
        return new BackendConnectionError(error.message, { cause: error });
    }
    if (error instanceof OpenAI.RateLimitError) {
        return new BackendRateLimitedError(error.message, { cause: error });
    }
    if (error instanceof OpenAI.BadRequestError && isContextLimit(error)) {
        return new BackendContextLimitError(error.message, { cause: error });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new BackendError(message, "BACKEND_FAILURE", { cause: error });
}

function isContextLimit(error: InstanceType<typeof OpenAI.BadRequestError>): boolean {
    if (error.code === "context_length_exceeded") {
        return true;
    }
    const message = error.message.toLowerCase();
    return message.includes("maximum context length") || message.includes("token limit");
}
