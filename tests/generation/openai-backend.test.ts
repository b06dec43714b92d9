import { describe, it, expect } from "vitest";
import OpenAI from "openai";
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { z } from "zod";
import {
    BackendConnectionError,
    BackendContextLimitError,
    BackendError,
    BackendInvalidResponseError,
    BackendRateLimitedError,
    BackendTimeoutError,
} from "@/lib/case-study/errors";
import { OpenAIBackend, toBackendError, type ChatCompletionCall } from "@/lib/case-study/generation/openai-backend";

const CONFIG = { apiKey: "test-key", model: "test-model" };

function completion(content: string | null): ChatCompletion {
    return {
        id: "chatcmpl-test",
        object: "chat.completion",
        created: 0,
        model: "test-model",
        choices: [
            {
                index: 0,
                finish_reason: "stop",
                logprobs: null,
                message: { role: "assistant", content, refusal: null },
            },
        ],
    };
}

function stubCompletion(content: string | null): { bodies: ChatCompletionCreateParamsNonStreaming[]; call: ChatCompletionCall } {
    const bodies: ChatCompletionCreateParamsNonStreaming[] = [];
    return {
        bodies,
        call: async (body) => {
            bodies.push(body);
            return completion(content);
        },
    };
}

const schema = z.object({ title: z.string() });

describe("OpenAIBackend", () => {
    it("requires an API key", () => {
        expect(() => new OpenAIBackend({ apiKey: "", model: "test-model" })).toThrow("Missing OPENAI_API_KEY");
    });

    it("requests JSON and validates it against the schema", async () => {
        const { bodies, call } = stubCompletion('{"title":"Ledger Automation"}');
        const backend = new OpenAIBackend(CONFIG, { createCompletion: call });

        const result = await backend.completeStructured({ system: "sys", prompt: "user", schema, maxTokens: 3000 });

        expect(result).toEqual({ title: "Ledger Automation" });
        expect(bodies[0]).toEqual({
            model: "test-model",
            messages: [
                { role: "system", content: "sys" },
                { role: "user", content: "user" },
            ],
            temperature: 0.7,
            max_tokens: 3000,
            response_format: { type: "json_object" },
        });
    });

    it("requests plain text without a response format", async () => {
        const { bodies, call } = stubCompletion("Improved text");
        const backend = new OpenAIBackend(CONFIG, { createCompletion: call });

        expect(await backend.completeText({ system: "sys", prompt: "user", maxTokens: 1000, temperature: 0.2 })).toBe(
            "Improved text"
        );
        expect(bodies[0].response_format).toBeUndefined();
        expect(bodies[0].temperature).toBe(0.2);
    });

    it("rejects responses that are not JSON", async () => {
        const backend = new OpenAIBackend(CONFIG, { createCompletion: stubCompletion("not json").call });

        await expect(
            backend.completeStructured({ system: "sys", prompt: "user", schema, maxTokens: 10 })
        ).rejects.toThrow(BackendInvalidResponseError);
    });

    it("rejects JSON with the wrong fields", async () => {
        const backend = new OpenAIBackend(CONFIG, { createCompletion: stubCompletion('{"heading":"x"}').call });

        await expect(
            backend.completeStructured({ system: "sys", prompt: "user", schema, maxTokens: 10 })
        ).rejects.toThrow("Response does not match the expected fields (title: Required)");
    });

    it("rejects empty responses", async () => {
        const backend = new OpenAIBackend(CONFIG, { createCompletion: stubCompletion(null).call });

        await expect(backend.completeText({ system: "sys", prompt: "user", maxTokens: 10 })).rejects.toThrow(
            "Empty response from the generative backend"
        );
    });

    it("maps SDK failures thrown by the call", async () => {
        const backend = new OpenAIBackend(CONFIG, {
            createCompletion: async () => {
                throw new OpenAI.RateLimitError(429, { message: "Rate limit reached" }, "Rate limit reached", undefined);
            },
        });

        await expect(backend.completeText({ system: "sys", prompt: "user", maxTokens: 10 })).rejects.toThrow(
            BackendRateLimitedError
        );
    });
});

describe("toBackendError", () => {
    it("maps timeouts before connection errors", () => {
        expect(toBackendError(new OpenAI.APIConnectionTimeoutError())).toBeInstanceOf(BackendTimeoutError);
        expect(toBackendError(new OpenAI.APIUserAbortError())).toBeInstanceOf(BackendTimeoutError);
        expect(toBackendError(new OpenAI.APIConnectionError({ message: "socket hang up" }))).toBeInstanceOf(
            BackendConnectionError
        );
    });

    it("recognises context-length errors by code or message", () => {
        const byCode = new OpenAI.BadRequestError(
            400,
            { code: "context_length_exceeded", message: "too long" },
            "too long",
            undefined
        );
        const byMessage = new OpenAI.BadRequestError(
            400,
            { message: "This model's maximum context length is 8192 tokens" },
            "This model's maximum context length is 8192 tokens",
            undefined
        );

        expect(toBackendError(byCode)).toBeInstanceOf(BackendContextLimitError);
        expect(toBackendError(byMessage)).toBeInstanceOf(BackendContextLimitError);
    });

    it("wraps anything else as a generic backend failure", () => {
        const mapped = toBackendError(new Error("boom"));

        expect(mapped).toBeInstanceOf(BackendError);
        expect(mapped.code).toBe("BACKEND_FAILURE");
        expect(mapped.message).toBe("boom");
    });

    it("passes backend errors through", () => {
        const error = new BackendInvalidResponseError("bad");
        expect(toBackendError(error)).toBe(error);
    });
});
