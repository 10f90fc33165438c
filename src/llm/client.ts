/**
 * LLM Client — the Oracle backed by the Vercel AI SDK.
 *
 * The AI SDK (`ai` package) provides a provider-agnostic model interface
 * (OpenAI, Anthropic, Google) and token usage tracking. The SDK's own retry
 * loop is switched off; the Transport Layer owns retries.
 */
import type { LanguageModel } from "ai";
import { generateText } from "ai";
import type { OracleRequest } from "../core/types.js";
import { classifyOracleError } from "./oracle.js";
import type { Oracle, OracleCallParams, OracleResponse } from "./oracle.js";

export class LLMClient implements Oracle {
    public readonly model: LanguageModel;

    constructor(model: LanguageModel) {
        this.model = model;
    }

    /**
     * One request/response exchange. Never throws: SDK errors are
     * classified into a failure status.
     */
    async sendRaw(request: OracleRequest, params: OracleCallParams): Promise<OracleResponse> {
        try {
            const result = await generateText({
                model: this.model,
                system: request.directive,
                prompt: request.prompt,
                temperature: params.temperature,
                maxOutputTokens: params.maxOutputTokens,
                abortSignal: params.signal,
                maxRetries: 0,
            });

            return {
                status: "ok",
                content: result.text,
                usage: {
                    inputTokens: result.usage.inputTokens ?? 0,
                    outputTokens: result.usage.outputTokens ?? 0,
                    totalTokens: result.usage.totalTokens ?? 0,
                },
            };
        } catch (err: unknown) {
            return {
                status: classifyOracleError(err),
                message: err instanceof Error ? err.message : String(err),
            };
        }
    }
}
