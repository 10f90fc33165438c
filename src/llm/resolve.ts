import { openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { anthropic } from "@ai-sdk/anthropic";
import type { LanguageModel } from "ai";

export const SUPPORTED_PROVIDERS = ["openai", "google", "anthropic"] as const;
export type SupportedProvider = (typeof SUPPORTED_PROVIDERS)[number];

/** Environment variable each provider SDK reads its API key from. */
export const PROVIDER_API_KEY_VARIABLES: Record<SupportedProvider, string> = {
    openai: "OPENAI_API_KEY",
    google: "GOOGLE_GENERATIVE_AI_API_KEY",
    anthropic: "ANTHROPIC_API_KEY",
};

function isSupportedProvider(name: string): name is SupportedProvider {
    return SUPPORTED_PROVIDERS.some((provider) => provider === name);
}

/**
 * Normalises a provider name, falling back to ATTUNE_PROVIDER and then
 * OpenAI. Throws for anything unsupported.
 */
export function resolveProviderName(
    providerName?: string,
    env: NodeJS.ProcessEnv = process.env,
): SupportedProvider {
    const provider = (providerName || env.ATTUNE_PROVIDER || "openai").toLowerCase();
    if (!isSupportedProvider(provider)) {
        throw new Error(
            `Unsupported LLM provider: ${provider} (expected one of ${SUPPORTED_PROVIDERS.join(", ")})`,
        );
    }
    return provider;
}

/**
 * Resolves a LanguageModel based on provider and model names.
 * Falls back to ATTUNE_PROVIDER and ATTUNE_MODEL environment variables.
 * Defaults to OpenAI gpt-5-nano if nothing is specified.
 */
export function resolveLanguageModel(
    providerName?: string,
    modelId?: string
): LanguageModel {
    const provider = resolveProviderName(providerName);
    const model = modelId || process.env.ATTUNE_MODEL;

    switch (provider) {
        case "openai":
            return openai(model || "gpt-5-nano");
        case "google":
            return google(model || "gemini-1.5-pro");
        case "anthropic":
            return anthropic(model || "claude-3-5-sonnet-latest");
    }
}

/** True when the API key of the resolved provider is present. */
export function hasProviderApiKey(providerName?: string, env: NodeJS.ProcessEnv = process.env): boolean {
    const provider = resolveProviderName(providerName, env);
    return Boolean(env[PROVIDER_API_KEY_VARIABLES[provider]]);
}
