// Labor Law Assistant - LLM providers
// One text-completion provider is active per deployment; it is selected once
// at startup from LLM_PROVIDER and never switched per request.

import type { AppConfig, LlmProviderName } from "./config.js";
import { withTimeout } from "./utils.js";

export const SYSTEM_INSTRUCTION = "Eres un asistente especializado en derecho laboral paraguayo.";

export interface LlmProvider {
  readonly provider: string;
  readonly model: string;
  /** Returns the trimmed completion text. Throws on an empty completion. */
  complete(prompt: string): Promise<string>;
}

export interface CompletionSettings {
  model: string;
  temperature: number;
  maxTokens: number;
  systemInstruction?: string;
  timeoutMs?: number;
}

// ─── OpenAI client interface (for testability / dependency injection) ────────────

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "system" | "user"; content: string }>;
        temperature?: number;
        max_tokens?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

export class OpenAIChatProvider implements LlmProvider {
  readonly provider = "openai";
  readonly model: string;
  private readonly client: OpenAIChatClient;
  private readonly settings: CompletionSettings;

  constructor(client: OpenAIChatClient, settings: CompletionSettings) {
    this.client = client;
    this.settings = settings;
    this.model = settings.model;
  }

  async complete(prompt: string): Promise<string> {
    const messages: Array<{ role: "system" | "user"; content: string }> = [];
    if (this.settings.systemInstruction) {
      messages.push({ role: "system", content: this.settings.systemInstruction });
    }
    messages.push({ role: "user", content: prompt });

    const response = await withTimeout(
      this.client.chat.completions.create({
        model: this.model,
        messages,
        temperature: this.settings.temperature,
        max_tokens: this.settings.maxTokens,
      }),
      this.settings.timeoutMs ?? 30_000,
      `OpenAI completion (${this.model})`,
    );

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new Error("LLM returned empty response");
    }
    return content;
  }
}

// ─── Gemini client interface ────────────────────────────────────────────────────

/** Minimal interface for the @google/generative-ai surface we use. */
export interface GeminiClient {
  getGenerativeModel(params: {
    model: string;
    systemInstruction?: string;
    generationConfig?: { temperature?: number; maxOutputTokens?: number };
  }): {
    generateContent(prompt: string): Promise<{ response: { text(): string } }>;
  };
}

export class GeminiProvider implements LlmProvider {
  readonly provider = "gemini";
  readonly model: string;
  private readonly client: GeminiClient;
  private readonly settings: CompletionSettings;

  constructor(client: GeminiClient, settings: CompletionSettings) {
    this.client = client;
    this.settings = settings;
    this.model = settings.model;
  }

  async complete(prompt: string): Promise<string> {
    const generativeModel = this.client.getGenerativeModel({
      model: this.model,
      systemInstruction: this.settings.systemInstruction,
      generationConfig: { temperature: this.settings.temperature, maxOutputTokens: this.settings.maxTokens },
    });
    const result = await withTimeout(
      generativeModel.generateContent(prompt),
      this.settings.timeoutMs ?? 30_000,
      `Gemini completion (${this.model})`,
    );
    const content = result.response.text().trim();
    if (!content) {
      throw new Error("LLM returned empty response");
    }
    return content;
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

export interface LlmClients {
  openai: OpenAIChatClient;
  gemini?: GeminiClient | null;
}

/** Builds the answering provider named by `config.llm.provider`. */
export function createLlmProvider(
  config: Pick<AppConfig, "llm" | "externalCallTimeoutMs">,
  clients: LlmClients,
): LlmProvider {
  const settings: CompletionSettings = {
    model: config.llm.model,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
    systemInstruction: SYSTEM_INSTRUCTION,
    timeoutMs: config.externalCallTimeoutMs,
  };
  const provider: LlmProviderName = config.llm.provider;
  switch (provider) {
    case "openai":
      return new OpenAIChatProvider(clients.openai, settings);
    case "gemini":
      if (!clients.gemini) {
        throw new Error("LLM_PROVIDER=gemini but no Gemini client was configured");
      }
      return new GeminiProvider(clients.gemini, settings);
  }
}
