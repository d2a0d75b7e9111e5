import { createGateway, generateText, type LanguageModel } from "ai";

import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { Outcome, failed, succeeded } from "../../runtime/outcome.js";
import { TextProvider, TextRequest } from "../types.js";
import { failureFromError } from "./providerErrors.js";

export class GatewayTextProvider implements TextProvider {
  readonly name: string;
  private readonly model?: LanguageModel;

  constructor(private readonly config: RuntimeConfig) {
    this.name = `gateway:${config.gatewayModel}`;
    if (config.gatewayApiKey) {
      const gateway = createGateway({ apiKey: config.gatewayApiKey });
      this.model = gateway(config.gatewayModel);
    }
  }

  async generate(request: TextRequest): Promise<Outcome<string>> {
    if (!this.model) {
      return failed("configuration", "AI_GATEWAY_API_KEY is not set");
    }

    const startedAtMs = Date.now();
    try {
      const result = await generateText({
        model: this.model,
        maxOutputTokens: request.maxOutputTokens ?? this.config.maxOutputTokens,
        temperature: this.config.temperature,
        system: request.systemPrompt,
        prompt: request.userPrompt,
        maxRetries: 0,
        abortSignal: request.signal
      });

      const text = result.text.trim();
      if (this.config.verboseLogs) {
        console.log(
          `[provider:text] ${request.purpose} "${request.subject}" in ${Date.now() - startedAtMs}ms (${result.usage.inputTokens ?? 0}/${result.usage.outputTokens ?? 0} tokens)`
        );
      }

      return text ? succeeded(text) : failed("validation", "Model returned an empty response");
    } catch (error) {
      return failureFromError(error, request.signal);
    }
  }
}
