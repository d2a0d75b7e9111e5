import { RuntimeConfig } from "../../config/runtimeConfig.js";
import { Producer } from "../../runtime/fallbackChain.js";
import { Outcome } from "../../runtime/outcome.js";
import { TextProvider, TextPurpose } from "../../providers/types.js";

export interface TextPrompt {
  subject: string;
  systemPrompt: string;
  userPrompt: string;
  maxOutputTokens?: number;
}

export interface TextProducerOptions<I, O> {
  provider: TextProvider;
  config: RuntimeConfig;
  purpose: TextPurpose;
  prompt: (input: I) => TextPrompt;
  parse: (text: string, input: I) => Outcome<O>;
}

/** First tier of every text stage: one provider call, then a stage-specific parse. */
export function createTextProducer<I, O>(options: TextProducerOptions<I, O>): Producer<I, O> {
  return {
    name: options.provider.name,
    timeoutMs: options.config.textTimeoutMs,
    retryable: true,
    external: true,
    async produce(input, context) {
      const prompt = options.prompt(input);
      const response = await options.provider.generate({
        purpose: options.purpose,
        ...prompt,
        signal: context.signal
      });
      return response.ok ? options.parse(response.value, input) : response;
    }
  };
}
