import OpenAI from "openai";
import { ApiError, errorMessage } from "../../core/errors";
import { logger } from "../../core/logger";
import type { CompletionClient, CompletionRequest } from "./coder.types";

const log = logger.child("coder");

interface OpenAICompletionOptions {
  apiKey?: string;
  baseURL?: string;
}

const createOpenAICompletionClient = (
  options: OpenAICompletionOptions = {}
): CompletionClient => {
  const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
  // The SDK throws on construction without a key; defer to the first call instead.
  let openai: OpenAI | undefined;

  const complete = async (request: CompletionRequest) => {
    if (!apiKey) {
      throw new ApiError("OPENAI_API_KEY is not set.", 401);
    }
    openai ??= new OpenAI({ apiKey, baseURL: options.baseURL });

    log.debug(`Requesting completion from ${request.model}`);
    try {
      const response = await openai.chat.completions.create(
        {
          model: request.model,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          messages: [
            { role: "system", content: request.system },
            { role: "user", content: request.user },
          ],
        },
        { signal: request.signal }
      );
      return response.choices[0]?.message.content ?? "";
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        throw new ApiError(`Completion request failed: ${error.message}`, error.status ?? 0);
      }
      throw new ApiError(`Completion request failed: ${errorMessage(error)}`, 0);
    }
  };

  return { complete };
};

export { createOpenAICompletionClient };
export type { OpenAICompletionOptions };
