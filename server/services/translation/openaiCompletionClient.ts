import { APIConnectionError, APIError, APIUserAbortError } from "openai";

import { isTranslationDebugEnabled } from "../../config/env";
import { extractResponseText, isMaxBudgetStop, type ResponsesPayload } from "../llm";
import { getOpenAIClient } from "../openaiClient";
import { TransientRequestError } from "./errors";
import type {
  CompletionRequest,
  CompletionResponse,
  TranslationCompletionClient,
} from "./translationExecutor";

const RETRYABLE_STATUS = new Set([408, 409, 429]);

export interface ResponsesRequestBody {
  model: string;
  instructions: string;
  input: string;
  max_output_tokens?: number;
}

/** The slice of the OpenAI SDK this client calls; the SDK instance satisfies it. */
export interface ResponsesClient {
  responses: {
    create(
      body: ResponsesRequestBody,
      options: { signal: AbortSignal },
    ): PromiseLike<ResponsesPayload>;
  };
}

export interface OpenAICompletionClientOptions {
  model: string;
  maxOutputTokens?: number | null;
  client?: ResponsesClient;
}

/** Maps SDK failures that are worth another attempt onto TransientRequestError. */
export function normalizeOpenAIError(error: unknown): unknown {
  if (error instanceof APIUserAbortError) return error;
  if (error instanceof APIConnectionError) {
    return new TransientRequestError(error.message, { cause: error });
  }
  if (error instanceof APIError) {
    const status = typeof error.status === "number" ? error.status : null;
    if (status !== null && (RETRYABLE_STATUS.has(status) || status >= 500)) {
      return new TransientRequestError(error.message, { status, cause: error });
    }
  }
  return error;
}

export class OpenAICompletionClient implements TranslationCompletionClient {
  constructor(private readonly options: OpenAICompletionClientOptions) {}

  async complete(
    request: CompletionRequest,
    signal: AbortSignal,
  ): Promise<CompletionResponse> {
    const client: ResponsesClient = this.options.client ?? getOpenAIClient();
    const maxOutputTokens = request.maxOutputTokens ?? this.options.maxOutputTokens;

    try {
      const response = await client.responses.create(
        {
          model: this.options.model,
          instructions: request.instructions,
          input: request.input,
          ...(maxOutputTokens ? { max_output_tokens: maxOutputTokens } : {}),
        },
        { signal },
      );

      if (isMaxBudgetStop(response)) {
        console.warn("[TRANSLATION OPENAI] Output truncated at max_output_tokens", {
          taskId: request.taskId,
          responseId: response.id,
        });
      }
      const extracted = extractResponseText(response);
      if (isTranslationDebugEnabled()) {
        console.debug("[TRANSLATION OPENAI] Response received", {
          taskId: request.taskId,
          responseId: extracted.requestId,
          usage: extracted.usage,
        });
      }
      return { text: extracted.text, model: extracted.model };
    } catch (error) {
      throw normalizeOpenAIError(error);
    }
  }
}
