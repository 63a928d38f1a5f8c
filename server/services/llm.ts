/**
 * Minimal structural view of a Responses API result. The SDK's `Response`
 * type satisfies it, and tests can build plain objects.
 */
export interface ResponsesPayload {
  id?: string;
  model?: string;
  status?: string | null;
  output_text?: string | null;
  output?: ReadonlyArray<{
    type: string;
    content?: ReadonlyArray<{ type: string; text?: string }>;
  }>;
  incomplete_details?: { reason?: string } | null;
  usage?: {
    input_tokens?: number;
    output_tokens?: number;
    total_tokens?: number;
  } | null;
}

export interface ExtractedResponseText {
  text: string;
  requestId?: string;
  model?: string | null;
  status?: string | null;
  incompleteReason?: string | null;
  usage?: ResponsesPayload["usage"];
}

const collectOutputText = (response: ResponsesPayload): string => {
  const direct = response.output_text;
  if (typeof direct === "string" && direct.trim()) return direct;

  let buffer = "";
  for (const item of response.output ?? []) {
    if (item.type !== "message") continue;
    for (const part of item.content ?? []) {
      if (part.type === "output_text" && typeof part.text === "string") {
        buffer += part.text;
      }
    }
  }
  return buffer;
};

export const isMaxBudgetStop = (response: ResponsesPayload) =>
  response.status === "incomplete" &&
  response.incomplete_details?.reason === "max_output_tokens";

export function extractResponseText(
  response: ResponsesPayload,
): ExtractedResponseText {
  return {
    text: collectOutputText(response),
    requestId: response.id,
    model: response.model ?? null,
    status: response.status ?? null,
    incompleteReason: response.incomplete_details?.reason ?? null,
    usage: response.usage ?? null,
  };
}
