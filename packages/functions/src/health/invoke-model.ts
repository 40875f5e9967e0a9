/**
 * Bedrock-backed ModelClient for health insight generation.
 *
 * Sends the rendered prompt as a single user message through InvokeModel and
 * returns the text blocks of the reply. A request that outlives its timeout is
 * aborted.
 */

import { BedrockRuntimeClient, InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import {
  ModelError,
  ModelTimeoutError,
  errorMessage,
  isInsightError,
  withTimeout,
  type ModelClient,
} from "@health/core";

const MAX_TOKENS = 1024;

const SYSTEM_PROMPT = `You are a careful health data analyst.
Base every statement on the summaries you are given. Do not diagnose; point to a healthcare professional when something looks concerning.`;

interface TextBlock {
  type: "text";
  text: string;
}

function isTextBlock(block: unknown): block is TextBlock {
  return (
    typeof block === "object" &&
    block !== null &&
    "type" in block &&
    block.type === "text" &&
    "text" in block &&
    typeof block.text === "string"
  );
}

/**
 * Concatenate the text blocks of an Anthropic messages response
 */
export function extractText(result: unknown): string {
  if (typeof result !== "object" || result === null || !("content" in result) || !Array.isArray(result.content)) {
    throw new ModelError("Model response has no content blocks");
  }

  // Search by type; other block kinds are ignored
  const text = result.content
    .filter(isTextBlock)
    .map((block) => block.text)
    .join("\n")
    .trim();

  if (!text) {
    throw new ModelError("Model returned no text");
  }
  return text;
}

export function createBedrockClient(region: string): BedrockRuntimeClient {
  return new BedrockRuntimeClient({ region });
}

export class BedrockModelClient implements ModelClient {
  readonly modelVersion: string;

  constructor(
    private readonly modelId: string,
    private readonly client: BedrockRuntimeClient
  ) {
    this.modelVersion = modelId;
  }

  async generate(prompt: string, timeoutMs: number): Promise<string> {
    const controller = new AbortController();
    let body: Uint8Array | undefined;
    try {
      const response = await withTimeout(
        this.client.send(
          new InvokeModelCommand({
            modelId: this.modelId,
            contentType: "application/json",
            accept: "application/json",
            body: JSON.stringify({
              anthropic_version: "bedrock-2023-05-31",
              max_tokens: MAX_TOKENS,
              system: SYSTEM_PROMPT,
              messages: [{ role: "user", content: prompt }],
            }),
          }),
          { abortSignal: controller.signal }
        ),
        timeoutMs,
        () => {
          controller.abort();
          return new ModelTimeoutError(timeoutMs);
        }
      );
      body = response.body;
    } catch (error) {
      if (isInsightError(error)) throw error;
      throw new ModelError(`Bedrock request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!body || body.length === 0) {
      throw new ModelError("Model returned an empty body");
    }

    let result: unknown;
    try {
      result = JSON.parse(new TextDecoder().decode(body));
    } catch (error) {
      throw new ModelError("Model response is not valid JSON", { cause: error });
    }

    return extractText(result);
  }
}
