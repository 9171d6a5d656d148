import Anthropic from "@anthropic-ai/sdk";
import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { AnthropicSettings, LlmClientKind } from "../config";
import { ConfigurationError, ExternalServiceError } from "../errors";

const SERVICE = "anthropic";

export interface TextGenerationClient {
  complete(prompt: string): Promise<string>;
}

interface MessageRequest {
  model: string;
  max_tokens: number;
  messages: Array<{ role: "user"; content: string }>;
}

interface ContentBlock {
  type: string;
  text?: string;
}

// The part of the SDK's `client.messages` used here
export interface MessagesApi {
  create(body: MessageRequest): PromiseLike<{ content: ContentBlock[] }>;
}

const MessagesResponseSchema = z.object({
  content: z
    .array(
      z
        .object({
          type: z.string(),
          text: z.string().optional()
        })
        .passthrough()
    )
    .default([])
});

function requireApiKey(settings: AnthropicSettings): void {
  if (!settings.apiKey) {
    throw new ConfigurationError("ANTHROPIC_API_KEY is not set.");
  }
}

function buildRequest(settings: AnthropicSettings, prompt: string): MessageRequest {
  return {
    model: settings.model,
    max_tokens: settings.maxTokens,
    messages: [{ role: "user", content: prompt }]
  };
}

export function joinTextBlocks(blocks: ContentBlock[]): string {
  const texts = blocks.flatMap((block) => (block.type === "text" && block.text ? [block.text] : []));
  if (texts.length === 0) {
    throw new ExternalServiceError(SERVICE, "No text in the model response.");
  }
  return texts.join("\n").trim();
}

export function messagesEndpoint(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/v1/messages`;
}

// Azure-hosted deployments read `api-key`, the SDK sends `x-api-key`: both go out
export class AnthropicSdkClient implements TextGenerationClient {
  private readonly messages: MessagesApi;

  constructor(private readonly settings: AnthropicSettings, messages?: MessagesApi) {
    this.messages =
      messages ??
      new Anthropic({
        apiKey: settings.apiKey || null,
        baseURL: settings.baseUrl,
        timeout: settings.timeoutMs,
        maxRetries: 0,
        defaultHeaders: {
          "api-key": settings.apiKey,
          "anthropic-version": settings.version
        }
      }).messages;
  }

  async complete(prompt: string): Promise<string> {
    requireApiKey(this.settings);

    let content: ContentBlock[];
    try {
      const response = await this.messages.create(buildRequest(this.settings, prompt));
      content = response.content;
    } catch (err) {
      const status = err instanceof Anthropic.APIError ? err.status : undefined;
      const message = err instanceof Error ? err.message : String(err);
      throw new ExternalServiceError(SERVICE, `Anthropic request failed: ${message}`, { status, cause: err });
    }
    return joinTextBlocks(content);
  }
}

export class AnthropicHttpClient implements TextGenerationClient {
  constructor(private readonly settings: AnthropicSettings, private readonly http: AxiosInstance = axios) {}

  async complete(prompt: string): Promise<string> {
    requireApiKey(this.settings);

    let data: unknown;
    try {
      const resp = await this.http.post<unknown>(messagesEndpoint(this.settings.baseUrl), buildRequest(this.settings, prompt), {
        timeout: this.settings.timeoutMs,
        headers: {
          "Content-Type": "application/json",
          "api-key": this.settings.apiKey,
          "anthropic-version": this.settings.version
        }
      });
      data = resp.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const status = err.response?.status;
        const detail = status ? `HTTP ${status}` : err.code ?? err.message;
        throw new ExternalServiceError(SERVICE, `Anthropic request failed: ${detail}`, { status, cause: err });
      }
      throw err;
    }

    const parsed = MessagesResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExternalServiceError(SERVICE, "Unexpected Anthropic response body.", { cause: parsed.error });
    }
    return joinTextBlocks(parsed.data.content);
  }
}

export function createTextGenerationClient(kind: LlmClientKind, settings: AnthropicSettings): TextGenerationClient {
  if (kind === "http") {
    return new AnthropicHttpClient(settings);
  }
  return new AnthropicSdkClient(settings);
}
