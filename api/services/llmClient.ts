import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionMessageParam, ChatCompletionTool } from 'openai/resources/chat/completions';
import { LLMServiceError } from '../errors';

export type LLMMessage = ChatCompletionMessageParam;
export type LLMTool = ChatCompletionTool;

export interface LLMToolCall {
  id: string;
  name: string;
  arguments: string;
}

export interface LLMReply {
  content: string;
  toolCalls: LLMToolCall[];
}

export interface CompletionOptions {
  tools?: LLMTool[];
  maxTokens?: number;
}

export interface LLMClient {
  readonly model: string;
  complete(messages: LLMMessage[], options?: CompletionOptions): Promise<LLMReply>;
}

export interface OpenAIChatClientOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  temperature: number;
}

export class OpenAIChatClient implements LLMClient {
  private readonly openai: OpenAI;
  readonly model: string;
  private readonly temperature: number;

  constructor(options: OpenAIChatClientOptions) {
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      // Calls run to completion or fail; the caller decides what to do with a failure
      maxRetries: 0,
    });
    this.model = options.model;
    this.temperature = options.temperature;
  }

  /**
   * Call the chat completions endpoint
   */
  async complete(messages: LLMMessage[], options: CompletionOptions = {}): Promise<LLMReply> {
    const tools = options.tools && options.tools.length > 0 ? options.tools : undefined;

    let response: ChatCompletion;
    try {
      response = await this.openai.chat.completions.create({
        model: this.model,
        messages,
        temperature: this.temperature,
        max_tokens: options.maxTokens,
        tools,
      });
    } catch (error) {
      throw new LLMServiceError('LLM request failed', error instanceof Error ? error.message : String(error));
    }

    const message = response.choices[0]?.message;
    if (!message) {
      throw new LLMServiceError('No choices in LLM response');
    }

    return {
      content: message.content ?? '',
      toolCalls: (message.tool_calls ?? []).map(call => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      })),
    };
  }
}
