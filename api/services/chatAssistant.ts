import {
  APOLOGY_MESSAGE,
  HELPLINE_SYSTEM_PROMPT,
  PDF_RETRIEVER_TOOL_DESCRIPTION,
  PDF_RETRIEVER_TOOL_NAME,
} from '../prompts/helpline';
import { errorMessage } from '../errors';
import { RETRIEVER_TOP_K } from '../config';
import { LLMClient, LLMMessage, LLMTool, LLMToolCall } from './llmClient';
import { DocumentIndex } from './documentIndex';

export interface ChatAssistantOptions {
  maxTokens?: number;
  maxToolRounds?: number;
  topK?: number;
}

const PDF_RETRIEVER_TOOL: LLMTool = {
  type: 'function',
  function: {
    name: PDF_RETRIEVER_TOOL_NAME,
    description: PDF_RETRIEVER_TOOL_DESCRIPTION,
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'What to look up in the document' },
      },
      required: ['query'],
    },
  },
};

export class ChatAssistantService {
  private readonly maxTokens?: number;
  private readonly maxToolRounds: number;
  private readonly topK: number;

  constructor(private readonly llm: LLMClient, options: ChatAssistantOptions = {}) {
    this.maxTokens = options.maxTokens;
    this.maxToolRounds = options.maxToolRounds ?? 4;
    this.topK = options.topK ?? RETRIEVER_TOP_K;
  }

  /**
   * Answer a question, letting the model pull passages from the index when one exists.
   * Only the current question is sent; earlier turns stay with the session for display.
   * Failures come back as an apology, never as an exception.
   */
  async answer(question: string, index: DocumentIndex | null): Promise<string> {
    try {
      const answer = await this.converse(question, index);
      console.log(`Generated response for prompt: ${question.substring(0, 50)}...`);
      return answer;
    } catch (error) {
      console.error('Error generating response:', errorMessage(error));
      return APOLOGY_MESSAGE;
    }
  }

  private async converse(question: string, index: DocumentIndex | null): Promise<string> {
    const messages: LLMMessage[] = [
      { role: 'system', content: HELPLINE_SYSTEM_PROMPT },
      { role: 'user', content: question },
    ];
    const tools = index ? [PDF_RETRIEVER_TOOL] : [];

    for (let round = 0; round <= this.maxToolRounds; round++) {
      const reply = await this.llm.complete(messages, { tools, maxTokens: this.maxTokens });
      if (reply.toolCalls.length === 0) {
        return reply.content;
      }
      if (!index) {
        throw new Error(`Model requested tool "${reply.toolCalls[0].name}" but no document is loaded`);
      }

      messages.push({
        role: 'assistant',
        content: reply.content || null,
        tool_calls: reply.toolCalls.map(call => ({
          id: call.id,
          type: 'function' as const,
          function: { name: call.name, arguments: call.arguments },
        })),
      });
      for (const call of reply.toolCalls) {
        messages.push({
          role: 'tool',
          tool_call_id: call.id,
          content: await this.runTool(call, index, question),
        });
      }
    }

    throw new Error(`No final answer after ${this.maxToolRounds} tool rounds`);
  }

  private async runTool(call: LLMToolCall, index: DocumentIndex, question: string): Promise<string> {
    if (call.name !== PDF_RETRIEVER_TOOL_NAME) {
      return `Unknown tool: ${call.name}`;
    }

    const query = ChatAssistantService.parseQuery(call.arguments) ?? question;
    const results = await index.search(query, this.topK);
    console.log('Retrieved passages:', { query, count: results.length });

    if (results.length === 0) {
      return 'No relevant passages found in the uploaded document.';
    }
    return results
      .map(({ chunk }) => `[${chunk.metadata.source}, page ${chunk.metadata.page + 1}]\n${chunk.text}`)
      .join('\n\n---\n\n');
  }

  static parseQuery(rawArguments: string): string | null {
    try {
      const parsed: unknown = JSON.parse(rawArguments);
      if (typeof parsed === 'object' && parsed !== null && 'query' in parsed
        && typeof parsed.query === 'string' && parsed.query.trim()) {
        return parsed.query.trim();
      }
      return null;
    } catch {
      return null;
    }
  }
}
