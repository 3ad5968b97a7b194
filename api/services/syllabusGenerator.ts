import { SyllabusRequestItem, SyllabusResult } from '../types/shared';
import { buildSyllabusMessages } from '../prompts/syllabus';
import { errorMessage } from '../errors';
import { LLMClient } from './llmClient';
import { ResponseNormalizer } from './responseNormalizer';

export class SyllabusGeneratorService {
  constructor(private readonly llm: LLMClient) {}

  /**
   * Generate one syllabus per requested subject, in request order.
   * A failure for one subject is reported in its slot and does not stop the rest.
   */
  async run(items: SyllabusRequestItem[]): Promise<SyllabusResult[]> {
    const results: SyllabusResult[] = [];
    for (const item of items) {
      results.push(await this.processItem(item.subject.trim()));
    }
    return results;
  }

  async processItem(subject: string): Promise<SyllabusResult> {
    try {
      console.log('Processing subject:', subject);
      const reply = await this.llm.complete(buildSyllabusMessages(subject));

      console.debug(`Raw output from LLM for subject '${subject}':`, reply.content);

      const result = ResponseNormalizer.normalize(reply.content);
      if (result.kind === 'error') {
        console.warn(`Could not normalize LLM output for subject '${subject}':`, result.error);
      }
      return result;
    } catch (error) {
      console.error(`Error processing subject '${subject}':`, errorMessage(error));
      return {
        kind: 'error',
        error: 'An unexpected error occurred during processing',
        details: errorMessage(error),
      };
    }
  }
}
