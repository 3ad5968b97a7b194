import { SyllabusResult } from '../types/shared';
import { isLLMSyllabus } from '../types/llm-schema';

export const START_MARKER = '<startJson>';
export const END_MARKER = '</endJson>';

type Extraction =
  | { found: true; json: string }
  | { found: false };

export class ResponseNormalizer {
  /**
   * Coerce raw LLM text into a syllabus result. Never throws.
   */
  static normalize(rawText: string): SyllabusResult {
    const extraction = this.extractJson(rawText);
    if (!extraction.found) {
      return {
        kind: 'error',
        error: 'Could not extract JSON from response',
        rawResponse: rawText,
      };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(extraction.json);
    } catch (parseError) {
      console.error('Error cleaning response:', parseError instanceof Error ? parseError.message : parseError);
      console.error('Response that failed to parse:', rawText.substring(0, 500));
      return {
        kind: 'error',
        error: 'Failed to parse JSON response',
        details: parseError instanceof Error ? parseError.message : String(parseError),
        rawResponse: rawText,
      };
    }

    if (!isLLMSyllabus(parsed)) {
      console.warn('LLM response JSON is missing subject or syllabus');
      return {
        kind: 'error',
        error: 'Unexpected JSON shape in response',
        details: 'Expected a string "subject" and a "syllabus" list of strings',
        rawResponse: rawText,
      };
    }

    return { kind: 'ok', subject: parsed.subject, syllabus: parsed.syllabus };
  }

  private static extractJson(rawText: string): Extraction {
    const start = rawText.indexOf(START_MARKER);
    if (start !== -1) {
      const afterStart = rawText.substring(start + START_MARKER.length);
      const end = afterStart.indexOf(END_MARKER);
      let json = (end === -1 ? afterStart : afterStart.substring(0, end)).trim();
      if (!json.startsWith('{')) {
        json = `{${json}}`;
      }
      return { found: true, json };
    }

    // Flat objects only: a nested brace ends the match early
    const flattened = rawText.replace(/\n/g, ' ').replace(/\\/g, '');
    const match = flattened.match(/({[^}]*})/);
    if (!match) {
      return { found: false };
    }
    return { found: true, json: match[1] };
  }
}
