import { SyllabusRequestItem } from '../types/shared';

export class RequestValidator {
  /**
   * Check a syllabus request body. Returns one message per invalid item; empty means valid.
   */
  static validate(body: unknown): string[] {
    if (!Array.isArray(body)) {
      return ['Request body must be a list of objects'];
    }

    const errors: string[] = [];
    body.forEach((item: unknown, idx) => {
      const error = this.checkItem(item, idx);
      if (error) errors.push(error);
    });
    return errors;
  }

  static isValid(body: unknown): body is SyllabusRequestItem[] {
    return this.validate(body).length === 0;
  }

  private static checkItem(item: unknown, idx: number): string | null {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      return `Item at index ${idx} must be an object`;
    }
    if (!('subject' in item)) {
      return `Missing 'subject' field in item at index ${idx}`;
    }
    if (typeof item.subject !== 'string') {
      return `'subject' must be a string in item at index ${idx}`;
    }
    if (!item.subject.trim()) {
      return `'subject' cannot be empty in item at index ${idx}`;
    }
    return null;
  }
}
