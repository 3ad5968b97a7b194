// LLM JSON Schema definitions for syllabus generation

export interface LLMSyllabus {
    subject: string;
    syllabus: string[];
  }

  export function isLLMSyllabus(value: unknown): value is LLMSyllabus {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return false;
    }
    if (!('subject' in value) || !('syllabus' in value)) {
      return false;
    }
    const { subject, syllabus } = value;
    return typeof subject === 'string'
      && Array.isArray(syllabus)
      && syllabus.every((topic: unknown) => typeof topic === 'string');
  }

  // JSON Schema for the request body, published on the root endpoint
  export const SYLLABUS_REQUEST_SCHEMA = {
    type: "array",
    items: {
      type: "object",
      properties: {
        subject: {
          type: "string",
          description: "The subject name"
        }
      },
      required: ["subject"]
    }
  } as const;

  export const LLM_SCHEMA = {
    type: "object",
    properties: {
      subject: { type: "string" },
      syllabus: {
        type: "array",
        items: { type: "string" }
      }
    },
    required: ["subject", "syllabus"]
  } as const;
