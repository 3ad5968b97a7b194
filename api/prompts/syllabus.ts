import type { LLMMessage } from '../services/llmClient';

export const SYLLABUS_SYSTEM_PROMPT = `Task: Provide a detailed syllabus for the given subject in strict JSON format, adhering to these guidelines:
    -> Generate a concise, focused syllabus for the given subject.
    -> The syllabus should be in JSON format and consist only of the subject name and a list of topics.
    -> Avoid repeating topics or adding redundant information. Limit each topic to a single line.
    -> Ensure no additional text, explanations, or information outside the JSON structure.

Example:
{
    "subject": "Software Engineering",
    "syllabus": ["Introduction to software engineering", "Software crises", "Software Life Cycle Model", "Waterfall Model", "Prototype Model", "Spiral Model", "Agile Model", "Software Requirement Analysis and Specification"]
}
Output: Provide only the JSON object as per the format above.`;

export function buildSyllabusMessages(subject: string): LLMMessage[] {
  return [
    { role: 'system', content: SYLLABUS_SYSTEM_PROMPT },
    { role: 'user', content: `Subject: ${subject}` },
  ];
}
