// Shared types for the Syllabus & Study Helpline API

export interface SyllabusRequestItem {
    subject: string;
  }

  export interface GeneratedSyllabus {
    kind: 'ok';
    subject: string;
    syllabus: string[];
  }

  export interface SyllabusFailure {
    kind: 'error';
    error: string;
    details?: string;
    rawResponse?: string;
  }

  export type SyllabusResult = GeneratedSyllabus | SyllabusFailure;

  // Shape returned to HTTP callers for each requested subject
  export type SyllabusResultBody =
    | { subject: string; syllabus: string[] }
    | { error: string; details?: string; raw_response?: string };

  export type ConversationRole = 'user' | 'assistant';

  export interface ConversationTurn {
    role: ConversationRole;
    content: string;
  }

  export interface ChunkMetadata {
    source: string;
    page: number;
    chunkIndex: number;
  }

  export interface DocumentChunk {
    text: string;
    metadata: ChunkMetadata;
  }

  export interface ChatSessionSnapshot {
    sessionId: string;
    document: string | null;
    messages: ConversationTurn[];
  }

  export function toResultBody(result: SyllabusResult): SyllabusResultBody {
    switch (result.kind) {
      case 'ok':
        return { subject: result.subject, syllabus: result.syllabus };
      case 'error': {
        const body: { error: string; details?: string; raw_response?: string } = { error: result.error };
        if (result.details !== undefined) body.details = result.details;
        if (result.rawResponse !== undefined) body.raw_response = result.rawResponse;
        return body;
      }
    }
  }
