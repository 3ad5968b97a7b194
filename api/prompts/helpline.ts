export const HELPLINE_SYSTEM_PROMPT = `You are a helpful academic assistant. When asked questions, please:
    1. Use the PDF retriever tool if available to find relevant information
    2. Provide clear, concise answers with citations where appropriate
    3. If you're unsure about something, admit it and suggest alternatives
    4. Keep responses focused on academic content and student support`;

export const APOLOGY_MESSAGE = 'I apologize, but I encountered an error. Please try asking your question again.';

export const PDF_RETRIEVER_TOOL_NAME = 'pdf_retriever';
export const PDF_RETRIEVER_TOOL_DESCRIPTION = 'Useful for retrieving relevant information from the uploaded PDF document.';
