import { createApp } from './index';
import { loadConfig, loadEnvFile, AppConfig } from './config';
import { ConfigError, errorMessage } from './errors';
import { OpenAIChatClient } from './services/llmClient';
import { OpenAIEmbedder } from './services/embeddings';
import { PdfDocumentLoader } from './services/pdfParser';
import { RecursiveTextSplitter } from './services/textSplitter';
import { DocumentIndexer } from './services/documentIndex';
import { SyllabusGeneratorService } from './services/syllabusGenerator';
import { ChatAssistantService } from './services/chatAssistant';
import { ChatSessionStore } from './services/chatSession';

export function buildApp(config: AppConfig) {
  const llm = new OpenAIChatClient(config.llm);
  const embedder = new OpenAIEmbedder(config.embedding);

  return createApp({
    syllabusGenerator: new SyllabusGeneratorService(llm),
    chat: {
      sessions: new ChatSessionStore(),
      assistant: new ChatAssistantService(llm, { maxTokens: config.llm.chatMaxTokens }),
      indexer: new DocumentIndexer({
        loader: new PdfDocumentLoader(),
        splitter: new RecursiveTextSplitter(),
        embedder,
      }),
      uploadDir: config.uploadDir,
    },
  });
}

function main(): void {
  loadEnvFile();

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${errorMessage(error)}`);
      process.exit(1);
    }
    throw error;
  }

  const { host, port } = config.server;
  const server = buildApp(config).listen(port, host, () => {
    console.log(`Server running on http://${host}:${port}`, { model: config.llm.model });
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(error => {
      if (error) {
        console.error('Error during shutdown:', error.message);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main();
}
