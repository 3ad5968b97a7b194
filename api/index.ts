import express from 'express';
import multer from 'multer';
import { createChatRouter, ChatRouterDeps } from './chat';
import { errorMessage } from './errors';
import { RequestValidator } from './services/requestValidator';
import { SyllabusGeneratorService } from './services/syllabusGenerator';
import { toResultBody } from './types/shared';
import { LLM_SCHEMA, SYLLABUS_REQUEST_SCHEMA } from './types/llm-schema';

export interface AppDeps {
  syllabusGenerator: SyllabusGeneratorService;
  chat: ChatRouterDeps;
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError
    && 'type' in error
    && error.type === 'entity.parse.failed';
}

// body-parser marks request problems (size, charset) with a 4xx status
function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createApp({ syllabusGenerator, chat }: AppDeps): express.Express {
  const app = express();

  // Middleware; any JSON value is accepted so the validator can describe it
  app.use(express.json({ strict: false }));

  // CORS middleware - PERMISSIVE (allows all origins)
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept, Authorization');
    res.header('Access-Control-Allow-Credentials', 'false'); // Set to false when using *

    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      service: 'Syllabus Helpline API'
    });
  });

  // Syllabus generation endpoint
  app.post('/SwaySyllabusGenerator', async (req, res) => {
    try {
      if (!req.is('application/json')) {
        return res.status(400).json({ error: 'Invalid JSON in request body' });
      }

      const body: unknown = req.body;
      if (body === null) {
        return res.status(400).json({ error: 'Invalid JSON in request body' });
      }
      if (!RequestValidator.isValid(body)) {
        return res.status(400).json({ errors: RequestValidator.validate(body) });
      }

      console.log('Syllabus request received:', { subjects: body.length });
      const results = await syllabusGenerator.run(body);

      return res.status(200).json(results.map(toResultBody));
    } catch (error) {
      console.error('Error in generate_syllabus endpoint:', errorMessage(error));
      return res.status(500).json({
        error: 'Internal server error',
        details: errorMessage(error)
      });
    }
  });

  app.use('/chat', createChatRouter(chat));

  // Root endpoint
  app.get('/', (req, res) => {
    res.status(200).json({
      message: 'Welcome to the Syllabus Helpline API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        '/SwaySyllabusGenerator': {
          method: 'POST',
          description: 'Generate syllabi for multiple subjects',
          request_format: SYLLABUS_REQUEST_SCHEMA,
          response_item_format: LLM_SCHEMA
        },
        chat: {
          createSession: '/chat/sessions (POST)',
          session: '/chat/sessions/:id (GET, DELETE)',
          uploadDocument: '/chat/sessions/:id/document (POST, multipart field "document")',
          sendMessage: '/chat/sessions/:id/messages (POST)'
        }
      }
    });
  });

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler: malformed JSON bodies, upload limits, anything unhandled
  app.use((error: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      return next(error);
    }
    if (isBodyParseError(error)) {
      return res.status(400).json({ error: 'Invalid JSON in request body' });
    }
    if (error instanceof multer.MulterError) {
      return res.status(400).json({ error: 'Upload rejected', details: error.message });
    }
    const status = clientErrorStatus(error);
    if (status !== null) {
      return res.status(status).json({ error: errorMessage(error) });
    }
    console.error('Unhandled error:', errorMessage(error));
    return res.status(500).json({
      error: 'Internal server error',
      details: errorMessage(error)
    });
  });

  return app;
}
