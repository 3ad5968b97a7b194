import express from 'express';
import multer from 'multer';
import path from 'path';
import { rm } from 'fs/promises';
import { errorMessage } from './errors';
import { ChatAssistantService } from './services/chatAssistant';
import { DocumentIndex, DocumentIndexer } from './services/documentIndex';
import { ChatSession, ChatSessionStore } from './services/chatSession';

export interface ChatRouterDeps {
  sessions: ChatSessionStore;
  assistant: ChatAssistantService;
  indexer: DocumentIndexer;
  uploadDir: string;
}

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

function isPdf(file: Express.Multer.File): boolean {
  return file.mimetype === 'application/pdf' || path.extname(file.originalname).toLowerCase() === '.pdf';
}

export function createChatRouter({ sessions, assistant, indexer, uploadDir }: ChatRouterDeps): express.Router {
  const router = express.Router();

  const upload = multer({
    dest: uploadDir,
    limits: { fileSize: MAX_UPLOAD_BYTES },
    fileFilter: (req, file, cb) => cb(null, isPdf(file)),
  });

  const findSession = (req: express.Request, res: express.Response): ChatSession | undefined => {
    const session = sessions.get(req.params.id);
    if (!session) {
      res.status(404).json({ error: 'Session not found' });
    }
    return session;
  };

  /**
   * POST /chat/sessions
   * Start a new helpline conversation
   */
  router.post('/sessions', (req, res) => {
    const session = sessions.create();
    console.log('Chat session created:', session.id);
    return res.status(201).json({ sessionId: session.id });
  });

  /**
   * GET /chat/sessions/:id
   * Active document and the retained conversation
   */
  router.get('/sessions/:id', (req, res) => {
    const session = findSession(req, res);
    if (!session) return;
    return res.json(session.snapshot());
  });

  /**
   * DELETE /chat/sessions/:id
   * End a session and drop its history and index
   */
  router.delete('/sessions/:id', (req, res) => {
    if (!sessions.delete(req.params.id)) {
      return res.status(404).json({ error: 'Session not found' });
    }
    return res.sendStatus(204);
  });

  /**
   * POST /chat/sessions/:id/document
   * Upload a PDF and make it the session's reference document
   */
  router.post(
    '/sessions/:id/document',
    (req, res, next) => {
      if (findSession(req, res)) next();
    },
    upload.single('document'),
    async (req, res) => {
      const file = req.file;
      try {
        const session = findSession(req, res);
        if (!session) return;

        if (!file) {
          return res.status(400).json({ error: 'A PDF file is required in the "document" field' });
        }

        if (session.index && session.documentName === file.originalname) {
          console.log('Document already indexed, reusing:', file.originalname);
          return res.json({ document: file.originalname, chunks: session.index.size, reused: true });
        }

        console.log('Indexing upload:', {
          session: session.id,
          filename: file.originalname,
          size: file.size,
        });

        let index: DocumentIndex;
        try {
          index = await indexer.buildIndex(file.path, file.originalname);
        } catch (error) {
          console.error('Document indexing failed:', errorMessage(error));
          return res.status(422).json({
            error: 'Failed to index the document. Please ensure it\'s a valid PDF.',
            details: errorMessage(error),
          });
        }

        session.replaceIndex(index);
        return res.json({ document: file.originalname, chunks: index.size, reused: false });
      } finally {
        if (file) {
          await rm(file.path, { force: true }).catch(error => {
            console.warn('Failed to remove uploaded file:', errorMessage(error));
          });
        }
      }
    }
  );

  /**
   * POST /chat/sessions/:id/messages
   * Ask a question; the reply is grounded in the session's document when one is loaded
   */
  router.post('/sessions/:id/messages', async (req, res) => {
    const session = findSession(req, res);
    if (!session) return;

    const body: unknown = req.body;
    const message = typeof body === 'object' && body !== null && 'message' in body ? body.message : undefined;
    if (typeof message !== 'string' || !message.trim()) {
      return res.status(400).json({ error: 'Message is required and must be a non-empty string' });
    }

    session.addTurn({ role: 'user', content: message });
    const reply = await assistant.answer(message, session.index);
    session.addTurn({ role: 'assistant', content: reply });

    return res.json({ reply, messages: session.history });
  });

  return router;
}
