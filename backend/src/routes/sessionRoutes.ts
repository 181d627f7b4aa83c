import { Router } from 'express';
import { SessionController } from '../controllers/sessionController';
import { sessionStateCache } from '../repositories/sessionStateCache';
import { SessionManager } from '../services/interview-orchestrator/sessionManager';

export const createSessionRouter = (manager: SessionManager): Router => {
  const router = Router();
  const sessionController = new SessionController(manager, sessionStateCache);

  // Create a session from an optional config
  router.post('/', sessionController.createSession);

  // Greeting and first turn
  router.post('/:sessionId/start', sessionController.startSession);

  router.post('/:sessionId/messages', sessionController.sendMessage);

  // Force stop and evaluate
  router.post('/:sessionId/stop', sessionController.stopSession);

  router.post('/:sessionId/cancel', sessionController.cancelSession);

  router.get('/:sessionId/status', sessionController.getStatus);

  // Feedback, or the cached snapshot once the session is gone
  router.get('/:sessionId/results', sessionController.getResults);

  router.delete('/:sessionId', sessionController.deleteSession);

  return router;
};
