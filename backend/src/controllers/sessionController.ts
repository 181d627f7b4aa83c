import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../middlewares/errorHandler';
import { SessionStateCache } from '../repositories/sessionStateCache';
import { AgentConfig, AgentSettings, InterviewConfigInput } from '../services/interview-orchestrator/interviewConfig';
import { SessionManager } from '../services/interview-orchestrator/sessionManager';
import { Payload, isRecord, optionalNumber, optionalRecord, optionalString } from '../utils/payload';

type SnapshotReader = Pick<SessionStateCache, 'load'>;

const AGENT_KEYS: (keyof AgentSettings)[] = ['observer', 'interviewer', 'evaluator'];

const numberField = (payload: Payload, key: string, label: string): number | undefined => {
  if (payload[key] === undefined || payload[key] === null) return undefined;
  const value = optionalNumber(payload, key);
  if (value === undefined) {
    throw new ApiError(400, `${label} must be a number`);
  }
  return value;
};

const parseAgentOverrides = (raw: Payload, name: string): Partial<AgentConfig> => ({
  temperature: numberField(raw, 'temperature', `agents.${name}.temperature`),
  maxTokens: numberField(raw, 'maxTokens', `agents.${name}.maxTokens`),
  generationRetries: numberField(raw, 'generationRetries', `agents.${name}.generationRetries`),
});

export const parseConfigInput = (body: unknown): InterviewConfigInput => {
  if (body === undefined || body === null) return {};
  if (!isRecord(body)) {
    throw new ApiError(400, 'Request body must be a JSON object');
  }

  const input: InterviewConfigInput = {
    model: optionalString(body, 'model'),
    maxTurns: numberField(body, 'maxTurns', 'maxTurns'),
    jobDescription: optionalString(body, 'jobDescription'),
  };

  const agents = optionalRecord(body, 'agents');
  if (agents) {
    const parsed: NonNullable<InterviewConfigInput['agents']> = {};
    for (const key of AGENT_KEYS) {
      const overrides = optionalRecord(agents, key);
      if (overrides) parsed[key] = parseAgentOverrides(overrides, key);
    }
    input.agents = parsed;
  }

  return input;
};

const parseMessage = (body: unknown): string => {
  const message = isRecord(body) ? optionalString(body, 'message') : undefined;
  if (!message) {
    throw new ApiError(400, 'Message is required');
  }
  return message;
};

export class SessionController {
  constructor(
    private readonly manager: SessionManager,
    private readonly snapshots: SnapshotReader
  ) {}

  createSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const sessionId = this.manager.create(parseConfigInput(req.body));
      res.status(201).json({ success: true, data: { sessionId, status: this.manager.getStatus(sessionId) } });
    } catch (error) {
      next(error);
    }
  };

  startSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = req.params;
      const greeting = await this.manager.start(sessionId);
      res.json({ success: true, data: { sessionId, message: greeting } });
    } catch (error) {
      next(error);
    }
  };

  sendMessage = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = req.params;
      const result = await this.manager.processMessage(sessionId, parseMessage(req.body));

      if (result.kind === 'error') {
        res.status(502).json({ success: false, error: result.message, data: result });
        return;
      }

      res.json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  };

  stopSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = req.params;
      const feedback = await this.manager.forceStop(sessionId);
      res.json({ success: true, data: { sessionId, feedback } });
    } catch (error) {
      next(error);
    }
  };

  cancelSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = req.params;
      await this.manager.cancel(sessionId);
      res.json({ success: true, data: this.manager.getStatus(sessionId) });
    } catch (error) {
      next(error);
    }
  };

  getStatus = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = req.params;
      const status = this.manager.getStatus(sessionId);
      res.json({
        success: true,
        data: { ...status, state: status.busy ? 'processing' : status.phase },
      });
    } catch (error) {
      next(error);
    }
  };

  getResults = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { sessionId } = req.params;

      if (!this.manager.has(sessionId)) {
        const snapshot = await this.snapshots.load(sessionId).catch((error: unknown) => {
          console.warn(`⚠️  Snapshot lookup failed for ${sessionId}:`, error);
          return null;
        });
        if (!snapshot) {
          throw new ApiError(404, 'Session not found');
        }
        res.json({ success: true, data: snapshot });
        return;
      }

      const status = this.manager.getStatus(sessionId);
      const feedback = this.manager.getFeedback(sessionId);

      if (!feedback) {
        res.json({
          success: true,
          data: {
            sessionId,
            status: status.busy ? 'processing' : status.phase,
            message: status.feedbackPending ? 'Evaluation pending' : 'Interview not finished',
          },
        });
        return;
      }

      res.json({
        success: true,
        data: {
          sessionId,
          status: status.phase,
          feedback,
          state: this.manager.getState(sessionId),
        },
      });
    } catch (error) {
      next(error);
    }
  };

  deleteSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = req.params;
      const removed = await this.manager.close(sessionId);
      if (!removed) {
        throw new ApiError(404, 'Session not found');
      }
      res.json({ success: true, data: { sessionId } });
    } catch (error) {
      next(error);
    }
  };
}
