import mongoose from 'mongoose';
import InterviewLog, { CompactInterviewLog, DetailedInterviewLog } from '../models/InterviewLog';

export interface InterviewLogWriter {
  saveCompactLog(sessionId: string, log: CompactInterviewLog): Promise<void>;
  saveDetailedLog(sessionId: string, log: DetailedInterviewLog): Promise<void>;
}

export class InterviewLogRepository implements InterviewLogWriter {
  async saveCompactLog(sessionId: string, log: CompactInterviewLog): Promise<void> {
    await this.upsert(sessionId, { compact: log });
    console.log(`[InterviewLogRepository] Compact log saved for ${sessionId}`);
  }

  async saveDetailedLog(sessionId: string, log: DetailedInterviewLog): Promise<void> {
    await this.upsert(sessionId, { detailed: log });
    console.log(`[InterviewLogRepository] Detailed log saved for ${sessionId}`);
  }

  private async upsert(
    sessionId: string,
    update: { compact?: CompactInterviewLog; detailed?: DetailedInterviewLog }
  ): Promise<void> {
    if (mongoose.connection.readyState !== 1) {
      throw new Error(`MongoDB not connected. State: ${mongoose.connection.readyState}`);
    }

    await InterviewLog.findOneAndUpdate({ sessionId }, { $set: update }, { upsert: true, new: true });
  }
}

export const interviewLogRepository = new InterviewLogRepository();
