import mongoose, { Schema, Document } from 'mongoose';
import { CandidateInfo, DifficultyLevel, InterviewFeedback, KnowledgeGap } from './types';
import { AggregateMetrics } from '../services/observability/types';

export interface CompactLogTurn {
  turnId: number;
  agentVisibleMessage: string;
  userMessage: string;
  internalThoughts: string;
}

export interface CompactInterviewLog {
  participantName: string;
  turns: CompactLogTurn[];
  finalFeedback: string | null;
}

export interface DetailedLogThought {
  from: string;
  to: string;
  content: string;
  timestamp: string;
}

export interface DetailedLogTurn {
  turnId: number;
  timestamp: string;
  agentVisibleMessage: string;
  userMessage: string | null;
  internalThoughts: DetailedLogThought[];
}

export interface DetailedInterviewLog {
  participantName: string;
  candidateInfo: CandidateInfo;
  interviewStats: {
    totalTurns: number;
    finalDifficulty: DifficultyLevel;
    confirmedSkills: string[];
    knowledgeGaps: KnowledgeGap[];
    coveredTopics: string[];
  };
  turns: DetailedLogTurn[];
  finalFeedback: InterviewFeedback | null;
  tokenMetrics: AggregateMetrics;
}

export interface IInterviewLog extends Document {
  sessionId: string;
  compact?: CompactInterviewLog;
  detailed?: DetailedInterviewLog;
}

const InterviewLogSchema: Schema = new Schema(
  {
    sessionId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    compact: Schema.Types.Mixed,
    detailed: Schema.Types.Mixed,
  },
  {
    timestamps: true,
  }
);

export default mongoose.model<IInterviewLog>('InterviewLog', InterviewLogSchema);
