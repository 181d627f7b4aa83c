import {
  InternalThought,
  InterviewFeedback,
  ObserverAnalysis,
  ReadonlyInterviewState,
} from '../../models/types';

export interface InterviewerReply {
  reply: string;
  thoughts: InternalThought[];
}

export interface ObserverDecision {
  analyze(
    state: ReadonlyInterviewState,
    candidateMessage: string,
    activeQuestion?: string
  ): Promise<ObserverAnalysis>;
}

export interface InterviewerDecision {
  generateGreeting(state: ReadonlyInterviewState): Promise<string>;
  respond(
    state: ReadonlyInterviewState,
    analysis: ObserverAnalysis,
    candidateMessage: string
  ): Promise<InterviewerReply>;
}

export interface EvaluatorDecision {
  evaluate(state: ReadonlyInterviewState): Promise<InterviewFeedback>;
}
