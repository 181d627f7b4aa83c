import { TokenUsage } from '../../models/types';
import { AgentUsage, AggregateMetrics } from './types';

const emptyUsage = (): AgentUsage => ({ inputTokens: 0, outputTokens: 0, totalTokens: 0, calls: 0 });

const round2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Token accounting for one session, split by the agent named in the generation name.
 */
export class SessionMetrics {
  private total = emptyUsage();
  private byAgent = {
    observer: emptyUsage(),
    interviewer: emptyUsage(),
    evaluator: emptyUsage(),
  };
  private turns = 0;

  addGeneration(generationName: string, usage: TokenUsage): void {
    const totalTokens = usage.totalTokens || usage.inputTokens + usage.outputTokens;
    this.accumulate(this.total, usage, totalTokens);

    const name = generationName.toLowerCase();
    if (name.includes('observer')) {
      this.accumulate(this.byAgent.observer, usage, totalTokens);
    } else if (name.includes('interviewer')) {
      this.accumulate(this.byAgent.interviewer, usage, totalTokens);
    } else if (name.includes('evaluator')) {
      this.accumulate(this.byAgent.evaluator, usage, totalTokens);
    }
  }

  incrementTurn(): void {
    this.turns++;
  }

  snapshot(): AggregateMetrics {
    const { calls, ...total } = this.total;
    return {
      total,
      generationCount: calls,
      turnCount: this.turns,
      avgTokensPerTurn: this.turns === 0 ? 0 : round2(total.totalTokens / this.turns),
      avgTokensPerGeneration: calls === 0 ? 0 : round2(total.totalTokens / calls),
      byAgent: {
        observer: { ...this.byAgent.observer },
        interviewer: { ...this.byAgent.interviewer },
        evaluator: { ...this.byAgent.evaluator },
      },
    };
  }

  private accumulate(target: AgentUsage, usage: TokenUsage, totalTokens: number): void {
    target.inputTokens += usage.inputTokens;
    target.outputTokens += usage.outputTokens;
    target.totalTokens += totalTokens;
    target.calls++;
  }
}
