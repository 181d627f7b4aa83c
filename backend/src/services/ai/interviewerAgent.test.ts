import { InterviewState, createInitialState } from '../../models/types';
import { AgentError } from '../../utils/errors';
import { ScriptedBackend, analysisFixture } from '../../test-utils/fakes';
import { CompletionGateway } from '../llm/completionGateway';
import { InterviewerAgent, responseInstruction } from './interviewerAgent';

const agentFor = (backend: ScriptedBackend, generationRetries = 0) =>
  new InterviewerAgent(
    {
      gateway: new CompletionGateway(backend, { maxRetries: 0, backoffBaseMs: 1, backoffMaxMs: 1, timeoutMs: 1000 }),
      model: 'test-model',
      config: { temperature: 0.7, maxTokens: 800, generationRetries },
    },
    { historyWindowTurns: 1, greetingMaxTokens: 300 }
  );

const stateWithOpenTurn = (): InterviewState => {
  const state = createInitialState();
  state.turns.push(
    {
      turnId: 1,
      agentMessage: 'Introduce yourself.',
      candidateMessage: 'I am Alex.',
      thoughts: [],
      closed: true,
      createdAt: new Date(0),
    },
    {
      turnId: 2,
      agentMessage: 'What is a closure?',
      candidateMessage: 'What is the salary?',
      thoughts: [],
      closed: false,
      createdAt: new Date(0),
    }
  );
  return state;
};

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('responseInstruction', () => {
  it('restates the active question after a counter-question', () => {
    const instruction = responseInstruction(
      analysisFixture({ responseType: 'counter_question', answeredLastQuestion: false }),
      'What is a closure?'
    );
    expect(instruction).toContain('Answer it briefly');
    expect(instruction).toContain('"What is a closure?"');
  });

  it('handles gibberish before the response type', () => {
    const instruction = responseInstruction(
      analysisFixture({ responseType: 'off_topic', isGibberish: true, answeredLastQuestion: false }),
      'Q?'
    );
    expect(instruction.startsWith('The message was not readable.')).toBe(true);
  });

  it('asks a follow-up for incomplete answers', () => {
    expect(responseInstruction(analysisFixture({ responseType: 'incomplete' }))).toBe(
      'The answer is incomplete. Ask one clarifying follow-up on the missing part.'
    );
  });
});

describe('InterviewerAgent', () => {
  it('strips reasoning from the reply and keeps it as a thought', async () => {
    const backend = new ScriptedBackend('<reasoning>they dodged</reasoning>Good question! Now, what is a closure?');
    const analysis = analysisFixture({ responseType: 'counter_question', answeredLastQuestion: false });

    const result = await agentFor(backend).respond(stateWithOpenTurn(), analysis, 'What is the salary?');

    expect(result.reply).toBe('Good question! Now, what is a closure?');
    expect(result.thoughts.map((thought) => `${thought.from}:${thought.content}`)).toEqual([
      'Observer:noted',
      'Interviewer:Response type counter_question, difficulty BASIC, next step ask_new.',
      'Interviewer:Reasoning: they dodged',
    ]);
  });

  it('sends windowed history and the open question', async () => {
    const backend = new ScriptedBackend('Next question.');
    const analysis = analysisFixture({ responseType: 'off_topic', answeredLastQuestion: false });

    await agentFor(backend).respond(stateWithOpenTurn(), analysis, 'What is the salary?');

    const messages = backend.requests[0].messages;
    expect(messages.map((message) => message.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(messages[1].content).toBe("Let's start the interview.");
    expect(messages[2].content).toBe('What is a closure?');
    expect(messages[3].content).toContain('"What is a closure?"');
    expect(backend.requests[0].jsonMode).toBe(false);
  });

  it('treats an empty visible reply as a failed generation', async () => {
    const backend = new ScriptedBackend('<reasoning>only thinking</reasoning>', 'Second try.');

    const result = await agentFor(backend, 1).respond(stateWithOpenTurn(), analysisFixture(), 'answer');

    expect(result.reply).toBe('Second try.');
    expect(backend.requests).toHaveLength(2);
  });

  it('raises AgentError when no retries are left', async () => {
    const backend = new ScriptedBackend('   ');
    await expect(agentFor(backend).respond(stateWithOpenTurn(), analysisFixture(), 'answer')).rejects.toThrow(
      AgentError
    );
  });

  it('generates a greeting with its own token budget', async () => {
    const backend = new ScriptedBackend('Hi, I am your interviewer. Tell me about yourself.');

    const greeting = await agentFor(backend).generateGreeting(createInitialState('Backend engineer, Go'));

    expect(greeting).toBe('Hi, I am your interviewer. Tell me about yourself.');
    expect(backend.requests[0].maxTokens).toBe(300);
    expect(backend.requests[0].messages[1].content).toContain('<job_description>\nBackend engineer, Go\n</job_description>');
  });
});
