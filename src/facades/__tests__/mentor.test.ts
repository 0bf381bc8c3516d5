// src/facades/__tests__/mentor.test.ts

import { buildMentorDependencies, createEduMentorAgent, createMentorAgent } from '../mentor';
import { MentorConfig } from '../../config/mentor-config';
import { RagClient } from '../../retrieval/rag-client';
import { OpenAICompletionClient } from '../../llm/adapters/openai/openai-completion-client';
import { ContentServiceClient } from '../../content/content-client';
import { MemoryActionLog } from '../../actions/memory-action-log';
import { EduMentorAgent, EDUCATIONAL_MENTOR_PERSONA } from '../../agents/edu-mentor-agent';
import { CompletionOptions, CompletionResult, ICompletionClient } from '../../llm/types';
import { jsonResponse, routeFetch, sentBody } from '../../gateway/__tests__/fetch-fakes';

const baseConfig: MentorConfig = {
  rag: { apiUrl: 'https://rag.test/query', timeoutSeconds: 10, topK: 4 },
  completion: {
    apiKey: 'test-key',
    baseUrl: 'https://llm.test/v1',
    model: 'test-model',
    maxTokens: 500,
    temperature: 0.4,
    timeoutSeconds: 20,
  },
};

function stubCompletion(text: string) {
  return {
    name: 'stub',
    generateResponse: jest.fn<Promise<CompletionResult>, [string, CompletionOptions]>().mockResolvedValue({
      succeeded: true,
      text,
    }),
    healthCheck: jest.fn().mockResolvedValue({ available: true }),
  } satisfies ICompletionClient;
}

describe('Mentor facade', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('buildMentorDependencies', () => {
    it('should build the default clients from configuration', () => {
      const deps = buildMentorDependencies(baseConfig);

      expect(deps.retrieval).toBeInstanceOf(RagClient);
      expect(deps.completion).toBeInstanceOf(OpenAICompletionClient);
      expect(deps.actionLog).toBeInstanceOf(MemoryActionLog);
      expect(deps.content).toBeUndefined();
    });

    it('should build a content client when the content section is present', () => {
      const fetchImpl = routeFetch({ '/api/v1/auth/login': () => jsonResponse({ access_token: 'test-token' }) });

      const deps = buildMentorDependencies(
        {
          ...baseConfig,
          content: {
            baseUrl: 'https://content.test',
            username: 'mentor',
            password: 'test-secret',
            timeoutSeconds: 5,
            longTimeoutSeconds: 15,
          },
        },
        { fetchImpl }
      );

      expect(deps.content).toBeInstanceOf(ContentServiceClient);
      expect(fetchImpl.mock.calls[0][0]).toBe('https://content.test/api/v1/auth/login');
      expect(sentBody(fetchImpl, 0)).toEqual({ username: 'mentor', password: 'test-secret' });
    });

    it('should keep clients passed in the options', () => {
      const completion = stubCompletion('x');
      const actionLog = new MemoryActionLog();

      const deps = buildMentorDependencies(baseConfig, { completion, actionLog });

      expect(deps.completion).toBe(completion);
      expect(deps.actionLog).toBe(actionLog);
    });
  });

  describe('createEduMentorAgent', () => {
    it('should run a query end to end over the configured retrieval endpoint', async () => {
      const fetchImpl = routeFetch({
        '/query': () =>
          jsonResponse({
            retrieved_chunks: [{ content: 'Dharma is duty', file: 'veda1.txt', score: 0.9, index: 0 }],
            groq_answer: '',
          }),
      });
      const completion = stubCompletion('Dharma is the duty that sustains order.');
      const actionLog = new MemoryActionLog();

      const agent = createEduMentorAgent(baseConfig, { fetchImpl, completion, actionLog });
      const envelope = await agent.processQuery('Explain dharma', 'task-9');

      expect(agent).toBeInstanceOf(EduMentorAgent);
      expect(envelope.status).toBe('success');
      expect(envelope.response).toBe('Dharma is the duty that sustains order.');
      expect(sentBody(fetchImpl, 0)).toEqual({ query: 'Educational learning guidance: Explain dharma', top_k: 4 });
      expect(completion.generateResponse.mock.calls[0][1]).toEqual({ maxTokens: 500, temperature: 0.4 });
      expect(actionLog.getRecords('task-9')[0].backend).toBe('stub');
    });

    it('should let run configuration overrides win over the file values', async () => {
      const fetchImpl = routeFetch({ '/query': () => jsonResponse({ retrieved_chunks: [] }) });
      const completion = stubCompletion('ok');

      const agent = createMentorAgent(EDUCATIONAL_MENTOR_PERSONA, baseConfig, {
        fetchImpl,
        completion,
        runConfig: { topK: 1, temperature: 0.9 },
      });
      await agent.processQuery('q');

      expect(sentBody(fetchImpl, 0)).toEqual({ query: 'Educational learning guidance: q', top_k: 1 });
      expect(completion.generateResponse.mock.calls[0][1]).toEqual({ maxTokens: 500, temperature: 0.9 });
    });
  });
});
