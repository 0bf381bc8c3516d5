import OpenAI from 'openai';
import { OpenAICompletionClient, DEFAULT_COMPLETION_BASE_URL, DEFAULT_COMPLETION_MODEL } from '../openai-completion-client';
import { COMPLETION_UNAVAILABLE_TEXT } from '../../../types';
import { ConfigurationError } from '../../../../core/errors';

const mockCreate = jest.fn();
const mockList = jest.fn();

// Mock the OpenAI SDK. APIError is kept so `instanceof OpenAI.APIError` works in the client.
jest.mock('openai', () => {
  class MockAPIError extends Error {
    readonly status: number | undefined;
    readonly type: string | undefined;
    constructor(status: number | undefined, error: { type?: string } | undefined, message: string | undefined) {
      super(message);
      this.status = status;
      this.type = error?.type;
    }
  }
  const MockOpenAI = jest.fn().mockImplementation(() => ({
    chat: { completions: { create: (...args: unknown[]) => mockCreate(...args) } },
    models: { list: (...args: unknown[]) => mockList(...args) },
  }));
  return Object.assign(MockOpenAI, { APIError: MockAPIError });
});

const MockedOpenAI = OpenAI as jest.MockedClass<typeof OpenAI>;

describe('OpenAICompletionClient', () => {
  const options = { maxTokens: 1200, temperature: 0.7 };
  let originalKey: string | undefined;

  beforeAll(() => {
    originalKey = process.env.GROQ_API_KEY;
  });

  afterAll(() => {
    if (originalKey === undefined) {
      delete process.env.GROQ_API_KEY;
    } else {
      process.env.GROQ_API_KEY = originalKey;
    }
  });

  beforeEach(() => {
    MockedOpenAI.mockClear();
    mockCreate.mockReset();
    mockList.mockReset();
    delete process.env.GROQ_API_KEY;
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should throw ConfigurationError when no API key is available', () => {
      expect(() => new OpenAICompletionClient()).toThrow(ConfigurationError);
    });

    it('should read the key from GROQ_API_KEY', () => {
      process.env.GROQ_API_KEY = 'test-env-key';
      const client = new OpenAICompletionClient();

      expect(client.name).toBe('groq');
      expect(MockedOpenAI).toHaveBeenCalledWith({
        apiKey: 'test-env-key',
        baseURL: DEFAULT_COMPLETION_BASE_URL,
        maxRetries: 0,
        timeout: 60000,
      });
    });

    it('should use the given options', () => {
      const client = new OpenAICompletionClient({
        apiKey: 'test-key',
        baseURL: 'https://llm.test/v1',
        model: 'custom-model',
        timeoutSeconds: 5,
        name: 'local',
      });

      expect(client.name).toBe('local');
      expect(MockedOpenAI).toHaveBeenCalledWith({
        apiKey: 'test-key',
        baseURL: 'https://llm.test/v1',
        maxRetries: 0,
        timeout: 5000,
      });
    });
  });

  describe('generateResponse', () => {
    let client: OpenAICompletionClient;

    beforeEach(() => {
      client = new OpenAICompletionClient({ apiKey: 'test-key' });
    });

    it('should return the trimmed completion text', async () => {
      mockCreate.mockResolvedValue({ choices: [{ message: { content: '  Photosynthesis converts light.  ' } }] });

      const result = await client.generateResponse('Explain photosynthesis', options);

      expect(result).toEqual({ succeeded: true, text: 'Photosynthesis converts light.' });
      expect(mockCreate).toHaveBeenCalledWith(
        {
          model: DEFAULT_COMPLETION_MODEL,
          messages: [{ role: 'user', content: 'Explain photosynthesis' }],
          max_tokens: 1200,
          temperature: 0.7,
        },
        { timeout: 60000 }
      );
    });

    it('should fail on an empty answer', async () => {
      mockCreate.mockResolvedValue({ choices: [{ message: { content: '   ' } }] });

      expect(await client.generateResponse('p', options)).toEqual({
        succeeded: false,
        text: COMPLETION_UNAVAILABLE_TEXT,
        error: 'Completion response contained no text.',
      });
    });

    it('should fail when no choices are returned', async () => {
      mockCreate.mockResolvedValue({ choices: [] });

      const result = await client.generateResponse('p', options);

      expect(result.succeeded).toBe(false);
    });

    it('should fold API errors into a failed result', async () => {
      mockCreate.mockRejectedValue(
        new OpenAI.APIError(429, { type: 'rate_limit_exceeded' }, 'Too many requests', undefined)
      );

      expect(await client.generateResponse('p', options)).toEqual({
        succeeded: false,
        text: COMPLETION_UNAVAILABLE_TEXT,
        error: 'Too many requests',
      });
      expect(console.error).toHaveBeenCalledWith(
        '[OpenAICompletionClient] Completion failed (rate_limit_exceeded): Too many requests'
      );
    });

    it('should fold other errors into a failed result', async () => {
      mockCreate.mockRejectedValue(new Error('socket hang up'));

      expect(await client.generateResponse('p', options)).toEqual({
        succeeded: false,
        text: COMPLETION_UNAVAILABLE_TEXT,
        error: 'socket hang up',
      });
      expect(console.error).toHaveBeenCalledWith('[OpenAICompletionClient] Completion failed (sdk_error): socket hang up');
    });
  });

  describe('healthCheck', () => {
    it('should report available when models can be listed', async () => {
      mockList.mockResolvedValue({ data: [] });
      const client = new OpenAICompletionClient({ apiKey: 'test-key' });

      expect(await client.healthCheck()).toEqual({ available: true, model: DEFAULT_COMPLETION_MODEL });
      expect(mockList).toHaveBeenCalledWith({ timeout: 10000 });
    });

    it('should report unavailable with the error message', async () => {
      mockList.mockRejectedValue(new Error('unauthorized'));
      const client = new OpenAICompletionClient({ apiKey: 'test-key', timeoutSeconds: 4 });

      expect(await client.healthCheck()).toEqual({
        available: false,
        model: DEFAULT_COMPLETION_MODEL,
        error: 'unauthorized',
      });
      expect(mockList).toHaveBeenCalledWith({ timeout: 4000 });
    });
  });
});
