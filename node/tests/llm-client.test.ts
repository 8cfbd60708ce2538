import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockCreate, MockAPIError } = vi.hoisted(() => {
  class MockAPIError extends Error {
    constructor(
      readonly status: number | undefined,
      message: string,
    ) {
      super(message);
    }
  }
  return { mockCreate: vi.fn(), MockAPIError };
});

vi.mock('openai', () => {
  class MockOpenAI {
    static APIError = MockAPIError;
    chat = { completions: { create: mockCreate } };
  }
  return { default: MockOpenAI };
});

import { OpenAiJsonClient } from '@/services/llm-client';
import { ProgramSelector } from '@/services/program-selector';
import { GenerativeError } from '@/utils/errors';
import { makeProgram } from './helpers';

function completion(content: string) {
  return { choices: [{ message: { content } }] };
}

async function failureKind(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof GenerativeError) return err.kind;
    throw err;
  }
  throw new Error('expected the call to fail');
}

const request = { model: 'test-model', system: 'sys', user: '{}', context: 'select' };

describe('OpenAiJsonClient', () => {
  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('parses fenced JSON content', async () => {
    mockCreate.mockResolvedValue(completion('```json\n{"picks":[]}\n```'));
    const client = new OpenAiJsonClient({ apiKey: 'test-key', timeoutMs: 1000, maxRetries: 0 });

    await expect(client.completeJson(request)).resolves.toEqual({ picks: [] });
    expect(mockCreate.mock.calls[0][0]).toMatchObject({ model: 'test-model', response_format: { type: 'json_object' } });
  });

  it('fails with not_configured without an API key', async () => {
    const client = new OpenAiJsonClient({ timeoutMs: 1000, maxRetries: 0 });

    expect(await failureKind(client.completeJson(request))).toBe('not_configured');
    expect(mockCreate).not.toHaveBeenCalled();
  });

  it('classifies empty and non-JSON content', async () => {
    const client = new OpenAiJsonClient({ apiKey: 'test-key', timeoutMs: 1000, maxRetries: 0 });

    mockCreate.mockResolvedValueOnce(completion('   '));
    expect(await failureKind(client.completeJson(request))).toBe('empty_content');

    mockCreate.mockResolvedValueOnce(completion('not json at all'));
    expect(await failureKind(client.completeJson(request))).toBe('invalid_json');
  });

  it('times out a call that never answers', async () => {
    mockCreate.mockReturnValue(new Promise(() => undefined));
    const client = new OpenAiJsonClient({ apiKey: 'test-key', timeoutMs: 20, maxRetries: 0 });

    expect(await failureKind(client.completeJson(request))).toBe('timeout');
  });

  it('retries server errors', async () => {
    mockCreate
      .mockRejectedValueOnce(new MockAPIError(503, 'unavailable'))
      .mockResolvedValueOnce(completion('{"picks":[{"id":1}]}'));
    const client = new OpenAiJsonClient({ apiKey: 'test-key', timeoutMs: 1000, maxRetries: 1 });

    await expect(client.completeJson(request)).resolves.toEqual({ picks: [{ id: 1 }] });
    expect(mockCreate).toHaveBeenCalledTimes(2);
  });

  it('does not retry client errors and opens the circuit after repeated failures', async () => {
    mockCreate.mockRejectedValue(new MockAPIError(400, 'bad request'));
    const client = new OpenAiJsonClient({ apiKey: 'test-key', timeoutMs: 1000, maxRetries: 2 });

    for (let i = 0; i < 3; i++) {
      expect(await failureKind(client.completeJson(request))).toBe('http');
    }
    expect(await failureKind(client.completeJson(request))).toBe('circuit_open');
    expect(mockCreate).toHaveBeenCalledTimes(3);
  });
});

describe('ProgramSelector over a timed-out model call', () => {
  beforeEach(() => {
    mockCreate.mockReset();
  });

  it('returns the first positions with empty reasons', async () => {
    mockCreate.mockReturnValue(new Promise(() => undefined));
    const client = new OpenAiJsonClient({ apiKey: 'test-key', timeoutMs: 20, maxRetries: 0 });
    const selector = new ProgramSelector(client, { model: 'test-model' });
    const shortlist = ['A', 'B', 'C', 'D', 'E'].map((name) => makeProgram(name));

    const { selection, failure } = await selector.select('robotics', shortlist, 3);

    expect(selection).toEqual({ ids: [1, 2, 3], reasons: {}, fallback: true });
    expect(failure?.kind).toBe('timeout');
  });
});
