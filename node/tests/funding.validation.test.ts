import { describe, it, expect } from 'vitest';
import { validateFundingQuery, validateSessionRequest } from '@/routes/funding.validation';

describe('validateFundingQuery', () => {
  it('accepts a minimal body and applies defaults', () => {
    const result = validateFundingQuery({ message: '  AI grants in Berlin  ' });
    expect(result).toEqual({ success: true, data: { message: 'AI grants in Berlin', mode: 'standard' } });
  });

  it('coerces numeric strings', () => {
    const result = validateFundingQuery({ message: 'robotics', fundingNeed: '100000', wanted: '2', mode: 'comprehensive' });
    expect(result).toMatchObject({ success: true, data: { fundingNeed: 100000, wanted: 2, mode: 'comprehensive' } });
  });

  it('reports the failing paths', () => {
    const result = validateFundingQuery({ message: '   ', wanted: 20 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.map((e) => e.path)).toEqual(['message', 'wanted']);
      expect(result.error[0].message).toBe('Message is required and cannot be empty');
    }
  });
});

describe('validateSessionRequest', () => {
  it('requires a session id', () => {
    expect(validateSessionRequest({ sessionId: 'abc' })).toEqual({ success: true, data: { sessionId: 'abc' } });
    const result = validateSessionRequest({});
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error[0].path).toBe('sessionId');
  });
});
