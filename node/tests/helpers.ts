import type { JsonCompletionRequest, LlmJsonClient } from '@/services/llm-client';
import type { JsonObject } from '@/services/safe-parse-json';
import type { FundingProgram } from '@/types/funding';

/** Records every request and answers through the given handler. */
export class FakeLlm implements LlmJsonClient {
  readonly calls: JsonCompletionRequest[] = [];

  constructor(private readonly respond: (request: JsonCompletionRequest) => Promise<JsonObject>) {}

  async completeJson(request: JsonCompletionRequest): Promise<JsonObject> {
    this.calls.push(request);
    return this.respond(request);
  }
}

export function makeProgram(name: string, extra: Partial<FundingProgram> = {}): FundingProgram {
  return { name, deadlineDate: null, daysLeft: null, relevanceScore: 0, origin: 'vector', ...extra };
}
