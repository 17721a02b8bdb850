import { Logger } from '@nestjs/common';
import { LlmClientService } from './llm-client.service';

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('LlmClientService', () => {
  const savedEnv = { ...process.env };

  beforeEach(() => {
    process.env.LLM_RETRY_BACKOFF_SEC = '0';
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.env = { ...savedEnv };
    jest.restoreAllMocks();
  });

  it('deduplicates unavailable logs by reason key', async () => {
    delete process.env.GEMINI_API_KEY;
    const fetchSpy = jest.spyOn(global, 'fetch');
    const service = new LlmClientService();

    await service.generateJson('system', 'user');
    await service.generateJson('system', 'user');

    expect(Logger.prototype.warn).toHaveBeenCalledTimes(1);
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it('retries retryable statuses and parses fenced json with trailing commas', async () => {
    process.env.GEMINI_API_KEY = 'test-key';
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockResolvedValueOnce(jsonResponse(503, { error: 'busy' }))
      .mockResolvedValueOnce(
        jsonResponse(200, {
          candidates: [
            {
              content: {
                parts: [{ text: '```json\n{"items": [{"index": 1},],}\n```' }],
              },
            },
          ],
        }),
      );
    const service = new LlmClientService();

    const result = await service.generateJson('system', 'user');

    expect(fetchSpy).toHaveBeenCalledTimes(2);
    expect(result).toEqual({ items: [{ index: 1 }] });
  });

  it('retries a transient failure at most once', async () => {
    process.env.GEMINI_API_KEY = 'test-key';
    process.env.LLM_MAX_RETRIES = '5';
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockImplementation(async () => jsonResponse(503, { error: 'busy' }));
    const service = new LlmClientService();

    await expect(service.generateJson('system', 'user')).resolves.toBeNull();
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('gives up after one retry on unparseable output', async () => {
    process.env.GEMINI_API_KEY = 'test-key';
    const fetchSpy = jest.spyOn(global, 'fetch').mockImplementation(async () =>
      jsonResponse(200, {
        candidates: [{ content: { parts: [{ text: 'not json at all' }] } }],
      }),
    );
    const service = new LlmClientService();

    await expect(service.generateJson('system', 'user')).resolves.toBeNull();
    expect(fetchSpy).toHaveBeenCalledTimes(2);
  });

  it('returns null without retrying non-retryable failures', async () => {
    process.env.GEMINI_API_KEY = 'test-key';
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockResolvedValue(jsonResponse(400, { error: 'bad request' }));
    const service = new LlmClientService();

    await expect(service.generateJson('system', 'user')).resolves.toBeNull();
    expect(fetchSpy).toHaveBeenCalledTimes(1);
  });

  it('reads embedding values from the provider response', async () => {
    process.env.GEMINI_API_KEY = 'test-key';
    jest
      .spyOn(global, 'fetch')
      .mockResolvedValue(
        jsonResponse(200, { embedding: { values: [0.1, 0.2, 0.3] } }),
      );
    const service = new LlmClientService();

    await expect(service.getEmbedding('Roku adds channels')).resolves.toEqual([
      0.1, 0.2, 0.3,
    ]);
    await expect(service.getEmbedding('   ')).resolves.toBeNull();
  });
});
