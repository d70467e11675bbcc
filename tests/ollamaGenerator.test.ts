import { Response } from 'node-fetch';
import { z } from 'zod';
import { defineTool } from '../src/application/tools/Tool.js';
import { createMessage, messageText } from '../src/core/entities/Message.js';
import { GeneratorError, RateLimitError } from '../src/core/errors/WorkflowErrors.js';
import { FetchLike, OllamaGenerator } from '../src/infrastructure/generators/OllamaGenerator.js';
import { RateLimiter } from '../src/infrastructure/queue/RateLimiter.js';

interface RecordedRequest {
  url: string;
  body: unknown;
}

/**
 * fetch stand-in that answers with the queued responses in order
 */
function fakeFetch(...responses: Array<{ status: number; body: unknown }>) {
  const requests: RecordedRequest[] = [];
  const fetch: FetchLike = async (url, init) => {
    requests.push({ url, body: JSON.parse(String(init?.body)) });
    const next = responses[Math.min(requests.length - 1, responses.length - 1)];
    return new Response(JSON.stringify(next.body), { status: next.status });
  };
  return { fetch, requests };
}

const okBody = (content: string, extra: Record<string, unknown> = {}) => ({
  model: 'test-model',
  message: { role: 'assistant', content, ...extra },
  done: true,
  done_reason: 'stop',
});

const RequestBodySchema = z.object({ messages: z.array(z.object({ content: z.string() })) });

/**
 * fetch stand-in that echoes the last message after `delayFor(text)` ms
 * and tracks how many requests are in flight
 */
function echoFetch(delayFor: (text: string) => number) {
  const stats = { requests: 0, inFlight: 0, maxInFlight: 0 };
  const fetch: FetchLike = async (_url, init) => {
    const { messages } = RequestBodySchema.parse(JSON.parse(String(init?.body)));
    const text = messages[messages.length - 1].content;
    stats.requests++;
    stats.inFlight++;
    stats.maxInFlight = Math.max(stats.maxInFlight, stats.inFlight);
    await new Promise((resolve) => setTimeout(resolve, delayFor(text)));
    stats.inFlight--;
    return new Response(JSON.stringify(okBody(text)), { status: 200 });
  };
  return { fetch, stats };
}

describe('OllamaGenerator', () => {
  const user = [createMessage('user', 'Hello')];

  it('should post the conversation to /api/chat', async () => {
    const { fetch, requests } = fakeFetch({ status: 200, body: okBody('Hi there') });
    const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test/', model: 'test-model', fetch });

    const response = await generator.complete(
      [createMessage('developer', 'Be brief'), createMessage('user', 'Hello')],
      { temperature: 0.2, maxTokens: 64 }
    );

    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('http://ollama.test/api/chat');
    expect(requests[0].body).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'Hello' },
      ],
      stream: false,
      options: { temperature: 0.2, num_predict: 64 },
    });
    expect(messageText(response.message)).toBe('Hi there');
    expect(response.message.role).toBe('assistant');
    expect(response.finishReason).toBe('stop');
  });

  it('should send tools, output format and keep-alive', async () => {
    const { fetch, requests } = fakeFetch({ status: 200, body: okBody('{}') });
    const echo = defineTool({
      name: 'echo',
      description: 'Echo the text back',
      parameters: z.object({ text: z.string() }),
      run: ({ text }) => text,
    });
    const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', keepAlive: '5m', fetch });

    await generator.complete(user, { tools: [echo], responseFormat: z.object({ answer: z.number() }) });

    expect(requests[0].body).toMatchObject({
      tools: [echo.toFunctionDefinition()],
      format: { type: 'object', properties: { answer: { type: 'number' } }, required: ['answer'] },
      keep_alive: '5m',
    });
  });

  it('should convert tool calls into requests with ids and JSON arguments', async () => {
    const { fetch } = fakeFetch({
      status: 200,
      body: okBody('', { tool_calls: [{ function: { name: 'echo', arguments: { text: 'x' } } }] }),
    });
    const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', fetch });

    const response = await generator.complete(user);

    expect(response.finishReason).toBe('tool_calls');
    expect(response.message.toolCalls).toHaveLength(1);
    expect(response.message.toolCalls?.[0]).toMatchObject({
      type: 'function',
      function: { name: 'echo', arguments: '{"text":"x"}' },
    });
    expect(response.message.toolCalls?.[0].id).toMatch(/^call_/);
  });

  it('should send earlier tool calls and results back in Ollama form', async () => {
    const { fetch, requests } = fakeFetch({ status: 200, body: okBody('done') });
    const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', fetch });

    await generator.complete([
      createMessage('assistant', null, {
        toolCalls: [{ id: 'c1', type: 'function', function: { name: 'echo', arguments: '{"text":"x"}' } }],
      }),
      createMessage('tool', '"x"', { toolCallId: 'c1' }),
    ]);

    expect(requests[0].body).toMatchObject({
      messages: [
        { role: 'assistant', content: '', tool_calls: [{ function: { name: 'echo', arguments: { text: 'x' } } }] },
        { role: 'tool', content: '"x"', tool_name: 'echo' },
      ],
    });
  });

  it('should keep thinking apart from the answer', async () => {
    const { fetch } = fakeFetch({ status: 200, body: okBody('42', { thinking: 'six times seven' }) });
    const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', fetch });

    const response = await generator.complete(user);

    expect(response.message.content).toEqual([
      { type: 'thinking', thinking: 'six times seven' },
      { type: 'text', text: '42' },
    ]);
    expect(messageText(response.message)).toBe('42');
  });

  it('should report the length finish reason', async () => {
    const { fetch } = fakeFetch({ status: 200, body: { ...okBody('cut'), done_reason: 'length' } });
    const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', fetch });

    await expect(generator.complete(user)).resolves.toMatchObject({ finishReason: 'length' });
  });

  describe('Errors', () => {
    it('should raise RateLimitError on HTTP 429', async () => {
      const { fetch } = fakeFetch({ status: 429, body: { error: 'slow down' } });
      const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', fetch });

      await expect(generator.complete(user)).rejects.toThrow(RateLimitError);
    });

    it('should raise GeneratorError with the status on other failures', async () => {
      const { fetch } = fakeFetch({ status: 404, body: { error: 'model not found' } });
      const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', fetch });

      await expect(generator.complete(user)).rejects.toMatchObject({
        name: 'GeneratorError',
        status: 404,
      });
    });

    it('should reject responses of an unexpected shape', async () => {
      const { fetch } = fakeFetch({ status: 200, body: { unexpected: true } });
      const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', fetch });

      await expect(generator.complete(user)).rejects.toThrow(GeneratorError);
    });
  });

  describe('Retries and admission control', () => {
    const retry = { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 5, multiplier: 2, timeoutMs: 1000 };

    it('should retry server errors', async () => {
      const { fetch, requests } = fakeFetch(
        { status: 503, body: { error: 'loading model' } },
        { status: 200, body: okBody('ready') }
      );
      const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', fetch, retry });

      const response = await generator.complete(user);

      expect(messageText(response.message)).toBe('ready');
      expect(requests).toHaveLength(2);
    });

    it('should not retry client errors', async () => {
      const { fetch, requests } = fakeFetch({ status: 400, body: { error: 'bad request' } });
      const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', fetch, retry });

      await expect(generator.complete(user)).rejects.toThrow(GeneratorError);
      expect(requests).toHaveLength(1);
    });

    it('should pass every attempt through the rate limiter', async () => {
      const limiter = new RateLimiter({ rpm: 600000, burstSize: 1, cooldownBaseMs: 1 });
      const { fetch, requests } = fakeFetch(
        { status: 429, body: { error: 'slow down' } },
        { status: 200, body: okBody('ok') }
      );
      const generator = new OllamaGenerator({
        apiUrl: 'http://ollama.test',
        model: 'test-model',
        fetch,
        retry,
        rateLimiter: limiter,
      });

      await expect(generator.complete(user)).resolves.toMatchObject({ finishReason: 'stop' });
      expect(requests).toHaveLength(2);
      expect(limiter.getStats()).toMatchObject({ inUse: 0, cooldownCount: 0 });
    });

    it('should time each attempt only once it holds a slot', async () => {
      const limiter = new RateLimiter({ rpm: 600000, burstSize: 1 });
      const { fetch, stats } = echoFetch(() => 40);
      const generator = new OllamaGenerator({
        apiUrl: 'http://ollama.test',
        model: 'test-model',
        fetch,
        rateLimiter: limiter,
        retry: { ...retry, maxAttempts: 2, timeoutMs: 100 },
      });

      const responses = await Promise.all(
        ['q1', 'q2', 'q3'].map((text) => generator.complete([createMessage('user', text)]))
      );

      expect(responses.map((response) => messageText(response.message))).toEqual(['q1', 'q2', 'q3']);
      expect(stats.requests).toBe(3);
      expect(stats.maxInFlight).toBe(1);
    });

    it('should still time out an attempt that holds its slot too long', async () => {
      const { fetch, stats } = echoFetch(() => 100);
      const generator = new OllamaGenerator({
        apiUrl: 'http://ollama.test',
        model: 'test-model',
        fetch,
        rateLimiter: new RateLimiter({ rpm: 600000, burstSize: 1 }),
        retry: { ...retry, maxAttempts: 1, timeoutMs: 20 },
      });

      await expect(generator.complete(user)).rejects.toThrow('Timeout after 20ms');
      expect(stats.requests).toBe(1);
    });

    it('should derive generators without losing settings', async () => {
      const { fetch, requests } = fakeFetch({ status: 200, body: okBody('ok') });
      const base = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', fetch });

      const tuned = base.withParams({ temperature: 0.5 });
      await tuned.complete(user, { maxTokens: 10 });

      expect(tuned).not.toBe(base);
      expect(base.params).toEqual({});
      expect(requests[0].body).toMatchObject({ model: 'test-model', options: { temperature: 0.5, num_predict: 10 } });
    });
  });

  describe('batchComplete', () => {
    it('should complete conversations concurrently and return them in input order', async () => {
      const limiter = new RateLimiter({ rpm: 600000, burstSize: 2 });
      const acquire = jest.spyOn(limiter, 'acquire');
      const { fetch, stats } = echoFetch((text) => (text === 'slow' ? 40 : 5));
      const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', fetch, rateLimiter: limiter });

      const responses = await generator.batchComplete(
        ['slow', 'a', 'b'].map((text) => [createMessage('user', text)])
      );

      expect(responses.map((response) => messageText(response.message))).toEqual(['slow', 'a', 'b']);
      expect(stats.maxInFlight).toBe(2);
      expect(acquire).toHaveBeenCalledTimes(3);
      expect(limiter.getStats()).toMatchObject({ inUse: 0, waiting: 0 });
    });

    it('should apply the call params to every conversation', async () => {
      const { fetch, requests } = fakeFetch({ status: 200, body: okBody('ok') });
      const generator = new OllamaGenerator({ apiUrl: 'http://ollama.test', model: 'test-model', fetch });

      await generator.batchComplete([user, user], { temperature: 0 });

      expect(requests).toHaveLength(2);
      expect(requests.map((request) => request.body)).toEqual([
        expect.objectContaining({ options: { temperature: 0 } }),
        expect.objectContaining({ options: { temperature: 0 } }),
      ]);
    });
  });
});
