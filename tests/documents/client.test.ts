import {
  AnalysisError,
  CancelledError,
  NotFoundError,
  PollingTimeoutError,
  ProcessingError,
  TransportError,
} from '../../src/domain/errors';
import { DocumentApiClient, DocumentApiClientOptions, searchNeedsFallback } from '../../src/documents/client';
import { setLogHandler, resetLogHandler } from '../../src/logger';
import { FakeDocumentService, ManualClock, TEST_API_KEY, TEST_BASE_URL } from '../helpers/fake-document-service';

function makeClient(service: FakeDocumentService, clock: ManualClock, overrides: Partial<DocumentApiClientOptions> = {}) {
  return new DocumentApiClient({
    apiKey: TEST_API_KEY,
    baseUrl: TEST_BASE_URL,
    fetch: service.fetch,
    clock,
    ...overrides,
  });
}

/** A 200 response whose body stream breaks when read. */
class BrokenBodyResponse extends Response {
  constructor(private readonly beforeFailure?: () => void) {
    super('{}', { status: 200 });
  }

  override async text(): Promise<string> {
    this.beforeFailure?.();
    throw new TypeError('terminated');
  }
}

beforeAll(() => setLogHandler(() => undefined));
afterAll(() => resetLogHandler());

describe('DocumentApiClient files', () => {
  let service: FakeDocumentService;
  let clock: ManualClock;

  beforeEach(() => {
    service = new FakeDocumentService();
    clock = new ManualClock();
  });

  test('upload sends multipart form with bearer auth and parses the file', async () => {
    service.on('POST', '/api/v2/files', { status: 201, body: { id: 42, filename: 'a.pdf', status: 'uploading' } });
    const file = await makeClient(service, clock).upload('hello', 'a.pdf', { workspaceId: 3 });

    expect(file).toEqual({ id: 42, filename: 'a.pdf', status: 'uploading' });
    const [request] = service.calls('POST', '/api/v2/files');
    expect(request.authorization).toBe(`Bearer ${TEST_API_KEY}`);
    expect(request.body).toBeInstanceOf(FormData);
    if (request.body instanceof FormData) {
      expect(request.body.get('collection_type')).toBe('private');
      expect(request.body.get('workspace_id')).toBe('3');
    }
  });

  test('upload reads file_id and defaults the status', async () => {
    service.on('POST', '/api/v2/files', { status: 200, body: { file_id: 'f-1' } });
    const file = await makeClient(service, clock).upload(new Uint8Array([1, 2, 3]), 'b.bin');
    expect(file).toEqual({ id: 'f-1', status: 'uploading' });
  });

  test('upload failure is a TransportError with status and body excerpt', async () => {
    service.on('POST', '/api/v2/files', { status: 500, body: { detail: 'boom' } });
    const error = await makeClient(service, clock).upload('x', 'c.txt').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.statusCode).toBe(500);
      expect(error.message).toBe('File upload failed: HTTP 500: {"detail":"boom"}');
      expect(error.typedError.retryable).toBe(true);
    }
    expect(service.calls('POST', '/api/v2/files')).toHaveLength(1);
  });

  test('error messages never contain the API key', async () => {
    service.on('GET', '/api/v2/files/5', { status: 401, text: `invalid key ${TEST_API_KEY}` });
    const error = await makeClient(service, clock).getFile(5).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.message).toBe('Get file failed: HTTP 401: invalid key ***********-key');
      expect(error.typedError.suggestedFixes[0].type).toBe('CHECK_API_KEY');
    }
  });

  test('network failures become masked TransportErrors', async () => {
    const client = makeClient(service, clock, {
      fetch: async () => {
        throw new Error(`connect ECONNREFUSED (key ${TEST_API_KEY})`);
      },
    });
    const error = await client.getFile(5).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.message).toBe('Get file failed: connect ECONNREFUSED (key ***********-key)');
      expect(error.statusCode).toBeUndefined();
    }
  });

  test('getFile maps 404 to NotFoundError', async () => {
    service.on('GET', '/api/v2/files/9', { status: 404, body: { detail: 'gone' } });
    await expect(makeClient(service, clock).getFile(9)).rejects.toThrow(NotFoundError);
    await expect(makeClient(service, clock).getFile(9)).rejects.toThrow('File not found: 9');
  });

  test('getFile requests content when asked', async () => {
    service.on('GET', '/api/v2/files/12', {
      status: 200,
      body: { id: 12, status: 'embedded', content: 'Invoice total: 12', bytes: 2048, created_at: 1700000000 },
    });
    const file = await makeClient(service, clock).getFile(12, { includeContent: true });

    expect(file).toEqual({ id: 12, status: 'embedded', content: 'Invoice total: 12', bytes: 2048, createdAt: 1700000000 });
    expect(service.requests[0].query.get('include_content')).toBe('true');
  });

  test('getFileStatus is idempotent and never cached', async () => {
    service.on('GET', '/api/v2/files/7', { status: 200, body: { id: 7, status: 'processing' } });
    const client = makeClient(service, clock);

    expect(await client.getFileStatus(7)).toBe('processing');
    expect(await client.getFileStatus(7)).toBe('processing');
    expect(service.calls('GET', '/api/v2/files/7')).toHaveLength(2);
  });

  test('deleteFile returns true on 204 and false on 404', async () => {
    service.on('DELETE', '/api/v2/files/1', { status: 204 });
    service.on('DELETE', '/api/v2/files/2', { status: 404, body: { detail: 'not found' } });
    const client = makeClient(service, clock);

    expect(await client.deleteFile(1)).toBe(true);
    expect(await client.deleteFile(2)).toBe(false);
  });

  test('aborted signal refuses calls before any request', async () => {
    const controller = new AbortController();
    controller.abort();
    const client = makeClient(service, clock, { signal: controller.signal });

    await expect(client.getFile(1)).rejects.toThrow(CancelledError);
    expect(service.requests).toHaveLength(0);
  });

  test('a body that fails mid-read is a TransportError', async () => {
    const client = makeClient(service, clock, { fetch: async () => new BrokenBodyResponse() });

    const error = await client.getFile(1).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.message).toBe('Get file failed while reading the response: terminated');
    }
  });

  test('an abort while the body is read is a CancelledError', async () => {
    const controller = new AbortController();
    const client = makeClient(service, clock, {
      signal: controller.signal,
      fetch: async () => new BrokenBodyResponse(() => controller.abort()),
    });

    await expect(client.getFile(1)).rejects.toThrow(CancelledError);
  });
});

describe('DocumentApiClient.waitUntilReady', () => {
  let service: FakeDocumentService;
  let clock: ManualClock;

  beforeEach(() => {
    service = new FakeDocumentService();
    clock = new ManualClock();
  });

  test('polls until the file is embedded', async () => {
    service.on('GET', '/api/v2/files/3', [
      { status: 200, body: { id: 3, status: 'processing' } },
      { status: 200, body: { id: 3, status: 'embedding' } },
      { status: 200, body: { id: 3, status: 'embedded' } },
    ]);
    const status = await makeClient(service, clock).waitUntilReady(3, { maxWaitMs: 60_000, pollIntervalMs: 2_000 });

    expect(status).toBe('embedded');
    expect(service.calls('GET', '/api/v2/files/3')).toHaveLength(3);
    expect(clock.sleeps).toEqual([2_000, 2_000]);
  });

  test('a zero budget checks exactly once', async () => {
    service.on('GET', '/api/v2/files/3', { status: 200, body: { id: 3, status: 'processing' } });
    const error = await makeClient(service, clock)
      .waitUntilReady(3, { maxWaitMs: 0 })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PollingTimeoutError);
    expect(service.requests).toHaveLength(1);
    expect(clock.sleeps).toEqual([]);
  });

  test('the last sleep is cut to the remaining budget', async () => {
    service.on('GET', '/api/v2/files/3', { status: 200, body: { id: 3, status: 'processing' } });
    const error = await makeClient(service, clock)
      .waitUntilReady(3, { maxWaitMs: 5_000, pollIntervalMs: 2_000 })
      .catch((err: unknown) => err);

    expect(clock.sleeps).toEqual([2_000, 2_000, 1_000]);
    expect(error).toBeInstanceOf(PollingTimeoutError);
    if (error instanceof PollingTimeoutError) {
      expect(error.message).toBe('Timed out waiting for file 3 to become ready after 5000ms (4 status checks)');
    }
  });

  test('error status raises ProcessingError', async () => {
    service.on('GET', '/api/v2/files/4', [
      { status: 200, body: { id: 4, status: 'processing' } },
      { status: 200, body: { id: 4, status: 'error' } },
    ]);
    await expect(makeClient(service, clock).waitUntilReady(4)).rejects.toThrow(ProcessingError);
  });

  test('a zero interval is rejected before any request', async () => {
    await expect(makeClient(service, clock).waitUntilReady(4, { pollIntervalMs: 0 })).rejects.toThrow(RangeError);
    expect(service.requests).toHaveLength(0);
  });

  test('reports progress for every poll', async () => {
    service.on('GET', '/api/v2/files/8', [
      { status: 200, body: { id: 8, status: 'processing' } },
      { status: 200, body: { id: 8, status: 'ready' } },
    ]);
    const seen: string[] = [];
    const client = makeClient(service, clock, { onPollProgress: (p) => seen.push(`${p.pollCount}:${p.status}`) });
    await client.waitUntilReady(8, { pollIntervalMs: 1_000 });

    expect(seen).toEqual(['1:processing', '2:ready']);
  });
});

describe('DocumentApiClient.search', () => {
  let service: FakeDocumentService;
  let clock: ManualClock;

  beforeEach(() => {
    service = new FakeDocumentService();
    clock = new ManualClock();
  });

  function toolOf(body: unknown): unknown {
    return typeof body === 'object' && body !== null && 'tool' in body ? body.tool : undefined;
  }

  test('retries exactly once with the fallback tool when nothing was found', async () => {
    service.on('POST', '/api/v2/chat/document-search', (request) =>
      toolOf(request.body) === 'DocumentSearch'
        ? { status: 200, body: { answer: 'Information not found in the documents.', documents: [{ id: 1 }] } }
        : { status: 200, body: { answer: 'The total is 12 EUR.', documents: [{ id: 1 }] } },
    );
    const result = await makeClient(service, clock).search('What is the total?', { fileIds: [1] });

    const calls = service.calls('POST', '/api/v2/chat/document-search');
    expect(calls).toHaveLength(2);
    expect(calls.map((c) => toolOf(c.body))).toEqual(['DocumentSearch', 'VisionDocumentSearch']);
    expect(result.answer).toBe('The total is 12 EUR.');
    expect(result.tool).toBe('VisionDocumentSearch');
  });

  test('returns the fallback result even when it is also empty', async () => {
    service.on('POST', '/api/v2/chat/document-search', { status: 200, body: { answer: '', documents: [] } });
    const result = await makeClient(service, clock).search('anything');

    expect(service.requests).toHaveLength(2);
    expect(result).toEqual({ answer: '', documents: [], chunks: [], tool: 'VisionDocumentSearch' });
  });

  test('does not retry a clear answer', async () => {
    service.on('POST', '/api/v2/chat/document-search', {
      status: 200,
      body: { answer: 'Paris', documents: [{ id: 2 }], chunks: [{ text: 'Paris' }] },
    });
    const result = await makeClient(service, clock).search('Capital?');

    expect(service.requests).toHaveLength(1);
    expect(result.chunks).toEqual([{ text: 'Paris' }]);
  });

  test('does not retry when the fallback is disabled or already used', async () => {
    service.on('POST', '/api/v2/chat/document-search', { status: 200, body: { answer: 'N/A', documents: [] } });
    await makeClient(service, clock, { fallbackTool: null }).search('q');
    await makeClient(service, clock).search('q', { tool: 'VisionDocumentSearch' });

    expect(service.requests).toHaveLength(2);
  });

  test('searchNeedsFallback recognizes failure phrasing case-insensitively', () => {
    const docs = [{ id: 1 }];
    expect(searchNeedsFallback({ answer: 'I am Unable To locate it', documents: docs, chunks: [], tool: 't' })).toBe(true);
    expect(searchNeedsFallback({ answer: 'Found it', documents: [], chunks: [], tool: 't' })).toBe(true);
    expect(searchNeedsFallback({ answer: 'Found it', documents: docs, chunks: [], tool: 't' })).toBe(false);
  });
});

describe('DocumentApiClient analysis', () => {
  let service: FakeDocumentService;
  let clock: ManualClock;

  beforeEach(() => {
    service = new FakeDocumentService();
    clock = new ManualClock();
  });

  test('polls three times and returns the report', async () => {
    service.on('POST', '/api/v2/chat/document-analysis', { status: 202, body: { job_id: 'job-1' } });
    service.on('GET', '/api/v2/chat/document-analysis/job-1', [
      { status: 404, body: {} },
      { status: 200, body: { status: 'PROCESSING' } },
      { status: 200, body: { status: 'Completed', result: 'X' } },
    ]);
    const report = await makeClient(service, clock).analyzeWithPolling('Summarize', [1, 2]);

    expect(report).toBe('X');
    expect(service.calls('GET', '/api/v2/chat/document-analysis/job-1')).toHaveLength(3);
    expect(clock.sleeps).toEqual([5_000, 5_000]);
    expect(service.calls('POST', '/api/v2/chat/document-analysis')[0].body).toEqual({
      query: 'Summarize',
      document_ids: [1, 2],
      private: true,
    });
  });

  test('accepts a numeric chat_response_id and detailed_analysis', async () => {
    service.on('POST', '/api/v2/chat/document-analysis', { status: 200, body: { chat_response_id: 77 } });
    service.on('GET', '/api/v2/chat/document-analysis/77', {
      status: 200,
      body: { status: 'finished', detailed_analysis: 'Report' },
    });
    expect(await makeClient(service, clock).analyzeWithPolling('q', ['a'])).toBe('Report');
  });

  test('failed jobs raise AnalysisError', async () => {
    service.on('POST', '/api/v2/chat/document-analysis', { status: 200, body: { job_id: 'job-2' } });
    service.on('GET', '/api/v2/chat/document-analysis/job-2', { status: 200, body: { status: 'failed' } });
    await expect(makeClient(service, clock).analyzeWithPolling('q', [1])).rejects.toThrow(
      'Analysis job-2 failed with status "failed"',
    );
  });

  test('missing job id raises AnalysisError', async () => {
    service.on('POST', '/api/v2/chat/document-analysis', { status: 200, body: {} });
    await expect(makeClient(service, clock).startAnalysis('q', [1])).rejects.toThrow(AnalysisError);
  });

  test('unknown statuses keep polling until the deadline', async () => {
    service.on('POST', '/api/v2/chat/document-analysis', { status: 200, body: { job_id: 'job-3' } });
    service.on('GET', '/api/v2/chat/document-analysis/job-3', { status: 200, body: { status: 'thinking' } });
    const client = makeClient(service, clock, { analysisPolling: { maxWaitMs: 10_000, pollIntervalMs: 5_000 } });

    await expect(client.analyzeWithPolling('q', [1])).rejects.toThrow(PollingTimeoutError);
    expect(service.calls('GET', '/api/v2/chat/document-analysis/job-3')).toHaveLength(3);
  });
});

describe('DocumentApiClient chat and chunks', () => {
  let service: FakeDocumentService;
  let clock: ManualClock;

  beforeEach(() => {
    service = new FakeDocumentService();
    clock = new ManualClock();
  });

  test('chatCompletion sends system and user messages with the default model', async () => {
    service.on('POST', '/api/v2/chat/completions', {
      status: 200,
      body: { choices: [{ message: { role: 'assistant', content: 'Hello' } }] },
    });
    const text = await makeClient(service, clock).chatCompletion('Hi', { systemPrompt: 'Be brief' });

    expect(text).toBe('Hello');
    expect(service.requests[0].body).toEqual({
      model: 'alfred-4.2',
      messages: [
        { role: 'system', content: 'Be brief' },
        { role: 'user', content: 'Hi' },
      ],
    });
  });

  test('chatCompletion without content is a TransportError', async () => {
    service.on('POST', '/api/v2/chat/completions', { status: 200, body: { choices: [] } });
    await expect(makeClient(service, clock).chatCompletion('Hi')).rejects.toThrow(
      'Chat completion response had no message content',
    );
  });

  test('askQuestion and chunk endpoints parse their payloads', async () => {
    service.on('POST', '/api/v2/files/5/ask-question', {
      status: 200,
      body: { response: 'Yes', chunks: [{ id: 'c1' }, 'junk'] },
    });
    service.on('GET', '/api/v2/files/5/chunks', { status: 200, body: { chunks: [{ id: 'c1' }, { id: 'c2' }] } });
    service.on('POST', '/api/v2/filter/chunks', { status: 200, body: { chunks: [{ id: 'c2' }] } });
    service.on('POST', '/api/v2/query', { status: 200, body: { query: 'rewritten', chunks: [] } });
    const client = makeClient(service, clock);

    expect(await client.askQuestion(5, 'Signed?')).toEqual({ response: 'Yes', chunks: [{ id: 'c1' }] });
    expect(await client.getFileChunks(5)).toEqual({ chunks: [{ id: 'c1' }, { id: 'c2' }] });
    expect(await client.filterChunks('dates', ['c1', 'c2'], { n: 1 })).toEqual({ query: 'dates', chunks: [{ id: 'c2' }] });
    expect(await client.queryChunks('dates')).toEqual({ query: 'rewritten', chunks: [] });
    expect(service.calls('POST', '/api/v2/filter/chunks')[0].body).toEqual({ query: 'dates', chunk_ids: ['c1', 'c2'], n: 1 });
  });
});
