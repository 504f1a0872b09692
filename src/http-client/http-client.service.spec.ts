import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { fetch } from 'undici';

import { HttpClientService, UpstreamHttpError } from './http-client.service';

const closeMock = jest.fn().mockResolvedValue(undefined);

jest.mock('undici', () => ({
  fetch: jest.fn(),
  Agent: jest.fn().mockImplementation(() => ({
    close: closeMock,
  })),
}));

const mockedFetch = fetch as jest.Mock;

const jsonResponse = (status: number, body: unknown) => ({
  ok: status >= 200 && status < 300,
  status,
  headers: {
    get: (name: string) => (name === 'content-type' ? 'application/json' : null),
  },
  text: async () => JSON.stringify(body),
});

describe('HttpClientService', () => {
  let service: HttpClientService;

  beforeEach(async () => {
    mockedFetch.mockReset();
    closeMock.mockClear();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HttpClientService,
        {
          provide: ConfigService,
          useValue: {
            get: (key: string) => {
              switch (key) {
                case 'OCR_ENGINE_BASE_URL':
                  return 'https://engine.example.com/';
                case 'OCR_ENGINE_TIMEOUT':
                  return 5000;
                case 'OCR_ENGINE_RETRIES':
                  return 1;
                default:
                  return undefined;
              }
            },
          },
        },
      ],
    }).compile();

    service = module.get<HttpClientService>(HttpClientService);
  });

  it('retries failed GET requests', async () => {
    mockedFetch
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce(jsonResponse(200, { languages: ['eng'] }));

    await expect(service.get('/languages')).resolves.toEqual({ languages: ['eng'] });
    expect(mockedFetch).toHaveBeenCalledTimes(2);
    expect(mockedFetch.mock.calls[0]?.[0]).toBe('https://engine.example.com/languages');
  });

  it('does not retry POST requests', async () => {
    mockedFetch.mockRejectedValueOnce(new Error('boom'));

    await expect(service.post('/extract', { image: 'aGVsbG8=' }, { retries: 2 })).rejects.toThrow(
      'boom',
    );
    expect(mockedFetch).toHaveBeenCalledTimes(1);
  });

  it('sends JSON bodies with a content type', async () => {
    mockedFetch.mockResolvedValueOnce(jsonResponse(200, { text: 'hello' }));

    await expect(service.post('/extract', { image: 'aGVsbG8=' })).resolves.toEqual({
      text: 'hello',
    });

    const init = mockedFetch.mock.calls[0]?.[1];
    expect(init.method).toBe('POST');
    expect(init.body).toBe(JSON.stringify({ image: 'aGVsbG8=' }));
    expect(init.headers).toEqual({ 'content-type': 'application/json' });
  });

  it('does not retry 4xx responses and surfaces the status', async () => {
    mockedFetch.mockResolvedValueOnce(jsonResponse(422, { error: 'bad image' }));

    const error = await service.get('/languages').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpstreamHttpError);
    expect((error as UpstreamHttpError).status).toBe(422);
    expect((error as UpstreamHttpError).responseBody).toEqual({ error: 'bad image' });
    expect(mockedFetch).toHaveBeenCalledTimes(1);
  });

  it('retries 5xx responses for GET requests', async () => {
    mockedFetch
      .mockResolvedValueOnce(jsonResponse(503, { error: 'busy' }))
      .mockResolvedValueOnce(jsonResponse(200, { ok: true }));

    await expect(service.get('/health')).resolves.toEqual({ ok: true });
    expect(mockedFetch).toHaveBeenCalledTimes(2);
  });

  it('times out when request exceeds timeout', async () => {
    jest.useFakeTimers();
    mockedFetch.mockImplementation(() => new Promise(() => undefined));

    const promise = service.get('/timeout', { timeoutMs: 10, retries: 0 });
    const expectation = expect(promise).rejects.toThrow('Request timed out');

    await jest.advanceTimersByTimeAsync(20);
    await expectation;
    jest.useRealTimers();
  });

  it('returns text response for non-json content', async () => {
    mockedFetch.mockResolvedValueOnce({
      ok: true,
      status: 200,
      headers: {
        get: (name: string) => (name === 'content-type' ? 'text/plain' : null),
      },
      text: async () => 'plain-text',
    });

    await expect(service.get('/text')).resolves.toEqual('plain-text');
  });

  it('rejects absolute paths before calling fetch', async () => {
    await expect(service.get('https://elsewhere.example.com/steal')).rejects.toThrow(
      'Absolute engine URLs are not allowed',
    );
    expect(mockedFetch).not.toHaveBeenCalled();
  });

  it('throws when base URL is missing', async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HttpClientService,
        {
          provide: ConfigService,
          useValue: {
            get: () => '',
          },
        },
      ],
    }).compile();

    const localService = module.get<HttpClientService>(HttpClientService);

    await expect(localService.get('/missing')).rejects.toThrow(
      'OCR engine base URL is not configured properly',
    );
  });

  it('aborts requests when the signal is cancelled', async () => {
    mockedFetch.mockImplementation((_, init) => {
      return new Promise((_, reject) => {
        init.signal.addEventListener('abort', () => reject(new Error('Aborted')));
      });
    });

    const controller = new AbortController();
    const promise = service.get('/abort', { signal: controller.signal, retries: 0 });

    controller.abort();

    await expect(promise).rejects.toThrow('Aborted');
  });

  it('closes the dispatcher on shutdown', async () => {
    await service.onModuleDestroy();

    expect(closeMock).toHaveBeenCalledTimes(1);
  });
});
