import { Injectable, Logger } from '@nestjs/common';

import { HttpClientService, UpstreamHttpError } from '../http-client/http-client.service';
import {
  BatchExtractResult,
  BatchImage,
  BatchItemResult,
  EngineResult,
  EngineStatus,
  ExtractTextOptions,
  ExtractTextRequest,
  UnderstandRequest,
} from './types';

const STATUS_TIMEOUT_MS = 5000;

/**
 * The OCR and vision-language engines live behind one HTTP origin. This
 * service only moves payloads; it does not interpret them.
 */
@Injectable()
export class OcrEngineService {
  private readonly logger = new Logger(OcrEngineService.name);

  constructor(private readonly httpClient: HttpClientService) {}

  async extract(request: ExtractTextRequest): Promise<EngineResult> {
    return this.httpClient.post<EngineResult>('/extract', request);
  }

  /** One image at a time; a failed image is reported in its slot and the rest continue. */
  async extractBatch(
    images: BatchImage[],
    options: ExtractTextOptions,
  ): Promise<BatchExtractResult> {
    const startedAt = Date.now();
    const results: BatchItemResult[] = [];

    for (const { filename, image } of images) {
      try {
        const result = await this.extract({ ...options, image });
        results.push({ filename, success: true, result });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Batch item ${filename} failed: ${reason}`);
        results.push({ filename, success: false, error: 'OCR engine request failed' });
      }
    }

    const successful = results.filter((item) => item.success).length;
    return {
      totalImages: images.length,
      successful,
      failed: results.length - successful,
      processingTimeMs: Date.now() - startedAt,
      results,
    };
  }

  async understand(request: UnderstandRequest): Promise<EngineResult> {
    return this.httpClient.post<EngineResult>('/understand', request);
  }

  async languages(): Promise<string[]> {
    const result = await this.httpClient.get<{ languages?: unknown }>('/languages');
    const languages = Array.isArray(result?.languages) ? result.languages : [];
    return languages.filter((value): value is string => typeof value === 'string');
  }

  async status(): Promise<EngineStatus> {
    try {
      await this.httpClient.get<unknown>('/health', { timeoutMs: STATUS_TIMEOUT_MS, retries: 0 });
      return { status: 'healthy' };
    } catch (error) {
      if (error instanceof UpstreamHttpError) {
        return { status: 'unhealthy', error: `Status code: ${error.status}` };
      }
      return { status: 'offline', error: 'Engine unreachable' };
    }
  }
}
