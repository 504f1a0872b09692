import {
  BadGatewayException,
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  UseGuards,
} from '@nestjs/common';

import { OcrAccessGuard } from '../api-keys/ocr-access.guard';
import { OcrEngineService } from './ocr-engine.service';
import { DEFAULT_PRESET, PROMPT_PRESETS } from './prompt-presets';
import {
  BatchExtractResult,
  BatchImage,
  EngineResult,
  EngineStatus,
  ExtractTextOptions,
  ExtractTextRequest,
  OcrOutputFormat,
  UnderstandRequest,
} from './types';

type ExtractBody = {
  image?: unknown;
  language?: unknown;
  psm?: unknown;
  oem?: unknown;
  preprocess?: unknown;
  outputFormat?: unknown;
};

type BatchBody = Omit<ExtractBody, 'image' | 'outputFormat'> & {
  images?: unknown;
};

type UnderstandBody = {
  image?: unknown;
  preset?: unknown;
  prompt?: unknown;
  temperature?: unknown;
  maxTokens?: unknown;
};

const OUTPUT_FORMATS: OcrOutputFormat[] = ['text', 'json', 'hocr'];
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const LANGUAGE_PATTERN = /^[a-z_]{3,}(\+[a-z_]{3,})*$/;
const MAX_PROMPT_LENGTH = 4000;
const MAX_BATCH_IMAGES = 10;
const MAX_FILENAME_LENGTH = 255;
const DEFAULT_TEMPERATURE = 0.7;

@Controller('ocr')
@UseGuards(OcrAccessGuard)
export class OcrController {
  private readonly logger = new Logger(OcrController.name);

  constructor(private readonly engine: OcrEngineService) {}

  @Post('extract')
  @HttpCode(HttpStatus.OK)
  async extract(@Body() body: ExtractBody): Promise<EngineResult> {
    const request = this.parseExtractBody(body);
    return this.callEngine('extract', () => this.engine.extract(request));
  }

  /** Up to ten images under one admission; always plain text output. */
  @Post('batch')
  @HttpCode(HttpStatus.OK)
  async batch(@Body() body: BatchBody): Promise<BatchExtractResult> {
    const images = this.parseBatchImages(body?.images);
    const options: ExtractTextOptions = {
      ...this.parseExtractOptions(body),
      outputFormat: 'text',
    };
    return this.callEngine('batch', () => this.engine.extractBatch(images, options));
  }

  @Get('understand/status')
  async understandStatus(): Promise<EngineStatus> {
    return this.engine.status();
  }

  @Get('understand/presets')
  presets(): { presets: string[]; descriptions: Record<string, string> } {
    const entries = Object.entries(PROMPT_PRESETS);
    return {
      presets: entries.map(([name]) => name),
      descriptions: Object.fromEntries(
        entries.map(([name, preset]) => [name, preset.description]),
      ),
    };
  }

  @Post('understand')
  @HttpCode(HttpStatus.OK)
  async understand(@Body() body: UnderstandBody): Promise<EngineResult> {
    const request = this.parseUnderstandBody(body);
    return this.callEngine('understand', () => this.engine.understand(request));
  }

  @Get('languages')
  async languages(): Promise<{ languages: string[] }> {
    const languages = await this.callEngine('languages', () => this.engine.languages());
    return { languages };
  }

  private async callEngine<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      this.logger.warn(
        `Engine ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new BadGatewayException({ message: 'OCR engine request failed' });
    }
  }

  private parseExtractBody(body: ExtractBody): ExtractTextRequest {
    return {
      image: this.parseImage(body?.image),
      ...this.parseExtractOptions(body),
      outputFormat: this.parseOutputFormat(body?.outputFormat),
    };
  }

  private parseExtractOptions(
    body: Pick<ExtractBody, 'language' | 'psm' | 'oem' | 'preprocess'>,
  ): Omit<ExtractTextOptions, 'outputFormat'> {
    return {
      language: this.parseLanguage(body?.language),
      psm: this.optionalInteger(body?.psm, 'psm', 0, 13) ?? 3,
      oem: this.optionalInteger(body?.oem, 'oem', 0, 3) ?? 3,
      preprocess: this.optionalBoolean(body?.preprocess, 'preprocess') ?? true,
    };
  }

  private parseBatchImages(value: unknown): BatchImage[] {
    if (!Array.isArray(value) || value.length === 0) {
      throw new BadRequestException('images must be a non-empty array');
    }
    if (value.length > MAX_BATCH_IMAGES) {
      throw new BadRequestException(`Maximum ${MAX_BATCH_IMAGES} images per batch request`);
    }

    return value.map((item: unknown, index) => {
      if (typeof item !== 'object' || item === null) {
        throw new BadRequestException(`images[${index}] must be an object with an image field`);
      }
      const image = 'image' in item ? item.image : undefined;
      const filename = 'filename' in item ? item.filename : undefined;
      if (filename !== undefined && !this.isValidFilename(filename)) {
        throw new BadRequestException(
          `images[${index}].filename must be 1-${MAX_FILENAME_LENGTH} characters`,
        );
      }
      return {
        filename: typeof filename === 'string' ? filename : `image-${index + 1}`,
        image: this.parseImage(image),
      };
    });
  }

  private isValidFilename(value: unknown): value is string {
    return typeof value === 'string' && value.length > 0 && value.length <= MAX_FILENAME_LENGTH;
  }

  private parseUnderstandBody(body: UnderstandBody): UnderstandRequest {
    const image = this.parseImage(body?.image);
    const request: UnderstandRequest = {
      image,
      // A custom prompt wins over a preset.
      prompt: this.parsePrompt(body?.prompt) ?? this.presetPrompt(body?.preset),
      temperature: this.parseTemperature(body?.temperature),
    };

    const maxTokens = this.optionalInteger(body?.maxTokens, 'maxTokens', 1, 4096);
    if (maxTokens !== undefined) {
      request.maxTokens = maxTokens;
    }

    return request;
  }

  private parsePrompt(value: unknown): string | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string' || value.trim().length === 0) {
      throw new BadRequestException('prompt must be a non-empty string');
    }
    if (value.length > MAX_PROMPT_LENGTH) {
      throw new BadRequestException(`prompt must be at most ${MAX_PROMPT_LENGTH} characters`);
    }
    return value.trim();
  }

  private presetPrompt(value: unknown): string {
    const name = value === undefined || value === null ? DEFAULT_PRESET : value;
    const preset =
      typeof name === 'string' && Object.hasOwn(PROMPT_PRESETS, name)
        ? PROMPT_PRESETS[name]
        : undefined;
    if (!preset) {
      throw new BadRequestException(
        `preset must be one of ${Object.keys(PROMPT_PRESETS).join(', ')}`,
      );
    }
    return preset.prompt;
  }

  private parseTemperature(value: unknown): number {
    if (value === undefined || value === null) {
      return DEFAULT_TEMPERATURE;
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0 || value > 1) {
      throw new BadRequestException('temperature must be a number between 0 and 1');
    }
    return value;
  }

  private parseImage(value: unknown): string {
    if (typeof value !== 'string' || value.length === 0) {
      throw new BadRequestException('image is required (base64-encoded)');
    }

    const normalized = value.replace(/\s+/g, '');
    if (normalized.length % 4 !== 0 || !BASE64_PATTERN.test(normalized)) {
      throw new BadRequestException('image must be base64-encoded');
    }

    return normalized;
  }

  private parseLanguage(value: unknown): string {
    if (value === undefined || value === null) {
      return 'eng';
    }

    if (typeof value !== 'string' || !LANGUAGE_PATTERN.test(value)) {
      throw new BadRequestException('language must be a language code such as eng or eng+fra');
    }

    return value;
  }

  private parseOutputFormat(value: unknown): OcrOutputFormat {
    if (value === undefined || value === null) {
      return 'text';
    }

    const match = OUTPUT_FORMATS.find((format) => format === value);
    if (!match) {
      throw new BadRequestException(`outputFormat must be one of ${OUTPUT_FORMATS.join(', ')}`);
    }

    return match;
  }

  private optionalInteger(
    value: unknown,
    fieldName: string,
    min: number,
    max: number,
  ): number | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
      throw new BadRequestException(`${fieldName} must be an integer between ${min} and ${max}`);
    }

    return value;
  }

  private optionalBoolean(value: unknown, fieldName: string): boolean | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }

    if (typeof value !== 'boolean') {
      throw new BadRequestException(`${fieldName} must be a boolean`);
    }

    return value;
  }
}
