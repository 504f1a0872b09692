export type OcrOutputFormat = 'text' | 'json' | 'hocr';

export type ExtractTextOptions = {
  language: string;
  psm: number;
  oem: number;
  preprocess: boolean;
  outputFormat: OcrOutputFormat;
};

export type ExtractTextRequest = ExtractTextOptions & {
  image: string;
};

export type BatchImage = {
  filename: string;
  image: string;
};

export type BatchItemResult = {
  filename: string;
  success: boolean;
  result?: EngineResult;
  error?: string;
};

export type BatchExtractResult = {
  totalImages: number;
  successful: number;
  failed: number;
  processingTimeMs: number;
  results: BatchItemResult[];
};

export type UnderstandRequest = {
  image: string;
  prompt: string;
  temperature: number;
  maxTokens?: number;
};

export type PromptPreset = {
  description: string;
  prompt: string;
};

export type EngineStatus = {
  status: 'healthy' | 'unhealthy' | 'offline';
  error?: string;
};

/** Engine result; structured fields vary by output format and engine. */
export type EngineResult = Record<string, unknown>;
