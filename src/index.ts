export { loadEnv, type Env } from './config/env';
export {
  preprocessImage,
  preprocessOptionsFromEnv,
  DEFAULT_FILTERS,
  type ImageInput,
  type PreprocessOptions,
  type PreprocessedImage,
} from './lib/image/preprocess';
export { createOcrEngine, ocrConfigFromEnv, type EngineMode, type OcrConfig, type OcrEngine, type PageSegMode } from './lib/ocr/engine';
export { extractNumbers, normalizeOcrText } from './lib/ocr/numbers';
export { ImageDecodeError, OcrEngineError, ShotProcessingError } from './lib/shots/errors';
export { DISPLAY_LAYOUTS, getLayout, parseDisplayType } from './lib/shots/layouts';
export { mapToLayout, scoreConfidence } from './lib/shots/mapper';
export { buildReading, processShotImage, type ShotPipelineDeps } from './lib/shots/pipeline';
export { applyShotResult, emptyShotRecord } from './lib/shots/record';
export type {
  DisplayLayout,
  DisplayType,
  LogEntry,
  ShotErrorCode,
  ShotField,
  ShotFields,
  ShotMetric,
  ShotReading,
  ShotRecord,
  ShotResult,
} from './lib/shots/model';
