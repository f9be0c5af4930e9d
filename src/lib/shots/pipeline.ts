import { preprocessImage, type ImageInput, type PreprocessedImage } from '../image/preprocess';
import { createOcrEngine, type OcrEngine } from '../ocr/engine';
import { extractNumbers } from '../ocr/numbers';
import { ShotProcessingError } from './errors';
import { getLayout } from './layouts';
import { countPopulated, mapToLayout, scoreConfidence } from './mapper';
import type { DisplayType, LogEntry, LogLevel, ShotReading, ShotResult } from './model';

export interface ShotPipelineDeps {
  preprocess: (input: ImageInput) => Promise<PreprocessedImage>;
  engine: OcrEngine;
  now: () => Date;
}

export function defaultDeps(): ShotPipelineDeps {
  return {
    preprocess: (input) => preprocessImage(input),
    engine: createOcrEngine(),
    now: () => new Date(),
  };
}

function createLog(now: () => Date) {
  const logs: LogEntry[] = [];
  const log = (lvl: LogLevel, msg: string) => {
    logs.push({ t: now().toISOString(), lvl, msg });
  };
  return { logs, log };
}

export function buildReading(displayType: DisplayType, rawText: string): ShotReading {
  const layout = getLayout(displayType);
  const fields = mapToLayout(extractNumbers(rawText), layout);
  const confidence = scoreConfidence(countPopulated(fields), layout.fields.length);
  return Object.freeze({
    displayType,
    fields: Object.freeze(fields),
    confidence,
    rawText,
    error: null,
  });
}

/**
 * Runs one image through preprocess -> OCR -> extraction -> mapping.
 * Decode and engine failures come back as `{ ok: false }`; anything else
 * is a bug and is rethrown.
 */
export async function processShotImage(
  input: ImageInput,
  displayType: DisplayType,
  deps: ShotPipelineDeps = defaultDeps()
): Promise<ShotResult> {
  const { logs, log } = createLog(deps.now);
  let rawText: string | null = null;

  try {
    const image = await deps.preprocess(input);
    log('info', `preprocessed image to ${image.width}x${image.height}`);

    rawText = await deps.engine.recognize(image.png);
    log('info', `recognized ${rawText.length} characters`);

    const reading = buildReading(displayType, rawText);
    const expected = getLayout(displayType).fields.length;
    const populated = countPopulated(reading.fields);
    if (populated < expected) {
      log('warn', `insufficient data: ${populated} of ${expected} ${displayType} fields populated`);
    } else {
      log('info', `all ${expected} ${displayType} fields populated`);
    }
    return { ok: true, reading, logs };
  } catch (e) {
    if (!(e instanceof ShotProcessingError)) throw e;
    log('error', `${e.code}: ${e.message}`);
    return { ok: false, error: { code: e.code, message: e.message }, rawText, logs };
  }
}
