import Tesseract from 'tesseract.js';
import { env, type Env } from '../../config/env';
import { OcrEngineError, describeCause } from '../shots/errors';

export type PageSegMode = 'block' | 'line' | 'sparse';

export type EngineMode = 'tesseract' | 'lstm' | 'combined' | 'default';

export type OcrConfig = Readonly<{
  lang: string;
  pageSegMode: PageSegMode;
  engineMode: EngineMode;
  charWhitelist: string;
  langPath?: string;
  cachePath?: string;
}>;

export interface OcrEngine {
  recognize(image: Buffer): Promise<string>;
}

const PAGE_SEG_MODES: Record<PageSegMode, Tesseract.PSM> = {
  block: Tesseract.PSM.SINGLE_BLOCK,
  line: Tesseract.PSM.SINGLE_LINE,
  sparse: Tesseract.PSM.SPARSE_TEXT,
};

const ENGINE_MODES: Record<EngineMode, Tesseract.OEM> = {
  tesseract: Tesseract.OEM.TESSERACT_ONLY,
  lstm: Tesseract.OEM.LSTM_ONLY,
  combined: Tesseract.OEM.TESSERACT_LSTM_COMBINED,
  default: Tesseract.OEM.DEFAULT,
};

async function readText(worker: Tesseract.Worker, image: Buffer, settings: OcrConfig): Promise<string> {
  // The whitelist is what keeps letters from being read in place of digits.
  await worker.setParameters({
    tessedit_pageseg_mode: PAGE_SEG_MODES[settings.pageSegMode],
    tessedit_char_whitelist: settings.charWhitelist,
  });
  const { data } = await worker.recognize(image);
  return data.text ?? '';
}

export function ocrConfigFromEnv(source: Env = env): OcrConfig {
  return Object.freeze({
    lang: source.OCR_LANG,
    pageSegMode: source.OCR_PAGE_SEG_MODE,
    engineMode: source.OCR_ENGINE_MODE,
    charWhitelist: source.OCR_CHAR_WHITELIST,
    langPath: source.OCR_LANG_PATH,
    cachePath: source.OCR_CACHE_PATH,
  });
}

/**
 * Tesseract-backed engine. Every call spins up its own worker and terminates
 * it before returning, so concurrent calls share nothing but the frozen config.
 */
export function createOcrEngine(config: OcrConfig = ocrConfigFromEnv()): OcrEngine {
  const settings: OcrConfig = Object.freeze({ ...config });

  return {
    async recognize(image: Buffer): Promise<string> {
      let worker: Tesseract.Worker;
      try {
        worker = await Tesseract.createWorker(settings.lang, ENGINE_MODES[settings.engineMode], {
          langPath: settings.langPath,
          cachePath: settings.cachePath,
        });
      } catch (e) {
        throw new OcrEngineError(`OCR engine unavailable: ${describeCause(e)}`, { cause: e });
      }

      const outcome = await readText(worker, image, settings).then(
        (text) => ({ ok: true as const, text }),
        (error: unknown) => ({ ok: false as const, error })
      );

      try {
        await worker.terminate();
      } catch (e) {
        const message = outcome.ok
          ? `OCR engine failed to shut down: ${describeCause(e)}`
          : `OCR recognition failed: ${describeCause(outcome.error)} (shutdown also failed: ${describeCause(e)})`;
        throw new OcrEngineError(message, { cause: outcome.ok ? e : outcome.error });
      }

      if (!outcome.ok) {
        throw new OcrEngineError(`OCR recognition failed: ${describeCause(outcome.error)}`, { cause: outcome.error });
      }
      return outcome.text;
    },
  };
}
