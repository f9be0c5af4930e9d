import { z } from 'zod';

const booleanString = z
  .union([z.enum(['true', 'false']), z.undefined()])
  .transform((value) => value === 'true');

const optionalPath = z
  .union([z.string().trim(), z.undefined()])
  .transform((value) => (value ? value.replace(/\/$/, '') : undefined));

const envSchema = z
  .object({
    OCR_LANG: z.string().trim().min(1, 'OCR_LANG cannot be empty').default('eng'),
    OCR_LANG_PATH: optionalPath,
    OCR_CACHE_PATH: optionalPath,
    OCR_PAGE_SEG_MODE: z
      .enum(['block', 'line', 'sparse'], {
        errorMap: () => ({ message: 'OCR_PAGE_SEG_MODE must be block, line or sparse' }),
      })
      .default('block'),
    OCR_ENGINE_MODE: z
      .enum(['tesseract', 'lstm', 'combined', 'default'], {
        errorMap: () => ({ message: 'OCR_ENGINE_MODE must be tesseract, lstm, combined or default' }),
      })
      .default('default'),
    OCR_CHAR_WHITELIST: z
      .string()
      .min(1, 'OCR_CHAR_WHITELIST cannot be empty')
      .default('0123456789.-+mph°ft/s'),
    IMAGE_MAX_MB: z.coerce
      .number({ invalid_type_error: 'IMAGE_MAX_MB must be a number' })
      .positive('IMAGE_MAX_MB must be greater than 0')
      .default(20),
    IMAGE_MIN_HEIGHT: z.coerce
      .number({ invalid_type_error: 'IMAGE_MIN_HEIGHT must be a number' })
      .int('IMAGE_MIN_HEIGHT must be a whole number of pixels')
      .positive('IMAGE_MIN_HEIGHT must be greater than 0')
      .default(500),
    IMAGE_MAX_WIDTH: z.coerce
      .number({ invalid_type_error: 'IMAGE_MAX_WIDTH must be a number' })
      .int('IMAGE_MAX_WIDTH must be a whole number of pixels')
      .positive('IMAGE_MAX_WIDTH must be greater than 0')
      .default(2400),
    FEATURES_AUTO_ORIENT: booleanString,
    NODE_ENV: z
      .enum(['development', 'production', 'test'], {
        errorMap: () => ({ message: 'NODE_ENV must be development, production or test' }),
      })
      .default('development'),
  })
  .superRefine((data, ctx) => {
    if (data.IMAGE_MAX_WIDTH < data.IMAGE_MIN_HEIGHT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'IMAGE_MAX_WIDTH cannot be smaller than IMAGE_MIN_HEIGHT',
        path: ['IMAGE_MAX_WIDTH'],
      });
    }
  });

export type Env = ReturnType<typeof loadEnv>;

export function loadEnv(customEnv: NodeJS.ProcessEnv = process.env) {
  try {
    const parsed = envSchema.parse(customEnv);

    const megabyte = 1024 * 1024;

    return {
      OCR_LANG: parsed.OCR_LANG,
      OCR_LANG_PATH: parsed.OCR_LANG_PATH,
      OCR_CACHE_PATH: parsed.OCR_CACHE_PATH,
      OCR_PAGE_SEG_MODE: parsed.OCR_PAGE_SEG_MODE,
      OCR_ENGINE_MODE: parsed.OCR_ENGINE_MODE,
      OCR_CHAR_WHITELIST: parsed.OCR_CHAR_WHITELIST,
      IMAGE_MAX_MB: parsed.IMAGE_MAX_MB,
      IMAGE_MAX_BYTES: Math.floor(parsed.IMAGE_MAX_MB * megabyte),
      IMAGE_MIN_HEIGHT: parsed.IMAGE_MIN_HEIGHT,
      IMAGE_MAX_WIDTH: parsed.IMAGE_MAX_WIDTH,
      FEATURES: {
        AUTO_ORIENT: parsed.FEATURES_AUTO_ORIENT,
      },
      NODE_ENV: parsed.NODE_ENV,
    } as const;
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
      throw new Error(`Invalid environment configuration. Fix the following: ${issues.join('; ')}`);
    }

    throw error;
  }
}

export const env = loadEnv();
