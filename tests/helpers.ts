import { vi } from 'vitest';
import sharp from 'sharp';

export const baseEnv = {
  OCR_LANG: 'eng',
  OCR_PAGE_SEG_MODE: 'block',
  OCR_ENGINE_MODE: 'default',
  OCR_CHAR_WHITELIST: '0123456789.-+mph°ft/s',
  IMAGE_MAX_MB: '20',
  IMAGE_MIN_HEIGHT: '500',
  IMAGE_MAX_WIDTH: '2400',
  FEATURES_AUTO_ORIENT: 'false',
  NODE_ENV: 'test',
  OCR_LANG_PATH: undefined,
  OCR_CACHE_PATH: undefined,
} as const;

type EnvOverrides = Partial<Record<keyof typeof baseEnv, string | undefined>>;

export async function loadModule<T>(path: string, overrides: EnvOverrides = {}): Promise<T> {
  vi.resetModules();
  const nextEnv: NodeJS.ProcessEnv = {};

  for (const [key, value] of Object.entries({ ...baseEnv, ...overrides })) {
    if (typeof value !== 'undefined') nextEnv[key] = value;
  }

  process.env = nextEnv;
  const module = (await import(path)) as T;
  return module;
}

export async function solidPng(width: number, height: number, background = '#ffffff'): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background } }).png().toBuffer();
}
