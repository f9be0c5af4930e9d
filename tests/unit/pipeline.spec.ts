import { describe, expect, it, vi } from 'vitest';
import { preprocessImage } from '../../src/lib/image/preprocess';
import { ImageDecodeError, OcrEngineError } from '../../src/lib/shots/errors';
import { processShotImage, type ShotPipelineDeps } from '../../src/lib/shots/pipeline';

const T = '2026-01-01T00:00:00.000Z';

function fakeDeps(recognize: (image: Buffer) => Promise<string>): ShotPipelineDeps {
  return {
    preprocess: vi.fn(async () => ({ width: 10, height: 500, png: Buffer.from('png') })),
    engine: { recognize: vi.fn(recognize) },
    now: () => new Date(T),
  };
}

describe('shot pipeline', () => {
  it('maps an OLED reading, duplicates included', async () => {
    const result = await processShotImage(Buffer.from('jpeg'), 'OLED', fakeDeps(async () => '85.3 mph 112.mph'));

    expect(result).toEqual({
      ok: true,
      reading: {
        displayType: 'OLED',
        fields: { ball_speed: 85.3, club_head_speed: 112, carry_distance: 85.3, total_distance: 112 },
        confidence: 1,
        rawText: '85.3 mph 112.mph',
        error: null,
      },
      logs: [
        { t: T, lvl: 'info', msg: 'preprocessed image to 10x500' },
        { t: T, lvl: 'info', msg: 'recognized 16 characters' },
        { t: T, lvl: 'info', msg: 'all 4 OLED fields populated' },
      ],
    });
  });

  it('fills the tablet layout in declared order', async () => {
    const text = '101.2 150.3 1.48 240 262\n12.4 2650 -310 -1.2 2.3\n-0.8 14.1 0.2 -0.3 31 45.6';
    const result = await processShotImage('shot.jpg', 'TABLET', fakeDeps(async () => text));

    if (!result.ok) throw new Error('expected a reading');
    expect(result.reading.confidence).toBe(1);
    expect(Object.entries(result.reading.fields)).toEqual([
      ['ball_speed', 101.2],
      ['club_head_speed', 150.3],
      ['smash_factor', 1.48],
      ['carry_distance', 240],
      ['total_distance', 262],
      ['launch_angle', 12.4],
      ['spin_rate', 2650],
      ['side_spin', -310],
      ['angle_of_attack', -1.2],
      ['club_path', 2.3],
      ['face_angle', -0.8],
      ['dynamic_loft', 14.1],
      ['impact_height', 0.2],
      ['impact_toe', -0.3],
      ['ball_height', 31],
      ['descent_angle', 45.6],
    ]);
  });

  it('returns a partial reading with a warning when data is missing', async () => {
    const result = await processShotImage(Buffer.from('jpeg'), 'OLED', fakeDeps(async () => '98.4 mph'));

    if (!result.ok) throw new Error('expected a reading');
    expect(result.reading.fields).toEqual({
      ball_speed: 98.4,
      club_head_speed: 98.4,
      carry_distance: null,
      total_distance: null,
    });
    expect(result.reading.confidence).toBe(0.5);
    expect(result.reading.error).toBeNull();
    expect(result.logs[2]).toEqual({ t: T, lvl: 'warn', msg: 'insufficient data: 2 of 4 OLED fields populated' });
  });

  it('returns a frozen reading', async () => {
    const result = await processShotImage(Buffer.from('jpeg'), 'OLED', fakeDeps(async () => ''));

    if (!result.ok) throw new Error('expected a reading');
    expect(Object.isFrozen(result.reading)).toBe(true);
    expect(Object.isFrozen(result.reading.fields)).toBe(true);
    expect(result.reading.confidence).toBe(0);
  });

  it('stops before recognition when the image cannot be decoded', async () => {
    const deps = fakeDeps(async () => '1 2 3 4');
    deps.preprocess = vi.fn(async () => {
      throw new ImageDecodeError('Cannot decode image: truncated');
    });

    const result = await processShotImage(Buffer.from('jpeg'), 'OLED', deps);

    expect(result).toEqual({
      ok: false,
      error: { code: 'IMAGE_DECODE', message: 'Cannot decode image: truncated' },
      rawText: null,
      logs: [{ t: T, lvl: 'error', msg: 'IMAGE_DECODE: Cannot decode image: truncated' }],
    });
    expect(deps.engine.recognize).not.toHaveBeenCalled();
  });

  it('classifies unreadable bytes end to end', async () => {
    const deps = fakeDeps(async () => '1 2 3 4');
    deps.preprocess = (input) => preprocessImage(input);

    const result = await processShotImage(Buffer.from('not an image'), 'TABLET', deps);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('IMAGE_DECODE');
    expect(deps.engine.recognize).not.toHaveBeenCalled();
  });

  it('reports an engine failure without a mapping', async () => {
    const result = await processShotImage(
      Buffer.from('jpeg'),
      'OLED',
      fakeDeps(async () => {
        throw new OcrEngineError('OCR recognition failed: boom');
      })
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({ code: 'OCR_ENGINE', message: 'OCR recognition failed: boom' });
    expect(result.rawText).toBeNull();
    expect(result).not.toHaveProperty('reading');
  });

  it('rethrows errors it does not classify', async () => {
    const deps = fakeDeps(async () => '');
    deps.preprocess = vi.fn(async () => {
      throw new TypeError('bug');
    });

    await expect(processShotImage(Buffer.from('jpeg'), 'OLED', deps)).rejects.toThrowError(TypeError);
  });

  it('keeps concurrent images apart', async () => {
    const [oled, tablet] = await Promise.all([
      processShotImage(Buffer.from('a'), 'OLED', fakeDeps(async () => '1 2 3 4')),
      processShotImage(Buffer.from('b'), 'TABLET', fakeDeps(async () => '9')),
    ]);

    if (!oled.ok || !tablet.ok) throw new Error('expected readings');
    expect(oled.reading.fields).toEqual({ ball_speed: 1, club_head_speed: 2, carry_distance: 3, total_distance: 4 });
    expect(tablet.reading.fields.ball_speed).toBe(9);
    expect(tablet.reading.confidence).toBe(1 / 16);
  });
});
