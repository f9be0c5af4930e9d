import { z } from 'zod';
import type { DisplayLayout, DisplayType, ShotField } from './model';

function freezeLayout(displayType: DisplayType, fields: ShotField[]): DisplayLayout {
  return Object.freeze({ displayType, fields: Object.freeze([...fields]) });
}

// Reading order of each screen. Positional mapping depends on it, so never reorder.
export const DISPLAY_LAYOUTS: Readonly<Record<DisplayType, DisplayLayout>> = Object.freeze({
  OLED: freezeLayout('OLED', ['ball_speed', 'club_head_speed', 'carry_distance', 'total_distance']),
  TABLET: freezeLayout('TABLET', [
    'ball_speed',
    'club_head_speed',
    'smash_factor',
    'carry_distance',
    'total_distance',
    'launch_angle',
    'spin_rate',
    'side_spin',
    'angle_of_attack',
    'club_path',
    'face_angle',
    'dynamic_loft',
    'impact_height',
    'impact_toe',
    'ball_height',
    'descent_angle',
  ]),
});

export function getLayout(displayType: DisplayType): DisplayLayout {
  return DISPLAY_LAYOUTS[displayType];
}

// The companion app shipped as an iPad app; older clients still send "ipad".
const DisplayTypeInput = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() ? value.trim().toLowerCase() : undefined),
  z.enum(['oled', 'tablet', 'ipad']).default('oled')
);

export function parseDisplayType(value: unknown): DisplayType {
  const parsed = DisplayTypeInput.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Unsupported display type "${String(value)}". Expected OLED or TABLET`);
  }
  return parsed.data === 'oled' ? 'OLED' : 'TABLET';
}
