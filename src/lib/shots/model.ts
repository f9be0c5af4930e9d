export type DisplayType = 'OLED' | 'TABLET';

export type ShotField =
  | 'ball_speed'
  | 'club_head_speed'
  | 'smash_factor'
  | 'carry_distance'
  | 'total_distance'
  | 'launch_angle'
  | 'spin_rate'
  | 'side_spin'
  | 'angle_of_attack'
  | 'club_path'
  | 'face_angle'
  | 'dynamic_loft'
  | 'impact_height'
  | 'impact_toe'
  | 'ball_height'
  | 'descent_angle';

export interface DisplayLayout {
  displayType: DisplayType;
  fields: readonly ShotField[];
}

export type ShotFields = Readonly<Partial<Record<ShotField, number | null>>>;

export interface ShotReading {
  readonly displayType: DisplayType;
  readonly fields: ShotFields;
  readonly confidence: number;
  readonly rawText: string;
  readonly error: string | null;
}

export type ShotErrorCode = 'IMAGE_DECODE' | 'OCR_ENGINE';

export type LogLevel = 'info' | 'warn' | 'error';

export interface LogEntry {
  t: string;
  lvl: LogLevel;
  msg: string;
}

export type ShotResult =
  | { ok: true; reading: ShotReading; logs: LogEntry[] }
  | { ok: false; error: { code: ShotErrorCode; message: string }; rawText: string | null; logs: LogEntry[] };

// Everything the device can show; the tablet layout is a subset.
export type ShotMetric = ShotField | 'apex_height' | 'hang_time' | 'offline';

export type ShotRecord = Record<ShotMetric, number | null> & {
  processed: boolean;
  processingErrors: string;
  confidenceScore: number | null;
};
