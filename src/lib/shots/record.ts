import type { ShotMetric, ShotRecord, ShotResult } from './model';

const NO_METRICS: Readonly<Record<ShotMetric, number | null>> = Object.freeze({
  ball_speed: null,
  club_head_speed: null,
  carry_distance: null,
  total_distance: null,
  smash_factor: null,
  launch_angle: null,
  spin_rate: null,
  side_spin: null,
  angle_of_attack: null,
  club_path: null,
  face_angle: null,
  dynamic_loft: null,
  impact_height: null,
  impact_toe: null,
  ball_height: null,
  descent_angle: null,
  apex_height: null,
  hang_time: null,
  offline: null,
});

export function emptyShotRecord(): ShotRecord {
  return { ...NO_METRICS, processed: false, processingErrors: '', confidenceScore: null };
}

function isMetric(key: string): key is ShotMetric {
  return Object.prototype.hasOwnProperty.call(NO_METRICS, key);
}

/**
 * What the persistence layer writes back for one processed image. Null
 * readings never overwrite a stored value.
 */
export function applyShotResult(record: ShotRecord, result: ShotResult): ShotRecord {
  if (!result.ok) {
    return { ...record, processingErrors: `${result.error.code}: ${result.error.message}` };
  }

  const next: ShotRecord = { ...record };
  for (const [field, value] of Object.entries(result.reading.fields)) {
    if (value !== null && value !== undefined && isMetric(field)) next[field] = value;
  }
  return { ...next, processed: true, processingErrors: '', confidenceScore: result.reading.confidence };
}
