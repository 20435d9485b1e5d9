import type { DbTimestamp } from '../utils/time.js';

// Booleans come back as true/false from PostgreSQL and as 1/0 from SQLite.
export type DbBoolean = boolean | number;

// ── Application users ────────────────────────────────────────

export interface UserRow {
  user_id: number;
  username: string;
  password_hash: string;
  role: string;
  email: string;
  is_active: DbBoolean;
  created_at: DbTimestamp;
  last_login: DbTimestamp | null;
}

// ── Roster: crews, shifts, operators ─────────────────────────

export interface CrewRow {
  crew_id: number;
  crew_name: string;
  created_at: DbTimestamp;
}

export interface ShiftDefinitionRow {
  shift_id: number;
  shift_name: string | null;
  start_time: string | null;   // HH:MM:SS
  end_time: string | null;
  duration_hours: number | null;
  created_at: DbTimestamp;
}

export interface OperatorRow {
  operator_id: string;
  crew_id: number | null;
  default_shift_id: number | null;
  operator_rank: DbBoolean;
  created_at: DbTimestamp;
}

export interface CrewRotationRow {
  rotation_id: number;
  crew_id: number;
  anchor_date: DbTimestamp;    // calendar date
  on_days: number;
  off_days: number;
  created_at: DbTimestamp;
}

export interface ShiftInstanceRow {
  shift_instance_id: number;
  crew_id: number;
  shift_id: number;
  shift_start: DbTimestamp | null;
  shift_end: DbTimestamp | null;
  created_at: DbTimestamp;
}

// ── Sessions and events ──────────────────────────────────────

export interface SessionRow {
  session_id: number;
  shift_instance_id: number | null;
  operator_id: string;
  shift_id: number;
  session_start: DbTimestamp;
  session_end: DbTimestamp | null;  // NULL = ongoing
  inactivity_threshold_min: number;
  created_at: DbTimestamp;
}

/** Process and protocol fields of one ICS command/response observation. */
export interface EventFields {
  time_interval: number;
  address: string;
  function_code: string;
  command_response: string;
  control_mode: string;
  control_scheme: string;
  crc: number;
  data_length: number;
  invalid_function_code: string;
  invalid_data_length: string;
  pump_state: string;
  solenoid_state: string;
  set_point: number;
  pipeline_psi: number;
  pid_cycle_time: number;
  pid_deadband: number;
  pid_gain: number;
  pid_rate: number;
  pid_reset: number;
  delta_set_point: number;
  delta_pipeline_psi: number;
  delta_pid_cycle_time: number;
  delta_pid_deadband: number;
  delta_pid_gain: number;
  delta_pid_rate: number;
  delta_pid_reset: number;
  label: string;
}

export type EventFieldName = keyof EventFields;

export interface EventRow extends EventFields {
  event_id: number;
  session_id: number;
  operator_id: string;
  timestamp: DbTimestamp;
  ingest_hash: string;
}

// ── Behavioral analytics ─────────────────────────────────────

export interface SessionFeatureMetrics {
  command_frequency: number;
  inter_command_mean: number;
  inter_command_std: number;
  command_burst_rate: number;
  control_mode_change_rate: number;
  high_risk_command_ratio: number;
  invalid_command_rate: number;
  pump_state_change_rate: number;
  set_point_shock_event_rate: number;
  pid_modification_rate: number;
  command_entropy: number;
  process_command_correlation: number;
}

export interface SessionFeaturesRow extends SessionFeatureMetrics {
  session_features_id: number;
  session_id: number;
  created_at: DbTimestamp;
}

export interface BaselineProfileRow {
  baseline_id: number;
  operator_id: string;
  shift_id: number | null;
  baseline_version: string;
  trained_from: DbTimestamp;
  trained_to: DbTimestamp;
  profile_json: string;        // opaque, produced by the training side
  created_at: DbTimestamp;
}

export interface DetectionRow {
  detection_id: number;
  event_id: number;
  baseline_id: number;
  model_type: string;
  anomaly_score: number;
  threshold: number;
  evidence_json: string;
  predicted_label: string;
  detection_time: DbTimestamp;
}

// ── Alerts and threat intelligence ───────────────────────────

export interface AlertRow {
  alert_id: number;
  event_id: number;
  session_id: number;
  detection_id: number;
  alert_time: DbTimestamp;
  severity: number;
  alert_category: string;
  alert_description: string;
}

export interface CtiObjectRow {
  cti_id: number;
  cti_type: string;            // e.g. 'ttp', 'ioc', 'rule'
  cti_name: string;
  external_id: string | null;  // e.g. ATT&CK for ICS technique ID
  rule: string | null;
  confidence: number | null;
  created_at: DbTimestamp;
}

export interface AlertCtiLinkRow {
  alert_id: number;
  cti_id: number;
  match_reason: string | null;
  link_created_at: DbTimestamp;
}
