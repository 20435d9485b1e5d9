import type { EventFieldName } from '../types/index.js';

export type EventColumnKind = 'float' | 'integer' | 'string';

export interface EventColumnSpec {
  /** Header name in the ingestion CSV. */
  csv: string;
  column: EventFieldName;
  kind: EventColumnKind;
  /**
   * Storage width for string columns. Ingestion truncates to this length,
   * and the events migration sizes the varchar from it.
   */
  maxLength?: number;
}

export const EVENT_COLUMNS: readonly EventColumnSpec[] = [
  { csv: 'TimeInterval', column: 'time_interval', kind: 'float' },
  { csv: 'Address', column: 'address', kind: 'string', maxLength: 50 },
  { csv: 'FunctionCode', column: 'function_code', kind: 'string', maxLength: 10 },
  { csv: 'CommandResponse', column: 'command_response', kind: 'string', maxLength: 50 },
  { csv: 'ControlMode', column: 'control_mode', kind: 'string', maxLength: 50 },
  { csv: 'ControlScheme', column: 'control_scheme', kind: 'string', maxLength: 100 },
  { csv: 'CRC', column: 'crc', kind: 'integer' },
  { csv: 'DataLength', column: 'data_length', kind: 'integer' },
  { csv: 'InvalidFunctionCode', column: 'invalid_function_code', kind: 'string', maxLength: 5 },
  { csv: 'InvalidDataLength', column: 'invalid_data_length', kind: 'string', maxLength: 5 },
  { csv: 'PumpState', column: 'pump_state', kind: 'string', maxLength: 50 },
  { csv: 'SolenoidState', column: 'solenoid_state', kind: 'string', maxLength: 50 },
  { csv: 'SetPoint', column: 'set_point', kind: 'float' },
  { csv: 'PipelinePSI', column: 'pipeline_psi', kind: 'float' },
  { csv: 'PIDCycleTime', column: 'pid_cycle_time', kind: 'float' },
  { csv: 'PIDDeadband', column: 'pid_deadband', kind: 'float' },
  { csv: 'PIDGain', column: 'pid_gain', kind: 'float' },
  { csv: 'PIDRate', column: 'pid_rate', kind: 'float' },
  { csv: 'PIDReset', column: 'pid_reset', kind: 'float' },
  { csv: 'deltaSetPoint', column: 'delta_set_point', kind: 'float' },
  { csv: 'deltaPipelinePSI', column: 'delta_pipeline_psi', kind: 'float' },
  { csv: 'deltaPIDCycleTime', column: 'delta_pid_cycle_time', kind: 'float' },
  { csv: 'deltaPIDDeadband', column: 'delta_pid_deadband', kind: 'float' },
  { csv: 'deltaPIDGain', column: 'delta_pid_gain', kind: 'float' },
  { csv: 'deltaPIDRate', column: 'delta_pid_rate', kind: 'float' },
  { csv: 'deltaPIDReset', column: 'delta_pid_reset', kind: 'float' },
  { csv: 'Label', column: 'label', kind: 'string', maxLength: 50 },
];
