/** Plugin configuration, as read from config.yaml. */
export interface SqModeConfig {
  /** Executable looked up on PATH. */
  program: string;
  output_buffer: string;
  key_prefix: string;
  message_max_width: number;
}
