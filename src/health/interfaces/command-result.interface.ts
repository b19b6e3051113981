export interface CommandResult {
  readonly success: boolean;
  /** stdout on success, stderr or a diagnostic message on failure */
  readonly output: string;
}
