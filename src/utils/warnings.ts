import { config } from '../config';

/** Emit a warning when `config.warnings` is enabled. */
export function warn(message: string): void {
  if (!config.warnings) return;
  // eslint-disable-next-line no-console
  console.warn(message);
}
