import { describeConfig } from '../config.js';
import type { AppConfig } from '../config.js';

/** Prints the effective configuration with the client secret masked */
export function executeConfigCommand(config: AppConfig): void {
  console.log(describeConfig(config));
}
