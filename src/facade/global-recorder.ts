/**
 * Process-wide recorder slot used by the call-site helpers.
 *
 * Install a recorder once, at startup, before anything records. Until then
 * (and after `clearRecorder`) every helper call goes to a no-op recorder.
 */

import { RegistrationError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import { NoopRecorder } from '../recorder/index.js';
import type { Recorder } from '../types.js';

const NOOP_RECORDER = new NoopRecorder();

let installed: Recorder | undefined;
let facadeLogger: Logger = new NoopLogger();

/**
 * Installs the process-wide recorder.
 *
 * @throws RegistrationError if a recorder is already installed
 */
export function setRecorder(recorder: Recorder, options: { logger?: Logger } = {}): void {
  if (installed !== undefined) {
    throw new RegistrationError(
      'A global recorder is already installed; call clearRecorder() before installing another'
    );
  }
  installed = recorder;
  facadeLogger = options.logger ?? new NoopLogger();
  facadeLogger.info('Global recorder installed', { recorder: recorder.constructor.name });
}

/**
 * The installed recorder, or a no-op recorder when none is installed.
 */
export function getRecorder(): Recorder {
  return installed ?? NOOP_RECORDER;
}

export function isRecorderInstalled(): boolean {
  return installed !== undefined;
}

/**
 * Removes the installed recorder and returns it, if any.
 */
export function clearRecorder(): Recorder | undefined {
  const previous = installed;
  installed = undefined;
  if (previous !== undefined) {
    facadeLogger.info('Global recorder removed', { recorder: previous.constructor.name });
  }
  facadeLogger = new NoopLogger();
  return previous;
}

/**
 * Logger given at installation time.
 */
export function getFacadeLogger(): Logger {
  return facadeLogger;
}
