/**
 * Engine Package Logger
 * =====================
 * Default logger for the engine package with namespace '@vixbot/engine'.
 * Components receive a LoggerPort explicitly; this is what composition roots pass.
 */

import { createPackageLogger } from '@vixbot/utils';

export const logger = createPackageLogger('@vixbot/engine');
