/**
 * Early LogEngine Configuration
 *
 * Import first: sets the timestamp format and the log mode before any module
 * logs at startup.
 *
 * @since 2025
 */
import { LogEngine } from '@wgtechlabs/log-engine';
import { initializeLogConfig } from '../utils/logConfig.js';

LogEngine.configure({
    format: {
        includeIsoTimestamp: false,
        includeLocalTime: true
    }
});

export const logConfig = initializeLogConfig();

export { LogEngine };
