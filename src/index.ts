/**
 * loglane
 *
 * Structured logging with buffered, rotating file output and
 * per-channel redaction.
 *
 * @example
 * ```typescript
 * import { createLogger, redact, sensitive } from 'loglane'
 *
 * const logger = await createLogger({ config: { level: 'info' } })
 * const log = logger.child('AuthService')
 *
 * log.info(sensitive`Signed in ${redact.email(user.email)}`, { userId: user.id })
 *
 * await logger.stop()
 * ```
 */
export * from './core/logger/index.js';

export {
    createObserver,
    type LoggerEvents,
    type LoggerEventNames,
    type LoggerObserver,
    type LoggerOperation,
} from './core/observer.js';
