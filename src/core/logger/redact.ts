/**
 * Redaction
 *
 * Two mechanisms that coexist:
 *
 * - Automatic scanning: an ordered list of pattern rules applied to
 *   free-form text bound for the log file.
 * - Explicit marking: a value wrapped with `redact()` renders as its
 *   real value on the console and as its placeholder in the file.
 *
 * @example
 * ```typescript
 * scrubText('Email: user@example.com')
 * // => 'Email: [REDACTED_EMAIL]'
 *
 * const message = sensitive`Login with ${redact('hunter2', '[HIDDEN]')}`
 * renderMessage(message, 'console')    // 'Login with hunter2'
 * renderMessage(message, 'persisted')  // 'Login with [HIDDEN]'
 * ```
 */
import type { Channel, LogMessage } from './types.js';

const DEFAULT_PLACEHOLDER = '[REDACTED]';

// ─────────────────────────────────────────────────────────────
// Automatic Scanning
// ─────────────────────────────────────────────────────────────

/**
 * A pattern and what to replace each match with.
 *
 * `replacement` follows `String.prototype.replace` syntax, so `$1`
 * refers to the first capture group.
 */
export interface RedactionRule {

    name: string;

    pattern: RegExp;

    replacement: string;

}

/**
 * Built-in rules.
 *
 * Order matters: each rule runs on the output of the previous one.
 * Cards go before phones so a 16-digit number is not split into a
 * phone number, and phones go before SSNs so `555-123-4567` is not
 * read as an SSN followed by digits.
 */
export const REDACTION_RULES: readonly RedactionRule[] = [
    {
        name: 'card',
        pattern: /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g,
        replacement: '[REDACTED_CARD]',
    },
    {
        name: 'email',
        pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
        replacement: '[REDACTED_EMAIL]',
    },
    {
        name: 'phone',
        pattern: /\b\d{3}[-.\s]?\d{3}[-.\s]?\d{4}\b/g,
        replacement: '[REDACTED_PHONE]',
    },
    {
        name: 'ssn',
        pattern: /\b\d{3}[-.\s]?\d{2}[-.\s]?\d{4}\b/g,
        replacement: '[REDACTED_SSN]',
    },
    {
        name: 'password',
        pattern: /password[\s:=]+\S+/gi,
        replacement: 'password: [REDACTED_PASSWORD]',
    },
    {
        name: 'api-key',
        pattern: /(api[\s_-]?key|token)[\s:=]+\S+/gi,
        replacement: '$1: [REDACTED_API_KEY]',
    },
    {
        name: 'ip',
        pattern: /\b(?:\d{1,3}\.){3}\d{1,3}\b/g,
        replacement: '[REDACTED_IP]',
    },
];

/**
 * Apply redaction rules to a piece of text, in order.
 *
 * @example
 * ```typescript
 * scrubText('Phone: 555-123-4567')  // 'Phone: [REDACTED_PHONE]'
 * scrubText('password=abc123')      // 'password: [REDACTED_PASSWORD]'
 * ```
 */
export function scrubText(text: string, rules: readonly RedactionRule[] = REDACTION_RULES): string {

    let result = text;

    for (const rule of rules) {

        result = result.replace(rule.pattern, rule.replacement);

    }

    return result;

}

// ─────────────────────────────────────────────────────────────
// Explicit Marking
// ─────────────────────────────────────────────────────────────

/**
 * A value shown in full on the console and as a placeholder in the
 * log file.
 *
 * Converting it to a string yields the placeholder, so interpolating
 * it into a plain string never leaks the value.
 */
export class Redacted<T = unknown> {

    constructor(
        public readonly value: T,
        public readonly placeholder: string = DEFAULT_PLACEHOLDER,
    ) {}

    /**
     * Text for a channel.
     */
    resolve(channel: Channel): string {

        return channel === 'console' ? String(this.value) : this.placeholder;

    }

    toString(): string {

        return this.placeholder;

    }

}

/**
 * One piece of a RedactedMessage.
 */
export type MessagePart = string | Redacted;

/**
 * A message made of literal text and redacted values.
 *
 * Built with the `sensitive` template tag.
 */
export class RedactedMessage {

    readonly parts: readonly MessagePart[];

    constructor(parts: readonly MessagePart[]) {

        // Merge adjacent literals so scanning sees them as one text
        const merged: MessagePart[] = [];

        for (const part of parts) {

            const last = merged[merged.length - 1];

            if (typeof part === 'string' && typeof last === 'string') {

                merged[merged.length - 1] = last + part;

            }
            else if (part !== '') {

                merged.push(part);

            }

        }

        this.parts = merged;

    }

    toString(): string {

        return renderMessage(this, 'persisted');

    }

}

/**
 * Template tag that keeps `Redacted` values apart from literal text.
 *
 * A nested RedactedMessage is spliced in part by part. Other
 * interpolated values become literal text.
 *
 * @example
 * ```typescript
 * sensitive`User ${userId} paid with ${redact.creditCard(card)}`
 * ```
 */
export function sensitive(strings: TemplateStringsArray, ...values: unknown[]): RedactedMessage {

    const parts: MessagePart[] = [];

    strings.forEach((text, index) => {

        parts.push(text);

        if (index < values.length) {

            const value = values[index];

            if (value instanceof RedactedMessage) {

                parts.push(...value.parts);

            }
            else {

                parts.push(value instanceof Redacted ? value : String(value));

            }

        }

    });

    return new RedactedMessage(parts);

}

/**
 * Mark a value as sensitive.
 *
 * @example
 * ```typescript
 * redact('secret123', '[HIDDEN]')
 * redact.email('user@example.com')
 * ```
 */
export const redact = Object.assign(
    <T>(value: T, placeholder: string = DEFAULT_PLACEHOLDER): Redacted<T> => new Redacted(value, placeholder),
    {
        email: <T>(value: T): Redacted<T> => new Redacted(value, '[REDACTED_EMAIL]'),
        password: <T>(value: T): Redacted<T> => new Redacted(value, '[REDACTED_PASSWORD]'),
        creditCard: <T>(value: T): Redacted<T> => new Redacted(value, '[REDACTED_CARD]'),
        apiKey: <T>(value: T): Redacted<T> => new Redacted(value, '[REDACTED_API_KEY]'),
        phone: <T>(value: T): Redacted<T> => new Redacted(value, '[REDACTED_PHONE]'),
    },
);

// ─────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────

/**
 * Render a message for a channel.
 *
 * Console output keeps every real value. Persisted output replaces
 * redacted values with their placeholders and scans only the literal
 * text, so a placeholder is never scanned again.
 */
export function renderMessage(
    message: LogMessage,
    channel: Channel,
    rules: readonly RedactionRule[] = REDACTION_RULES,
): string {

    if (typeof message === 'string') {

        return channel === 'console' ? message : scrubText(message, rules);

    }

    if (message instanceof Redacted) {

        return message.resolve(channel);

    }

    return message.parts
        .map((part) => {

            if (typeof part !== 'string') {

                return part.resolve(channel);

            }

            return channel === 'console' ? part : scrubText(part, rules);

        })
        .join('');

}
