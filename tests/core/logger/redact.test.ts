import { describe, it, expect } from 'vitest';

import {
    REDACTION_RULES,
    scrubText,
    Redacted,
    RedactedMessage,
    sensitive,
    redact,
    renderMessage,
} from '../../../src/core/logger/redact.js';

describe('logger: redact', () => {

    describe('scrubText', () => {

        it.each([
            ['Email: user@example.com', 'Email: [REDACTED_EMAIL]'],
            ['Credit card: 4532-1234-5678-9012', 'Credit card: [REDACTED_CARD]'],
            ['Phone: 555-123-4567', 'Phone: [REDACTED_PHONE]'],
            ['SSN: 123-45-6789', 'SSN: [REDACTED_SSN]'],
            ['password: secret123', 'password: [REDACTED_PASSWORD]'],
            ['API Key: abc123xyz789', 'API Key: [REDACTED_API_KEY]'],
            ['IP: 10.0.0.1', 'IP: [REDACTED_IP]'],
            ['IP: 192.168.1.1', 'IP: [REDACTED_IP]'],
        ])('should redact %s', (input, expected) => {

            expect(scrubText(input)).toBe(expected);

        });

        it('should match password keywords case-insensitively', () => {

            expect(scrubText('Password=hunter2')).toBe('password: [REDACTED_PASSWORD]');

        });

        it('should keep the keyword for api keys and tokens', () => {

            expect(scrubText('api_key=abc')).toBe('api_key: [REDACTED_API_KEY]');
            expect(scrubText('TOKEN: xyz')).toBe('TOKEN: [REDACTED_API_KEY]');

        });

        it('should read a 16 digit number as a card, not a phone', () => {

            expect(scrubText('card=4532123456789012')).toBe('card=[REDACTED_CARD]');

        });

        it('should redact every kind in one message', () => {

            const input = 'User data: email=john.doe@company.com, phone=555-123-4567, '
                + 'ssn=123-45-6789, card=4532123456789012, password=mySecret123, '
                + 'api_key=sk_live_abc123def456, ip=10.0.0.1';

            expect(scrubText(input)).toBe(
                'User data: email=[REDACTED_EMAIL], phone=[REDACTED_PHONE], '
                + 'ssn=[REDACTED_SSN], card=[REDACTED_CARD], password: [REDACTED_PASSWORD] '
                + 'api_key: [REDACTED_API_KEY] ip=[REDACTED_IP]',
            );

        });

        it('should leave text without sensitive data unchanged', () => {

            expect(scrubText('Cache warmed in 12ms')).toBe('Cache warmed in 12ms');

        });

        it('should apply custom rules in order', () => {

            const rules = [
                { name: 'order', pattern: /ORD-\d+/g, replacement: '[ORDER]' },
                { name: 'bracket', pattern: /\[ORDER\]/g, replacement: '<order>' },
            ];

            expect(scrubText('Shipped ORD-123', rules)).toBe('Shipped <order>');

        });

        it('should list the built-in rules in their fixed order', () => {

            expect(REDACTION_RULES.map((rule) => rule.name)).toEqual([
                'card',
                'email',
                'phone',
                'ssn',
                'password',
                'api-key',
                'ip',
            ]);

        });

    });

    describe('Redacted', () => {

        it('should resolve to the real value on the console', () => {

            expect(redact('secret123', '[HIDDEN]').resolve('console')).toBe('secret123');

        });

        it('should resolve to the placeholder when persisted', () => {

            expect(redact('secret123', '[HIDDEN]').resolve('persisted')).toBe('[HIDDEN]');

        });

        it('should default the placeholder', () => {

            expect(redact('value').placeholder).toBe('[REDACTED]');

        });

        it('should stringify as the placeholder', () => {

            expect(`token is ${redact('abc', '[X]')}`).toBe('token is [X]');

        });

        it('should provide common placeholders', () => {

            expect(redact.email('a@b.co').placeholder).toBe('[REDACTED_EMAIL]');
            expect(redact.password('pw').placeholder).toBe('[REDACTED_PASSWORD]');
            expect(redact.creditCard('4532').placeholder).toBe('[REDACTED_CARD]');
            expect(redact.apiKey('k').placeholder).toBe('[REDACTED_API_KEY]');
            expect(redact.phone('555').placeholder).toBe('[REDACTED_PHONE]');

        });

        it('should stringify non-string values on the console', () => {

            expect(redact(4242, '[PIN]').resolve('console')).toBe('4242');

        });

    });

    describe('sensitive', () => {

        it('should keep redacted values apart from literal text', () => {

            const message = sensitive`Order ${42} for ${redact.email('a@b.co')}`;

            expect(message.parts).toHaveLength(2);
            expect(message.parts[0]).toBe('Order 42 for ');
            expect(message.parts[1]).toBeInstanceOf(Redacted);

        });

        it('should keep redacted values of a nested message', () => {

            const message = sensitive`Login ${sensitive`as ${redact('bob@x.io')}`}`;

            expect(message.parts).toHaveLength(2);
            expect(renderMessage(message, 'console')).toBe('Login as bob@x.io');
            expect(renderMessage(message, 'persisted')).toBe('Login as [REDACTED]');

        });

        it('should build a RedactedMessage', () => {

            expect(sensitive`plain`).toBeInstanceOf(RedactedMessage);

        });

    });

    describe('renderMessage', () => {

        it('should show real values on the console and placeholders in the file', () => {

            const message = sensitive`User login with password: ${redact('secret123', '[HIDDEN]')}`;

            expect(renderMessage(message, 'console')).toBe('User login with password: secret123');
            expect(renderMessage(message, 'persisted')).toBe('User login with password: [HIDDEN]');

        });

        it('should scan literal text in the persisted channel', () => {

            const message = sensitive`Contact user@example.com about ${redact('case 7')}`;

            expect(renderMessage(message, 'persisted')).toBe('Contact [REDACTED_EMAIL] about [REDACTED]');
            expect(renderMessage(message, 'console')).toBe('Contact user@example.com about case 7');

        });

        it('should not scan placeholders again', () => {

            const message = sensitive`Key ${redact('real-key', 'token=placeholder')}`;

            expect(renderMessage(message, 'persisted')).toBe('Key token=placeholder');

        });

        it('should scan plain strings only when persisted', () => {

            expect(renderMessage('Email: user@example.com', 'console')).toBe('Email: user@example.com');
            expect(renderMessage('Email: user@example.com', 'persisted')).toBe('Email: [REDACTED_EMAIL]');

        });

        it('should render a lone redacted value', () => {

            expect(renderMessage(redact.phone('555-123-4567'), 'console')).toBe('555-123-4567');
            expect(renderMessage(redact.phone('555-123-4567'), 'persisted')).toBe('[REDACTED_PHONE]');

        });

        it('should stringify a message as its persisted rendering', () => {

            const message = sensitive`Paid with ${redact.creditCard('4532-1234-5678-9012')}`;

            expect(String(message)).toBe('Paid with [REDACTED_CARD]');

        });

    });

});
