/**
 * Centralized Redaction Configuration
 * Keys that must never reach the log sink in clear text.
 */
export const REDACT_KEYS = [
    // Credentials (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'password', '*.password',
    'secret', '*.secret',
    'apiKey', '*.apiKey',

    // Database settings
    'DB_PASSWORD', '*.DB_PASSWORD',
    'connectionString', '*.connectionString',

    // Payout destinations
    'account_number', '*.account_number',
    'iban', '*.iban'
];

export const REDACT_CENSOR = '[REDACTED]';
