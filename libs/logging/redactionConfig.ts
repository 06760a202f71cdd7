/**
 * Centralized Redaction Configuration
 * Key material and recovered text must never reach the logs.
 */
export const REDACT_KEYS = [
    // Key material (Root and Nested)
    'key', '*.key',
    'keys', '*.keys',
    'keyText', '*.keyText',

    // Plaintext / recovered text (Root and Nested)
    'plaintext', '*.plaintext',
    'text', '*.text',
    'ciphertext', '*.ciphertext'
];

export const REDACT_CENSOR = '[REDACTED]';
