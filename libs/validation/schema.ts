import { z } from 'zod';
import { CIPHER_MODES } from '../cipher/types.js';

/**
 * Request schemas for the batch APIs.
 * Alphabet and key strings are checked for shape here; symbol-level rules
 * (duplicates, membership) belong to Alphabet.create and Key.create.
 */

export const CipherModeSchema = z.enum(CIPHER_MODES);

export const DirectionSchema = z.enum(['encrypt', 'decrypt']);

const AlphabetTextSchema = z.string().min(2);
const KeyTextSchema = z.string().min(1);

export const TransformRequestSchema = z.object({
    alphabet: AlphabetTextSchema,
    key: KeyTextSchema,
    text: z.string().min(1),
    mode: CipherModeSchema.default('classic'),
    direction: DirectionSchema,
});

export const BruteForceRequestSchema = z.object({
    ciphertext: z.string().min(1),
    alphabet: AlphabetTextSchema,
    keyLength: z.number().int().positive(),
    mode: CipherModeSchema.default('classic'),
    range: z.object({
        start: z.number().int().nonnegative(),
        end: z.number().int().nonnegative(),
    }).refine(r => r.start <= r.end, { message: 'range.start must not exceed range.end' }).optional(),
});

export const OrchestrationRequestSchema = z.object({
    ciphertext: z.string().min(1),
    alphabets: z.array(AlphabetTextSchema).min(1),
    keys: z.array(KeyTextSchema).min(1),
    mode: CipherModeSchema.default('classic'),
    strict: z.boolean().default(true),
});

export type TransformRequest = z.infer<typeof TransformRequestSchema>;
export type BruteForceRequest = z.infer<typeof BruteForceRequestSchema>;
export type OrchestrationRequest = z.infer<typeof OrchestrationRequestSchema>;

