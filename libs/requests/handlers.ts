/**
 * Request handlers for raw caller input (CLI arguments, batch files parsed
 * upstream). Input is validated at this boundary, then turned into Alphabet
 * and Key values before any transform runs.
 */

import { Alphabet } from '../cipher/alphabet.js';
import { CipherEngine } from '../cipher/engine.js';
import { BruteForceResultSet, OrchestrationResultSet, TransformResult } from '../cipher/types.js';
import { BruteForceSearch } from '../search/bruteForce.js';
import { Orchestrator } from '../orchestration/orchestrator.js';
import { createValidator } from '../validation/zod-middleware.js';
import {
    BruteForceRequestSchema,
    OrchestrationRequestSchema,
    TransformRequestSchema
} from '../validation/schema.js';

const validateTransform = createValidator(TransformRequestSchema);
const validateBruteForce = createValidator(BruteForceRequestSchema);
const validateOrchestration = createValidator(OrchestrationRequestSchema);

/**
 * Single transform. Construction and empty-input errors propagate.
 */
export function handleTransform(input: unknown): TransformResult {
    const request = validateTransform(input, 'TransformRequest');
    const engine = CipherEngine.create(Alphabet.create(request.alphabet), request.key, request.mode);

    return {
        text: engine.transform(request.text, request.direction),
        success: true,
        alphabet: engine.alphabet.toString(),
        key: engine.key.toString(),
        mode: engine.mode,
        direction: request.direction
    };
}

export async function handleBruteForce(
    input: unknown,
    search: BruteForceSearch = new BruteForceSearch(),
    signal?: AbortSignal
): Promise<BruteForceResultSet> {
    const request = validateBruteForce(input, 'BruteForceRequest');
    return search.run(
        request.ciphertext,
        Alphabet.create(request.alphabet),
        request.keyLength,
        request.mode,
        { range: request.range, signal }
    );
}

/**
 * Every alphabet must be valid before the run starts; key problems are
 * recorded per pair.
 */
export async function handleOrchestration(
    input: unknown,
    orchestrator: Orchestrator = new Orchestrator(),
    signal?: AbortSignal
): Promise<OrchestrationResultSet> {
    const request = validateOrchestration(input, 'OrchestrationRequest');
    const alphabets = request.alphabets.map(text => Alphabet.create(text));
    return orchestrator.run(request.ciphertext, alphabets, request.keys, request.mode, {
        strict: request.strict,
        signal
    });
}
