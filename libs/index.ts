export { Alphabet } from './cipher/alphabet.js';
export { Key } from './cipher/key.js';
export type { KeyOptions } from './cipher/key.js';
export { CipherEngine } from './cipher/engine.js';
export { generateKeyedAlphabet, keyedAlphabets, DEFAULT_BASE_ALPHABET } from './cipher/keyedAlphabet.js';
export { CIPHER_MODES } from './cipher/types.js';
export type {
    CipherMode,
    TransformDirection,
    TransformResult,
    TrialResult,
    KeyIndexRange,
    BruteForceResultSet,
    OrchestrationTrialResult,
    OrchestrationResultSet
} from './cipher/types.js';

export { KeySpace, candidateCount } from './search/keySpace.js';
export { BruteForceSearch } from './search/bruteForce.js';
export type { BruteForceOptions } from './search/bruteForce.js';
export { Orchestrator } from './orchestration/orchestrator.js';
export type { OrchestrationOptions } from './orchestration/orchestrator.js';
export { runTrials } from './execution/trialScheduler.js';
export type { TrialRunOptions, TrialRunOutcome } from './execution/trialScheduler.js';

export {
    CipherError,
    InvalidAlphabetError,
    InvalidKeyError,
    EmptyInputError,
    CombinatorialLimitExceededError,
    InputValidationError,
    ConfigurationError
} from './errors/cipherErrors.js';
export type { CipherErrorCode } from './errors/cipherErrors.js';
export { describeFailure } from './errors/sanitizer.js';
export type { TransformFailure } from './errors/sanitizer.js';

export { loadEngineConfig, DEFAULT_ENGINE_CONFIG } from './bootstrap/config/engine-config.js';
export type { EngineConfig } from './bootstrap/config/engine-config.js';
export { parseList, parseLines, parseAlphabetList } from './parsing/listParser.js';
export { normalizeText, validateInput, prepareText } from './parsing/text.js';
export type { NormalizeOptions, TextLimits } from './parsing/text.js';
export { handleTransform, handleBruteForce, handleOrchestration } from './requests/handlers.js';
export { logger } from './logging/logger.js';
