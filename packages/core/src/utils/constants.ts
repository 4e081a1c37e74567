// packages/core/src/utils/constants.ts -- Shared magic number constants

/** HTTP 429 Too Many Requests status code */
export const HTTP_TOO_MANY_REQUESTS = 429;

/** Confidence assigned when no intent pattern matches */
export const DEFAULT_CLASSIFICATION_CONFIDENCE = 0.3;

/** Below this confidence the router asks for clarification */
export const CLARIFICATION_CONFIDENCE_THRESHOLD = 0.5;

/** Mood transitions kept per persona */
export const MOOD_HISTORY_LIMIT = 50;

/** Upper bound on an image description */
export const IMAGE_DESCRIPTION_MAX_LENGTH = 500;

/** Default timeout for text model calls in milliseconds */
export const DEFAULT_TEXT_TIMEOUT_MS = 30_000;

/** Default timeout for image model calls in milliseconds */
export const DEFAULT_IMAGE_TIMEOUT_MS = 60_000;

/** Default max output tokens for text generation */
export const DEFAULT_MAX_OUTPUT_TOKENS = 2048;

/** Longest user message accepted by the pipeline */
export const MAX_INPUT_LENGTH = 4000;

/** Reply used when the pipeline has nothing better to say */
export const APOLOGY_RESPONSE = "Oh my darling, it seems my response got lost in the kitchen! Let me try again with even more love and tomatoes! 🍅❤️";

/** Reply used when the orchestrator itself fails */
export const CATASTROPHIC_RESPONSE = 'Oh my stars! Something went terribly wrong in my kitchen! Let me try again... 🍅💔';
