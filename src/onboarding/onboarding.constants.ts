export const JOIN_CODE_LENGTH = 5;
export const JOIN_CODE_TTL_MS = 3 * 24 * 60 * 60 * 1000; // 3 days
export const JOIN_CODE_MAX_ATTEMPTS = 10;
