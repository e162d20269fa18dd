export const NOISE_MSG_MAX_LENGTH_BYTES = 65535;
export const NOISE_MSG_MAX_LENGTH_BYTES_WITHOUT_TAG = NOISE_MSG_MAX_LENGTH_BYTES - 16;

export const DEFAULT_PROTOCOL = 'Noise_XX_25519_ChaChaPoly_SHA256';

// Staged pre-handshake data above this size is spread over every handshake message this side writes.
export const STAGING_CHUNK_THRESHOLD = 0x1000;

export const DUMP_SESSION_KEYS = Boolean(process.env.DUMP_SESSION_KEYS);
