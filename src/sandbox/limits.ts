/** Largest source document accepted, in UTF-8 bytes (1MB). */
export const MAX_SOURCE_BYTES = 1024 * 1024;

/** Memory ceiling per running application (16MB). */
export const MEMORY_LIMIT_BYTES = 16 * 1024 * 1024;

export const SOURCE_EXTENSION = '.prism';
