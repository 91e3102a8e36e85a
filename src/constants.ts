// src/constants.ts
export const CLI_NAME = "sumwatch";

// Bytes per read when checksumming; bounds memory for arbitrarily large files.
export const DEFAULT_CHUNK_SIZE = 8192;

// Work/result queue slots per worker.
export const QUEUE_SLOTS_PER_WORKER = 4;

// Directory reads in flight inside the walker.
export const WALK_CONCURRENCY = 16;

// Walk entries held before the directory stream is paused.
export const ENTRY_BUFFER = 256;
