/**
 * Base interface for all pack events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the pack run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted once the root has been validated and the ignore rules loaded.
 */
export interface PackStarted extends BaseEvent {
  type: 'PackStarted';
  payload: {
    /** Absolute traversal root */
    rootPath: string;
    /** Absolute path of the output artifact */
    outputPath: string;
    /** Number of `.gitignore` and configured patterns in effect */
    patternCount: number;
  };
}

/** Emitted after a file entry has been appended to the artifact */
export interface FilePacked extends BaseEvent {
  type: 'FilePacked';
  payload: {
    path: string;
    chars: number;
  };
}

/** Emitted when an eligible file could not be read */
export interface FileSkipped extends BaseEvent {
  type: 'FileSkipped';
  payload: {
    path: string;
    reason: string;
  };
}

/** Emitted when traversal finishes */
export interface PackCompleted extends BaseEvent {
  type: 'PackCompleted';
  payload: {
    fileCount: number;
    totalChars: number;
    skippedCount: number;
  };
}

/** Emitted when the run is interrupted */
export interface PackCancelled extends BaseEvent {
  type: 'PackCancelled';
  payload: {
    /** Files already written before the interrupt */
    fileCount: number;
  };
}

export type PackEvent = PackStarted | FilePacked | FileSkipped | PackCompleted | PackCancelled;

export type PackEventType = PackEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for a new event, stamped with the current time.
 */
export function eventMeta(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
