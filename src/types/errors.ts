/** The source tree of an entity cannot be watched (missing, unreadable, removed). */
export class WatchError extends Error {
  readonly entityId: string;

  constructor(entityId: string, message: string) {
    super(message);
    this.name = 'WatchError';
    this.entityId = entityId;
  }
}

/** A snapshot attempt failed; the staged artifact has been discarded. */
export class SnapshotError extends Error {
  readonly entityId: string;

  constructor(entityId: string, message: string) {
    super(message);
    this.name = 'SnapshotError';
    this.entityId = entityId;
  }
}

/** An expired snapshot could not be deleted. Non-fatal; retried on the next pruning pass. */
export class RetentionError extends Error {
  readonly entityId: string;
  readonly snapshotId: string;

  constructor(entityId: string, snapshotId: string, message: string) {
    super(message);
    this.name = 'RetentionError';
    this.entityId = entityId;
    this.snapshotId = snapshotId;
  }
}

export class RestoreError extends Error {
  readonly entityId: string;
  readonly snapshotId: string;

  constructor(entityId: string, snapshotId: string, message: string) {
    super(message);
    this.name = 'RestoreError';
    this.entityId = entityId;
    this.snapshotId = snapshotId;
  }
}

export class EntityNotFoundError extends Error {
  readonly entityId: string;

  constructor(entityId: string) {
    super(`Entity '${entityId}' is not registered.`);
    this.name = 'EntityNotFoundError';
    this.entityId = entityId;
  }
}

export class ProfileValidationError extends Error {
  readonly entityId: string;
  readonly hints: string[];

  constructor(entityId: string, hints: string[]) {
    super(`Profile '${entityId}' is invalid: ${hints.join(' ')}`);
    this.name = 'ProfileValidationError';
    this.entityId = entityId;
    this.hints = hints;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
