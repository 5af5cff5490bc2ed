export class SnapshotDataError extends Error {
  constructor(message: string, public readonly observed?: Record<string, unknown>) {
    super(`[SNAPSHOT_DATA] ${message}`);
    this.name = 'SnapshotDataError';
  }
}

export class InsufficientSnapshotsError extends Error {
  constructor(public readonly usable: number, context = 'simulation') {
    super(`[INSUFFICIENT_SNAPSHOTS] ${context} needs at least 2 snapshots, got ${usable}`);
    this.name = 'InsufficientSnapshotsError';
  }
}

export class SweepAbortedError extends Error {
  constructor(public readonly cadenceLabel?: string) {
    super(cadenceLabel ? `Sweep aborted during cadence ${cadenceLabel}` : 'Sweep aborted');
    this.name = 'SweepAbortedError';
  }
}
