export const WORKER_CATEGORIES = ["load", "decode", "eval"] as const;

export type WorkerCategory = (typeof WORKER_CATEGORIES)[number];

export interface Interval {
  readonly key: string;
  readonly startNs: bigint;
  readonly endNs: bigint;
}

export interface WorkerProfile {
  readonly node: bigint;
  /** As written by the engine; not necessarily the category the profile is filed under. */
  readonly workerType: string;
  readonly workerNum: bigint;
  readonly intervals: readonly Interval[];
}

export type ProfilesByCategory = Readonly<Record<WorkerCategory, readonly WorkerProfile[]>>;

export interface ProfilerDump {
  readonly globalStartNs: bigint;
  readonly globalEndNs: bigint;
  readonly profiles: ProfilesByCategory;
}
