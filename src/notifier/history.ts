import type { NotifierResponse } from "./handler";

export type RunTrigger = "http" | "api" | "schedule" | "cli";

export type RunHistoryEntry = Readonly<{
  trigger: RunTrigger;
  startedAt: Date;
  finishedAt: Date;
  response: NotifierResponse;
}>;

export type RunHistory = {
  readonly record: (entry: RunHistoryEntry) => void;
  readonly list: (limit?: number) => ReadonlyArray<RunHistoryEntry>;
  readonly latest: () => RunHistoryEntry | null;
};

export const DEFAULT_HISTORY_SIZE = 20;

/**
 * Keeps the most recent runs in memory, newest first. Lost on restart.
 */
export function createRunHistory(capacity = DEFAULT_HISTORY_SIZE): RunHistory {
  const entries: Array<RunHistoryEntry> = [];

  return {
    record: (entry) => {
      entries.unshift(entry);
      if (entries.length > capacity) {
        entries.length = capacity;
      }
    },
    list: (limit) => entries.slice(0, limit ?? capacity),
    latest: () => entries[0] ?? null,
  };
}
