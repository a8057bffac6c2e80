import { InvalidArgumentError } from "commander";

import type { PipelineSummary } from "./etl/types.js";

export const DEFAULT_ID_RANGE = { start: 1, end: 20 } as const;

export type IdSelection = {
  ids?: number[];
  startId?: number;
  endId?: number;
};

export function toPositiveInt(v: string): number {
  const trimmed = v.trim();
  const n = Number.parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || !Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${v}".`);
  }
  return n;
}

/** Parser for a variadic `--ids` option: each value is appended to the previous ones. */
export function collectId(value: string, previous: number[] | undefined): number[] {
  return [...(previous ?? []), toPositiveInt(value)];
}

/**
 * Turns the id flags into the ordered list of ids to process:
 * explicit `--ids` as given, `--start-id`..`--end-id` inclusive (a lone
 * `--start-id` means just that id), otherwise the default range.
 */
export function resolveIds(sel: IdSelection): number[] {
  if (sel.ids && sel.ids.length > 0) {
    if (sel.startId !== undefined || sel.endId !== undefined) {
      throw new InvalidArgumentError("--ids cannot be combined with --start-id/--end-id.");
    }
    return [...sel.ids];
  }

  if (sel.startId === undefined) {
    if (sel.endId !== undefined) throw new InvalidArgumentError("--end-id requires --start-id.");
    return range(DEFAULT_ID_RANGE.start, DEFAULT_ID_RANGE.end);
  }

  const end = sel.endId ?? sel.startId;
  if (end < sel.startId) {
    throw new InvalidArgumentError(`--end-id (${end}) must not be below --start-id (${sel.startId}).`);
  }
  return range(sel.startId, end);
}

/**
 * 1 when the API was unreachable for every id, or when `failOnError` is set
 * and any id failed; otherwise 0, even with per-id failures.
 */
export function exitCodeFor(
  summary: Pick<PipelineSummary, "failed" | "networkUnreachable">,
  opts: { failOnError: boolean }
): 0 | 1 {
  if (summary.networkUnreachable) return 1;
  if (opts.failOnError && summary.failed.length > 0) return 1;
  return 0;
}

function range(start: number, end: number): number[] {
  return Array.from({ length: end - start + 1 }, (_, i) => start + i);
}
