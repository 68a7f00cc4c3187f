/**
 * Result of the `get_node_history` RPC: resource usage series aligned to
 * `timestamps`, plus a few scalar fields about the node.
 */

import { z } from "zod";

import { parseJsonOutput } from "./json.js";

const Series = z.array(z.number().nullable()).nullable().default([]);

/** ISO strings pass through; numbers are epoch seconds. */
const Timestamp = z
  .union([z.string(), z.number()])
  .transform((ts) => (typeof ts === "number" ? new Date(ts * 1000).toISOString() : ts));

export const NodeHistorySchema = z.object({
  timestamps: z.array(Timestamp).default([]),
  cpu_load: Series,
  occupied_memory: Series,
  gpu_load: Series,
  gpu_occupied_memory: Series,
  uptime: z.string().nullable().default(""),
  current_epoch: z.number().nullable().default(0),
  current_epoch_avail: z.number().nullable().default(0),
  version: z.string().nullable().default(""),
});

export interface NodeHistory {
  timestamps: string[];
  cpuLoad: number[];
  occupiedMemory: number[];
  gpuLoad: number[];
  gpuOccupiedMemory: number[];
  uptime: string;
  currentEpoch: number;
  currentEpochAvail: number;
  version: string;
}

/**
 * Fit a series to `length` points: left-pad with zeros when short, keep
 * the most recent points when long. Missing samples become 0.
 */
export function alignSeries(series: readonly (number | null)[], length: number): number[] {
  const values = series.map((v) => v ?? 0);
  if (values.length > length) {
    return length === 0 ? [] : values.slice(-length);
  }
  if (values.length < length) {
    return [...new Array<number>(length - values.length).fill(0), ...values];
  }
  return values;
}

/**
 * Keep only the most recent `limit` points of every series.
 */
export function limitHistory(history: NodeHistory, limit: number): NodeHistory {
  if (limit <= 0 || history.timestamps.length <= limit) {
    return history;
  }
  const timestamps = history.timestamps.slice(-limit);
  return {
    ...history,
    timestamps,
    cpuLoad: alignSeries(history.cpuLoad, timestamps.length),
    occupiedMemory: alignSeries(history.occupiedMemory, timestamps.length),
    gpuLoad: alignSeries(history.gpuLoad, timestamps.length),
    gpuOccupiedMemory: alignSeries(history.gpuOccupiedMemory, timestamps.length),
  };
}

/**
 * Decode and align a history payload.
 *
 * @throws ParseError
 */
export function parseNodeHistory(raw: string): NodeHistory {
  const data = parseJsonOutput(raw, NodeHistorySchema, "get_node_history");
  const n = data.timestamps.length;
  return {
    timestamps: data.timestamps,
    cpuLoad: alignSeries(data.cpu_load ?? [], n),
    occupiedMemory: alignSeries(data.occupied_memory ?? [], n),
    gpuLoad: alignSeries(data.gpu_load ?? [], n),
    gpuOccupiedMemory: alignSeries(data.gpu_occupied_memory ?? [], n),
    uptime: data.uptime ?? "",
    currentEpoch: data.current_epoch ?? 0,
    currentEpochAvail: data.current_epoch_avail ?? 0,
    version: data.version ?? "",
  };
}
