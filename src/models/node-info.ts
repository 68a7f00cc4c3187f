/**
 * Result of the `get_node_info` RPC.
 */

import { z } from "zod";

import { parseJsonOutput } from "./json.js";

export const NodeInfoSchema = z.object({
  address: z.string(),
  eth_address: z.string().default(""),
  alias: z.string().default(""),
  is_running: z.boolean().optional(),
});

export interface NodeInfo {
  address: string;
  ethAddress: string;
  alias: string;
  /** Present when the node reports its own run state. */
  isRunning?: boolean;
}

/**
 * @throws ParseError
 */
export function parseNodeInfo(raw: string): NodeInfo {
  const data = parseJsonOutput(raw, NodeInfoSchema, "get_node_info");
  return {
    address: data.address,
    ethAddress: data.eth_address,
    alias: data.alias,
    ...(data.is_running !== undefined ? { isRunning: data.is_running } : {}),
  };
}
