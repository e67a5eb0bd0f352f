/**
 * Effect platform layer selection
 *
 * All file access goes through the Effect FileSystem service; this module
 * decides which platform layer provides it.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer providing FileSystem, Path and friends
 *
 * @returns Node.js platform layer
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
