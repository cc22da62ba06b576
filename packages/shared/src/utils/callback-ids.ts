/**
 * Callback id generation
 *
 * Format: <prefix>_<hex>
 * - Timers: timer_a1b2c3d4e5f6a7b8
 * - Processes: process_a1b2c3d4e5f6a7b8
 * - Readiness watches: socket_a1b2c3d4e5f6a7b8
 */

import { randomBytes } from "node:crypto";

export function generateCallbackId(prefix: string): string {
  return `${prefix}_${randomBytes(8).toString("hex")}`;
}
