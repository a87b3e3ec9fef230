/**
 * Platform Detection and Load
 *
 * Host facts for startup logging, plus the load indicator fed to the
 * adaptive quality controller.
 */

import * as os from "os";
import * as v8 from "v8";

/**
 * Platform constants
 */
export const PLATFORM = {
  PLATFORM: process.platform,
  ARCH: process.arch,
  CPU_COUNT: Math.max(1, os.cpus().length),
  TOTAL_MEMORY: os.totalmem(),
  NODE_VERSION: process.versions.node,
} as const;

/**
 * CPU load in [0, 1]: the one-minute load average per core
 *
 * Always 0 on Windows, where os.loadavg() is not implemented.
 */
export function cpuLoad(loadAverage: number = os.loadavg()[0], cpuCount: number = PLATFORM.CPU_COUNT): number {
  return Math.max(0, Math.min(1, loadAverage / Math.max(1, cpuCount)));
}

/**
 * Heap pressure in [0, 1]: used heap against the heap size limit
 */
export function memoryPressure(heap: Pick<v8.HeapInfo, "used_heap_size" | "heap_size_limit"> = v8.getHeapStatistics()): number {
  if (heap.heap_size_limit <= 0) return 0;
  return Math.max(0, Math.min(1, heap.used_heap_size / heap.heap_size_limit));
}

/**
 * Combined load indicator: the higher of CPU load and heap pressure
 */
export function systemLoad(): number {
  return Math.max(cpuLoad(), memoryPressure());
}
