import { isRecord } from "../lib/guards";

interface CpuStats {
  cpu_usage?: { total_usage?: number; percpu_usage?: number[] | null };
  system_cpu_usage?: number;
  online_cpus?: number;
}

/**
 * The subset of an engine stats sample used to build a MetricSet.
 */
export interface StatsSample {
  read: string;
  cpu_stats: CpuStats;
  precpu_stats?: CpuStats;
  memory_stats?: {
    usage?: number;
    limit?: number;
    stats?: Record<string, number>;
  };
  networks?: Record<string, { rx_bytes?: number; tx_bytes?: number }>;
  blkio_stats?: {
    io_service_bytes_recursive?: Array<{ op?: string; value?: number }> | null;
  };
  pids_stats?: { current?: number };
}

export interface MetricSet {
  timestamp: string;
  cpuPercent: number;
  memory: { usage: number; limit: number; percent: number };
  net: { in: number; out: number };
  block: { read: number; write: number };
  pids: number;
}

function isStatsSample(value: unknown): value is StatsSample {
  return (
    isRecord(value) &&
    typeof value.read === "string" &&
    isRecord(value.cpu_stats)
  );
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Parse one JSON line of a streaming stats response.
 */
export function parseStatsLine(line: string): StatsSample | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith("{")) return null;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isStatsSample(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * CPU usage across all cores, as `docker stats` reports it.
 */
export function cpuPercent(sample: StatsSample): number {
  const cpu = sample.cpu_stats;
  const pre = sample.precpu_stats ?? {};
  const cpuDelta =
    (cpu.cpu_usage?.total_usage ?? 0) - (pre.cpu_usage?.total_usage ?? 0);
  const systemDelta =
    (cpu.system_cpu_usage ?? 0) - (pre.system_cpu_usage ?? 0);
  if (cpuDelta <= 0 || systemDelta <= 0) return 0;

  const cpus = cpu.online_cpus || cpu.cpu_usage?.percpu_usage?.length || 1;
  return round2((cpuDelta / systemDelta) * cpus * 100);
}

/**
 * Memory in use minus the inactive page cache (cgroup v1 or v2 key).
 */
export function memoryUsage(sample: StatsSample): MetricSet["memory"] {
  const raw = sample.memory_stats?.usage ?? 0;
  const limit = sample.memory_stats?.limit ?? 0;
  const stats = sample.memory_stats?.stats ?? {};
  const inactive = stats.total_inactive_file ?? stats.inactive_file ?? 0;
  const usage = inactive < raw ? raw - inactive : raw;
  return {
    usage,
    limit,
    percent: limit > 0 ? round2((usage / limit) * 100) : 0,
  };
}

/**
 * Received and transmitted bytes summed over all interfaces.
 */
export function networkTotals(sample: StatsSample): MetricSet["net"] {
  let rx = 0;
  let tx = 0;
  for (const iface of Object.values(sample.networks ?? {})) {
    rx += iface.rx_bytes ?? 0;
    tx += iface.tx_bytes ?? 0;
  }
  return { in: rx, out: tx };
}

export function blockIo(sample: StatsSample): MetricSet["block"] {
  let read = 0;
  let write = 0;
  for (const entry of sample.blkio_stats?.io_service_bytes_recursive ?? []) {
    const op = entry.op?.toLowerCase();
    if (op === "read") read += entry.value ?? 0;
    else if (op === "write") write += entry.value ?? 0;
  }
  return { read, write };
}

export function toMetricSet(sample: StatsSample): MetricSet {
  return {
    timestamp: sample.read,
    cpuPercent: cpuPercent(sample),
    memory: memoryUsage(sample),
    net: networkTotals(sample),
    block: blockIo(sample),
    pids: sample.pids_stats?.current ?? 0,
  };
}
