import { UTCDate } from "@date-fns/utc";
import { format } from "date-fns";

export interface PerformanceMetrics {
  /** UTC wall-clock time, millisecond precision. */
  time: string;
  /** Resident set size, e.g. "42.17 MB". */
  memory: string;
  /**
   * Always 1: the count of threads running request code. Node exposes neither the
   * process thread count nor libuv thread-pool activity, so pool threads are not counted.
   */
  threads: number;
}

const BYTES_PER_MB = 1024 * 1024;

export function getPerformanceMetrics(
  now: Date = new Date(),
  rssBytes: number = process.memoryUsage.rss()
): PerformanceMetrics {
  return {
    time: format(new UTCDate(now.getTime()), "yyyy-MM-dd HH:mm:ss.SSS"),
    memory: `${(rssBytes / BYTES_PER_MB).toFixed(2)} MB`,
    threads: 1,
  };
}
