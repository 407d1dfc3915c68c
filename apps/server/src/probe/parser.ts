import { ProbeMetrics } from "../types";

const packetStatsPattern = /(\d+) packets? transmitted, (\d+) received/i;
const packetLossPattern = /(\d+(?:\.\d+)?)% packet loss/i;
const rttSummaryPattern = /rtt min\/avg\/max\/mdev = ([\d.]+)\/([\d.]+)\/([\d.]+)\/([\d.]+) ms/i;

const lastNonBlankLine = (output: string): string => {
  const lines = output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines.length > 0 ? lines[lines.length - 1] : "";
};

/**
 * Extracts packet counters, loss and the RTT quartet from `ping` output.
 *
 * Output from other platforms or locales still yields counters (defaulting to
 * `requestedCount` sent, none received) and the last non-blank stdout line as
 * `rawSummary`.
 */
export const parseProbeOutput = (stdout: string, stderr: string, requestedCount: number): ProbeMetrics => {
  let transmitted = requestedCount;
  let received = 0;

  const statsMatch = stdout.match(packetStatsPattern);
  if (statsMatch) {
    transmitted = Number(statsMatch[1]);
    received = Number(statsMatch[2]);
  }

  let lossPct = 100;
  const lossMatch = stdout.match(packetLossPattern);
  if (lossMatch) {
    lossPct = Number(lossMatch[1]);
  } else if (transmitted > 0) {
    lossPct = 100 * (1 - received / transmitted);
  }

  const metrics: ProbeMetrics = {
    transmitted,
    received,
    lossPct,
    rawSummary: ""
  };

  const rttMatch = stdout.match(rttSummaryPattern);
  if (rttMatch) {
    metrics.rttMin = Number(rttMatch[1]);
    metrics.rttAvg = Number(rttMatch[2]);
    metrics.rttMax = Number(rttMatch[3]);
    metrics.rttMdev = Number(rttMatch[4]);
    metrics.rawSummary = rttMatch[0];
  }

  if (!metrics.rawSummary && stdout.trim()) {
    metrics.rawSummary = lastNonBlankLine(stdout);
  }

  const trimmedStderr = stderr.trim();
  if (trimmedStderr) {
    metrics.error = trimmedStderr;
  }

  return metrics;
};
