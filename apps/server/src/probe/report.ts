import { escapeHtml } from "../notify/notifier";
import { ProbeResult } from "../types";

const formatNumber = (value: number, digits = 2): string => value.toFixed(digits).replace(/\.?0+$/, "");

export const formatReport = (jobName: string, result: ProbeResult): string => {
  const lines = [
    `<b>📡 Ping Report — ${escapeHtml(jobName)}</b>`,
    "",
    `🎯 <b>Target:</b> ${escapeHtml(result.target)}`,
    `📦 <b>Test:</b> ${result.count} packets (interval ${formatNumber(result.intervalSec, 3)}s)`,
    "",
    "📊 <b>Results:</b>",
    `• <b>Sent:</b> ${result.transmitted}`,
    `• <b>Received:</b> ${result.received}`,
    `• <b>Packet Loss:</b> ${result.lossPct.toFixed(1)}%`
  ];

  const { rttMin, rttAvg, rttMax, rttMdev } = result;
  if (rttMin !== undefined && rttAvg !== undefined && rttMax !== undefined) {
    lines.push(
      "",
      "⏱ <b>Latency (RTT):</b>",
      `• <b>Min:</b> ${formatNumber(rttMin)} ms`,
      `• <b>Avg:</b> ${formatNumber(rttAvg)} ms`,
      `• <b>Max:</b> ${formatNumber(rttMax)} ms`
    );
    if (rttMdev !== undefined) {
      lines.push(`• <b>Jitter:</b> ${formatNumber(rttMdev)} ms`);
    }
  } else if (result.rawSummary) {
    lines.push("", `ℹ️ <b>Summary:</b> ${escapeHtml(result.rawSummary)}`);
  } else {
    lines.push("", "ℹ️ <b>Latency:</b> Not available");
  }

  if (result.error) {
    lines.push("", `⚠️ <b>Note:</b> ${escapeHtml(result.error)}`);
  }

  return lines.join("\n");
};

export const formatSkippedNotice = (jobName: string): string =>
  `⚠️ <b>Job skipped:</b> <code>${escapeHtml(jobName)}</code>\nMissing target.`;

export const formatNotFoundNotice = (jobName: string): string =>
  `❌ <b>Job not found:</b> <code>${escapeHtml(jobName)}</code>`;

export const formatRunningNotice = (jobName: string): string =>
  `▶️ <b>Running now:</b> <code>${escapeHtml(jobName)}</code>`;
