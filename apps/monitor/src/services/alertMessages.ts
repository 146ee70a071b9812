/**
 * Message formatting for notifications. Output is Telegram Markdown (legacy
 * mode), which the webhook channel forwards as-is.
 */

import {
  formatBytes,
  type InterfaceDownEvent,
  type InterfaceUpEvent,
  type MonthlyMetricSummary,
  type MonthlyRecord,
  type ThresholdBreachEvent
} from '@netpulse/shared';

export type InterfaceChangeEvent = InterfaceDownEvent | InterfaceUpEvent;

/** Escape the characters legacy Markdown treats as markup */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

function formatPercent(value: number | null): string {
  return value === null ? 'n/a' : `${Number(value.toFixed(2))}%`;
}

/**
 * One message per device per pass, listing every interface that changed.
 */
export function formatInterfaceChanges(device: string, events: InterfaceChangeEvent[]): string {
  const lines = events.map((event) => {
    const status = event.type === 'interface_down' ? 'DOWN' : 'UP';
    return `• ${escapeMarkdown(event.interfaceLabel)}: *${status}*`;
  });
  return [`*${escapeMarkdown(device)}*: interface status changed`, ...lines].join('\n');
}

export function formatThresholdBreach(event: ThresholdBreachEvent): string {
  const metric = event.metric === 'cpu' ? 'CPU' : 'RAM';
  return `*${escapeMarkdown(event.device)}*: ${metric} at ${formatPercent(event.value)} exceeds ${formatPercent(event.threshold)}`;
}

function formatMetric(label: string, summary: MonthlyMetricSummary): string {
  return `${label}: avg ${formatPercent(summary.average)}, peak ${formatPercent(summary.peak)}`;
}

export function formatMonthlyReport(record: MonthlyRecord): string {
  const lines = [
    `*Monthly report: ${escapeMarkdown(record.device)}* (${record.month})`,
    `Days: ${record.days}, samples: ${record.samples}, failed polls: ${record.failedPolls}`,
    formatMetric('CPU', record.cpu),
    formatMetric('RAM', record.ram),
    `Traffic: in ${formatBytes(record.totals.inBytes, 2, 'GB')}, out ${formatBytes(record.totals.outBytes, 2, 'GB')}`,
    `Flaps: ${record.totals.flaps}`
  ];

  const interfaces = Object.entries(record.interfaces).sort(([a], [b]) => a.localeCompare(b));
  if (interfaces.length > 0) {
    lines.push('');
    for (const [label, summary] of interfaces) {
      lines.push(
        `• ${escapeMarkdown(label)}: in ${formatBytes(summary.inBytes, 2, 'GB')}, ` +
          `out ${formatBytes(summary.outBytes, 2, 'GB')}, flaps ${summary.flaps}, last ${summary.lastStatus}`
      );
    }
  }

  return lines.join('\n');
}

/** Problems the monitor cannot clear on its own */
export function formatMonitorError(summary: string, detail: string): string {
  return `*Monitoring error*: ${escapeMarkdown(summary)}\n${escapeMarkdown(detail)}`;
}
