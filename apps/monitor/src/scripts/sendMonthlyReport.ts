/**
 * One-shot: rebuild and send the monthly report of every configured device.
 *
 * Usage:
 *   tsx apps/monitor/src/scripts/sendMonthlyReport.ts
 *   tsx apps/monitor/src/scripts/sendMonthlyReport.ts --month=2026-02
 *
 * Defaults to the previous calendar month. Reports are delivered directly, not
 * through the queue; nothing is archived and the rollover checkpoint is not
 * touched, so the scheduled rollover still runs as usual.
 */

import 'dotenv/config';
import { monthSchema } from '@netpulse/shared';
import { validateConfig } from '../config/validate';
import { loadDeviceRegistry } from '../services/deviceRegistry';
import { FileMonitorStore } from '../services/monitorStore';
import { createDeliveryNotifier } from '../services/notifierSetup';
import { RolloverEngine } from '../services/rollover';
import { calendarMonth, previousMonth } from '../utils/calendar';

export function resolveReportMonth(argv: readonly string[], now: Date, timeZone: string): string {
  const flag = argv.find((arg) => arg.startsWith('--month='));
  if (!flag) {
    return previousMonth(calendarMonth(now, timeZone));
  }

  const parsed = monthSchema.safeParse(flag.slice('--month='.length));
  if (!parsed.success) {
    throw new Error(`Invalid --month value: ${parsed.error.issues[0]?.message ?? 'expected YYYY-MM'}`);
  }
  return parsed.data;
}

async function main(): Promise<void> {
  const config = validateConfig();
  const now = new Date();
  const month = resolveReportMonth(process.argv.slice(2), now, config.MONITOR_TIMEZONE);
  const registry = await loadDeviceRegistry(config.DEVICES_FILE);

  const rollover = new RolloverEngine({
    store: new FileMonitorStore(config.DATA_DIR),
    notifier: createDeliveryNotifier(config),
    devices: registry.devices,
    timeZone: config.MONITOR_TIMEZONE,
    recipients: new Set(config.TELEGRAM_CHAT_IDS)
  });

  console.log(`[MonthlyReport] Sending reports for ${month}`);
  const reports = await rollover.resendReports(month, now);
  console.log(`[MonthlyReport] Processed ${reports.length} of ${registry.devices.length} device(s)`);
}

// Only run when executed directly, not when imported by tests
if (import.meta.url === `file://${process.argv[1]}`) {
  main()
    .then(() => process.exit(0))
    .catch((error) => {
      console.error('[MonthlyReport] Failed:', error);
      process.exit(1);
    });
}
