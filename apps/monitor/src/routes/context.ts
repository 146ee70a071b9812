import type { DeviceDescriptor } from '@netpulse/shared';
import type { DeviceRegistry } from '../services/deviceRegistry';
import type { MonitorStore } from '../services/monitorStore';

/** What the read-only query routes need; they never write */
export interface QueryContext {
  registry: DeviceRegistry;
  store: MonitorStore;
  timeZone: string;
  now?: () => Date;
}

export const NO_DATA = { data: null, message: 'no data' } as const;

export function currentTime(ctx: QueryContext): Date {
  return ctx.now ? ctx.now() : new Date();
}

export function deviceNotFound(name: string) {
  return { error: 'Device not found.', device: name };
}

export function findDevice(ctx: QueryContext, name: string): DeviceDescriptor | undefined {
  return ctx.registry.get(name);
}
