import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { deviceParamSchema, type LinkState, type PersistedDeviceState } from '@netpulse/shared';
import { averageOf } from '../services/dailyAccumulator';
import { NO_DATA, deviceNotFound, findDevice, type QueryContext } from './context';

export type DeviceHealth = 'unknown' | 'unreachable' | 'degraded' | 'up';

export function summarizeHealth(state: PersistedDeviceState | null): DeviceHealth {
  if (!state) return 'unknown';
  if (state.consecutiveFailures > 0) return 'unreachable';
  if (!state.lastReading) return 'unknown';
  return Object.values(state.interfaces).some((iface) => iface.link === 'down') ? 'degraded' : 'up';
}

export function createDeviceRoutes(ctx: QueryContext) {
  const routes = new Hono();

  routes.get('/', async (c) => {
    const data = await Promise.all(
      ctx.registry.devices.map(async (device) => {
        const state = await ctx.store.loadDeviceState(device.name);
        return {
          name: device.name,
          address: device.address,
          interfaces: device.interfaces.length,
          health: summarizeHealth(state),
          lastSeen: state?.lastReading?.timestamp ?? null
        };
      })
    );
    return c.json({ data });
  });

  routes.get('/:name/status', zValidator('param', deviceParamSchema), async (c) => {
    const { name } = c.req.valid('param');
    const device = findDevice(ctx, name);
    if (!device) return c.json(deviceNotFound(name), 404);

    const state = await ctx.store.loadDeviceState(device.name);
    if (!state) return c.json(NO_DATA);

    return c.json({
      data: {
        device: device.name,
        health: summarizeHealth(state),
        lastSeen: state.lastReading?.timestamp ?? null,
        cpuPercent: state.lastReading?.cpuPercent ?? null,
        ramPercent: state.lastReading?.ramPercent ?? null,
        thresholds: device.thresholds,
        consecutiveFailures: state.consecutiveFailures,
        lastFailureAt: state.lastFailureAt,
        lastFailureReason: state.lastFailureReason,
        interfaces: device.interfaces.map((iface) => {
          const link: LinkState | 'unknown' = state.interfaces[String(iface.index)]?.link ?? 'unknown';
          return { index: iface.index, label: iface.label, link };
        })
      }
    });
  });

  routes.get('/:name/today', zValidator('param', deviceParamSchema), async (c) => {
    const { name } = c.req.valid('param');
    const device = findDevice(ctx, name);
    if (!device) return c.json(deviceNotFound(name), 404);

    const accumulator = await ctx.store.loadAccumulator();
    const day = accumulator?.devices[device.name];
    if (!accumulator || !day) return c.json(NO_DATA);

    return c.json({
      data: {
        device: device.name,
        date: accumulator.date,
        samples: day.samples,
        failedPolls: day.failedPolls,
        cpu: { average: averageOf(day.cpu), peak: day.cpu.max },
        ram: { average: averageOf(day.ram), peak: day.ram.max },
        interfaces: day.interfaces
      }
    });
  });

  return routes;
}
