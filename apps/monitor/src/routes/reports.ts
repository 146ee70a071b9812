import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { deviceParamSchema, monthQuerySchema } from '@netpulse/shared';
import { buildMonthlyRecord } from '../services/rollover';
import { calendarMonth, previousMonth } from '../utils/calendar';
import { NO_DATA, currentTime, deviceNotFound, findDevice, type QueryContext } from './context';

export function createReportRoutes(ctx: QueryContext) {
  const routes = new Hono();

  routes.get(
    '/:name/daily',
    zValidator('param', deviceParamSchema),
    zValidator('query', monthQuerySchema),
    async (c) => {
      const { name } = c.req.valid('param');
      const device = findDevice(ctx, name);
      if (!device) return c.json(deviceNotFound(name), 404);

      const month = c.req.valid('query').month ?? calendarMonth(currentTime(ctx), ctx.timeZone);
      const records = await ctx.store.readDailyRecords(device.name, month);
      if (records.length === 0) return c.json({ ...NO_DATA, month });

      return c.json({
        month,
        data: [...records].sort((a, b) => a.date.localeCompare(b.date))
      });
    }
  );

  // Defaults to the last completed month; an unrolled month is summarized on the fly
  routes.get(
    '/:name/monthly',
    zValidator('param', deviceParamSchema),
    zValidator('query', monthQuerySchema),
    async (c) => {
      const { name } = c.req.valid('param');
      const device = findDevice(ctx, name);
      if (!device) return c.json(deviceNotFound(name), 404);

      const now = currentTime(ctx);
      const month = c.req.valid('query').month ?? previousMonth(calendarMonth(now, ctx.timeZone));

      const stored = await ctx.store.readMonthlyRecord(device.name, month);
      if (stored) return c.json({ month, source: 'stored', data: stored });

      const daily = await ctx.store.readDailyRecords(device.name, month);
      if (daily.length === 0) return c.json({ ...NO_DATA, month });

      return c.json({
        month,
        source: 'live',
        data: buildMonthlyRecord(device.name, month, daily, now.toISOString())
      });
    }
  );

  return routes;
}
