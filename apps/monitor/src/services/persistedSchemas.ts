import { z } from 'zod';
import { LINK_STATES, OPER_STATUSES } from '@netpulse/shared';

// Schemas for the files the engine writes; reads validate instead of trusting disk.

const counterSchema = z.string().regex(/^\d+$/).nullable();

export const persistedInterfaceStateSchema = z.object({
  link: z.enum(LINK_STATES),
  consecutiveDownCount: z.number().int().min(0),
  lastKnownUp: z.boolean(),
  inOctets: counterSchema,
  outOctets: counterSchema,
  inSampledAt: z.string().nullable().optional(),
  outSampledAt: z.string().nullable().optional()
});

export const persistedDeviceStateSchema = z.object({
  device: z.string(),
  lastReading: z
    .object({
      timestamp: z.string(),
      cpuPercent: z.number().nullable(),
      ramPercent: z.number().nullable()
    })
    .nullable(),
  interfaces: z.record(persistedInterfaceStateSchema),
  consecutiveFailures: z.number().int().min(0),
  lastFailureAt: z.string().nullable(),
  lastFailureReason: z.string().nullable()
});

const metricStatsSchema = z.object({
  sum: z.number(),
  count: z.number().int().min(0),
  max: z.number().nullable()
});

const interfaceTotalsSchema = z.object({
  inBytes: z.number().min(0),
  outBytes: z.number().min(0),
  downEvents: z.number().int().min(0),
  upEvents: z.number().int().min(0),
  lastStatus: z.enum(OPER_STATUSES)
});

export const dailyAccumulatorSchema = z.object({
  date: z.string(),
  devices: z.record(
    z.object({
      lastFoldedAt: z.string().nullable(),
      samples: z.number().int().min(0),
      failedPolls: z.number().int().min(0),
      cpu: metricStatsSchema,
      ram: metricStatsSchema,
      interfaces: z.record(interfaceTotalsSchema)
    })
  )
});

export const dailyRecordSchema = z.object({
  device: z.string(),
  date: z.string(),
  samples: z.number().int().min(0),
  failedPolls: z.number().int().min(0),
  cpu: metricStatsSchema,
  ram: metricStatsSchema,
  interfaces: z.record(interfaceTotalsSchema),
  finalizedAt: z.string()
});

const monthlyMetricSchema = z.object({
  average: z.number().nullable(),
  peak: z.number().nullable(),
  samples: z.number().int().min(0)
});

export const monthlyRecordSchema = z.object({
  device: z.string(),
  month: z.string(),
  days: z.number().int().min(0),
  samples: z.number().int().min(0),
  failedPolls: z.number().int().min(0),
  cpu: monthlyMetricSchema,
  ram: monthlyMetricSchema,
  totals: z.object({
    inBytes: z.number().min(0),
    outBytes: z.number().min(0),
    flaps: z.number().int().min(0)
  }),
  interfaces: z.record(
    interfaceTotalsSchema.omit({ lastStatus: true }).extend({
      flaps: z.number().int().min(0),
      lastStatus: z.enum(OPER_STATUSES)
    })
  ),
  generatedAt: z.string()
});

export const scriptStateSchema = z.object({
  lastRolledMonth: z.string().nullable()
});

export const monthArchiveSchema = z.object({
  device: z.string(),
  month: z.string(),
  monthly: monthlyRecordSchema.nullable(),
  daily: z.array(dailyRecordSchema)
});

export type MonthArchive = z.infer<typeof monthArchiveSchema>;
