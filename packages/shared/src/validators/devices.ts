import { z } from 'zod';
import {
  COUNTER_WIDTHS,
  DEFAULT_COMMUNITY,
  DEFAULT_METRIC_OIDS,
  DEFAULT_SNMP_PORT,
  DEFAULT_THRESHOLDS,
  SNMP_VERSIONS
} from '../constants';

const oidSchema = z
  .string()
  .trim()
  .regex(/^\d+(?:\.\d+)+$/, 'must be a dotted numeric OID');

const percentSchema = z.number().min(0).max(100);

export const monitoredInterfaceSchema = z.object({
  index: z.number().int().positive(),
  label: z.string().trim().min(1).max(100),
  counterWidth: z
    .union([z.literal(COUNTER_WIDTHS[0]), z.literal(COUNTER_WIDTHS[1])])
    .default(32)
});

/**
 * Legacy configuration files map interface index to label:
 * `{ "1": "ether1-WAN", "2": "ether2-LAN" }`. Those counters are 32-bit.
 */
const legacyInterfaceMapSchema = z
  .record(z.string().regex(/^\d+$/, 'interface index must be numeric'), z.string().trim().min(1).max(100))
  .transform((map) =>
    Object.entries(map).map(([index, label]) => ({
      index: Number.parseInt(index, 10),
      label,
      counterWidth: COUNTER_WIDTHS[0]
    }))
  );

export const deviceDescriptorSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    address: z.string().trim().min(1),
    port: z.number().int().min(1).max(65535).default(DEFAULT_SNMP_PORT),
    community: z.string().min(1).default(DEFAULT_COMMUNITY),
    snmpVersion: z.enum(SNMP_VERSIONS).default('v2c'),
    oids: z
      .object({
        cpu: oidSchema.default(DEFAULT_METRIC_OIDS.cpu),
        ramUsed: oidSchema.default(DEFAULT_METRIC_OIDS.ramUsed),
        ramTotal: oidSchema.default(DEFAULT_METRIC_OIDS.ramTotal),
        ramAllocationUnits: oidSchema.optional()
      })
      .default({}),
    thresholds: z
      .object({
        cpu: percentSchema.default(DEFAULT_THRESHOLDS.cpu),
        ram: percentSchema.default(DEFAULT_THRESHOLDS.ram)
      })
      .default({}),
    interfaces: z.union([z.array(monitoredInterfaceSchema), legacyInterfaceMapSchema]).default([]),
    recipients: z.array(z.string().trim().min(1)).default([])
  })
  .superRefine((device, ctx) => {
    const indexes = new Set<number>();
    const labels = new Set<string>();
    device.interfaces.forEach((iface, position) => {
      if (indexes.has(iface.index)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['interfaces', position, 'index'],
          message: `Duplicate interface index ${iface.index}`
        });
      }
      if (labels.has(iface.label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['interfaces', position, 'label'],
          message: `Duplicate interface label "${iface.label}"`
        });
      }
      indexes.add(iface.index);
      labels.add(iface.label);
    });
  });

export type DeviceDescriptorInput = z.input<typeof deviceDescriptorSchema>;
export type ParsedDeviceDescriptor = z.output<typeof deviceDescriptorSchema>;

// The registry file is validated entry by entry so one bad device does not block the rest
export const deviceRegistryFileSchema = z.array(z.unknown());
