import { describe, it, expect } from 'vitest';
import { deviceDescriptorSchema, monthQuerySchema, monthSchema, dateSchema } from './index';

describe('validators', () => {
  describe('deviceDescriptorSchema', () => {
    it('should apply defaults for optional fields', () => {
      const result = deviceDescriptorSchema.safeParse({ name: 'core-router', address: '10.0.0.1' });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.port).toBe(161);
        expect(result.data.community).toBe('public');
        expect(result.data.snmpVersion).toBe('v2c');
        expect(result.data.thresholds).toEqual({ cpu: 85, ram: 90 });
        expect(result.data.oids.cpu).toBe('1.3.6.1.4.1.2021.11.10.0');
        expect(result.data.interfaces).toEqual([]);
        expect(result.data.recipients).toEqual([]);
      }
    });

    it('should accept interface arrays with counter widths', () => {
      const result = deviceDescriptorSchema.safeParse({
        name: 'edge',
        address: '10.0.0.2',
        interfaces: [
          { index: 1, label: 'ether1' },
          { index: 2, label: 'sfp1', counterWidth: 64 }
        ]
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.interfaces).toEqual([
          { index: 1, label: 'ether1', counterWidth: 32 },
          { index: 2, label: 'sfp1', counterWidth: 64 }
        ]);
      }
    });

    it('should convert the legacy index-to-label map', () => {
      const result = deviceDescriptorSchema.safeParse({
        name: 'edge',
        address: '10.0.0.2',
        interfaces: { '1': 'ether1-WAN', '5': 'ether5-LAN' }
      });
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.interfaces).toEqual([
          { index: 1, label: 'ether1-WAN', counterWidth: 32 },
          { index: 5, label: 'ether5-LAN', counterWidth: 32 }
        ]);
      }
    });

    it('should reject a missing address', () => {
      const result = deviceDescriptorSchema.safeParse({ name: 'edge' });
      expect(result.success).toBe(false);
    });

    it('should reject an unsupported counter width', () => {
      const result = deviceDescriptorSchema.safeParse({
        name: 'edge',
        address: '10.0.0.2',
        interfaces: [{ index: 1, label: 'ether1', counterWidth: 16 }]
      });
      expect(result.success).toBe(false);
    });

    it('should reject duplicate interface indexes', () => {
      const result = deviceDescriptorSchema.safeParse({
        name: 'edge',
        address: '10.0.0.2',
        interfaces: [
          { index: 1, label: 'ether1' },
          { index: 1, label: 'ether1-copy' }
        ]
      });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.message).toBe('Duplicate interface index 1');
      }
    });

    it('should reject thresholds above 100 percent', () => {
      const result = deviceDescriptorSchema.safeParse({
        name: 'edge',
        address: '10.0.0.2',
        thresholds: { cpu: 120 }
      });
      expect(result.success).toBe(false);
    });

    it('should reject malformed OIDs', () => {
      const result = deviceDescriptorSchema.safeParse({
        name: 'edge',
        address: '10.0.0.2',
        oids: { cpu: 'cpu-load' }
      });
      expect(result.success).toBe(false);
    });
  });

  describe('monthSchema', () => {
    it('should accept YYYY-MM', () => {
      expect(monthSchema.safeParse('2026-02').success).toBe(true);
    });

    it('should reject month 13', () => {
      expect(monthSchema.safeParse('2026-13').success).toBe(false);
    });

    it('should be optional in month queries', () => {
      expect(monthQuerySchema.safeParse({}).success).toBe(true);
    });
  });

  describe('dateSchema', () => {
    it('should accept YYYY-MM-DD', () => {
      expect(dateSchema.safeParse('2026-02-28').success).toBe(true);
    });

    it('should reject a bare month', () => {
      expect(dateSchema.safeParse('2026-02').success).toBe(false);
    });
  });
});
