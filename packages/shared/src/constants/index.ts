// SNMP versions the gateway accepts for plain community reads
export const SNMP_VERSIONS = ['v1', 'v2c'] as const;

// Interface counter widths (ifInOctets is 32-bit, ifHCInOctets is 64-bit)
export const COUNTER_WIDTHS = [32, 64] as const;

// Per-interface link states tracked by the reconciler
export const LINK_STATES = ['up', 'down_pending', 'down'] as const;

// Observed interface operational status for a single reading
export const OPER_STATUSES = ['up', 'down', 'unknown'] as const;

// Metrics that can breach a configured threshold
export const THRESHOLD_METRICS = ['cpu', 'ram'] as const;

// Semantic event types produced by the reconciler
export const SEMANTIC_EVENT_TYPES = ['interface_down', 'interface_up', 'threshold_breach'] as const;

// Consecutive down observations needed before an interface is reported down
export const DOWN_CONFIRMATION_CYCLES = 2;

export const DEFAULT_SNMP_PORT = 161;
export const DEFAULT_COMMUNITY = 'public';

export const DEFAULT_THRESHOLDS = {
  cpu: 85,
  ram: 90
} as const;

// Defaults match MikroTik RouterOS (UCD-SNMP CPU load, HOST-RESOURCES RAM entry 65536)
export const DEFAULT_METRIC_OIDS = {
  cpu: '1.3.6.1.4.1.2021.11.10.0',
  ramAllocationUnits: '1.3.6.1.2.1.25.2.3.1.4.65536',
  ramTotal: '1.3.6.1.2.1.25.2.3.1.5.65536',
  ramUsed: '1.3.6.1.2.1.25.2.3.1.6.65536'
} as const;

// IF-MIB column prefixes; the interface index is appended
export const INTERFACE_OIDS = {
  operStatus: '1.3.6.1.2.1.2.2.1.8',
  inOctets32: '1.3.6.1.2.1.2.2.1.10',
  outOctets32: '1.3.6.1.2.1.2.2.1.16',
  inOctets64: '1.3.6.1.2.1.31.1.1.1.6',
  outOctets64: '1.3.6.1.2.1.31.1.1.1.10'
} as const;

// ifOperStatus value meaning "up"; every other value counts as down
export const IF_OPER_STATUS_UP = 1;
