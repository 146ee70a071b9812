import type {
  COUNTER_WIDTHS,
  LINK_STATES,
  OPER_STATUSES,
  SEMANTIC_EVENT_TYPES,
  SNMP_VERSIONS,
  THRESHOLD_METRICS
} from '../constants';

// ============================================
// Device Configuration
// ============================================

export type SnmpVersion = (typeof SNMP_VERSIONS)[number];
export type CounterWidth = (typeof COUNTER_WIDTHS)[number];
export type ThresholdMetric = (typeof THRESHOLD_METRICS)[number];

export interface MonitoredInterface {
  index: number;
  label: string;
  counterWidth: CounterWidth;
}

export interface DeviceMetricOids {
  cpu: string;
  ramUsed: string;
  ramTotal: string;
  ramAllocationUnits?: string;
}

export interface DeviceThresholds {
  cpu: number;
  ram: number;
}

export interface DeviceDescriptor {
  readonly name: string;
  readonly address: string;
  readonly port: number;
  readonly community: string;
  readonly snmpVersion: SnmpVersion;
  readonly oids: Readonly<DeviceMetricOids>;
  readonly thresholds: Readonly<DeviceThresholds>;
  readonly interfaces: ReadonlyArray<Readonly<MonitoredInterface>>;
  readonly recipients: ReadonlyArray<string>;
}

// ============================================
// Readings
// ============================================

export type OperStatus = (typeof OPER_STATUSES)[number];

export interface InterfaceReading {
  operStatus: OperStatus;
  inOctets: bigint | null;
  outOctets: bigint | null;
}

export interface RamReading {
  usedBytes: number;
  totalBytes: number;
}

export interface RawReading {
  device: string;
  timestamp: string;
  cpuPercent: number | null;
  ram: RamReading | null;
  /** Keyed by interface index */
  interfaces: Record<number, InterfaceReading>;
  /** OIDs that did not answer or could not be parsed */
  missing: string[];
}

// ============================================
// Persisted Device State
// ============================================

export type LinkState = (typeof LINK_STATES)[number];

export interface PersistedInterfaceState {
  link: LinkState;
  consecutiveDownCount: number;
  lastKnownUp: boolean;
  /** Decimal string so 64-bit counters survive JSON */
  inOctets: string | null;
  outOctets: string | null;
  /** When each stored counter was read; deltas span from here, not from the last reading */
  inSampledAt?: string | null;
  outSampledAt?: string | null;
}

export interface LastReadingSummary {
  timestamp: string;
  cpuPercent: number | null;
  ramPercent: number | null;
}

export interface PersistedDeviceState {
  device: string;
  lastReading: LastReadingSummary | null;
  /** Keyed by interface index */
  interfaces: Record<string, PersistedInterfaceState>;
  consecutiveFailures: number;
  lastFailureAt: string | null;
  lastFailureReason: string | null;
}

// ============================================
// Semantic Events
// ============================================

export type SemanticEventType = (typeof SEMANTIC_EVENT_TYPES)[number];

interface SemanticEventBase {
  device: string;
  timestamp: string;
}

export interface InterfaceDownEvent extends SemanticEventBase {
  type: 'interface_down';
  interfaceIndex: number;
  interfaceLabel: string;
}

export interface InterfaceUpEvent extends SemanticEventBase {
  type: 'interface_up';
  interfaceIndex: number;
  interfaceLabel: string;
}

export interface ThresholdBreachEvent extends SemanticEventBase {
  type: 'threshold_breach';
  metric: ThresholdMetric;
  value: number;
  threshold: number;
}

export type SemanticEvent = InterfaceDownEvent | InterfaceUpEvent | ThresholdBreachEvent;

// ============================================
// Accumulation and Records
// ============================================

export interface MetricStats {
  sum: number;
  count: number;
  max: number | null;
}

export interface InterfaceTotals {
  inBytes: number;
  outBytes: number;
  downEvents: number;
  upEvents: number;
  lastStatus: OperStatus;
}

export interface DeviceDayAccumulator {
  lastFoldedAt: string | null;
  samples: number;
  failedPolls: number;
  cpu: MetricStats;
  ram: MetricStats;
  /** Keyed by interface label */
  interfaces: Record<string, InterfaceTotals>;
}

export interface DailyAccumulator {
  /** Calendar date (YYYY-MM-DD) in the configured time zone */
  date: string;
  devices: Record<string, DeviceDayAccumulator>;
}

export interface DailyRecord {
  device: string;
  date: string;
  samples: number;
  failedPolls: number;
  cpu: MetricStats;
  ram: MetricStats;
  interfaces: Record<string, InterfaceTotals>;
  finalizedAt: string;
}

export interface MonthlyMetricSummary {
  average: number | null;
  peak: number | null;
  samples: number;
}

export interface MonthlyInterfaceSummary {
  inBytes: number;
  outBytes: number;
  downEvents: number;
  upEvents: number;
  flaps: number;
  lastStatus: OperStatus;
}

export interface MonthlyRecord {
  device: string;
  /** YYYY-MM */
  month: string;
  days: number;
  samples: number;
  failedPolls: number;
  cpu: MonthlyMetricSummary;
  ram: MonthlyMetricSummary;
  totals: {
    inBytes: number;
    outBytes: number;
    flaps: number;
  };
  interfaces: Record<string, MonthlyInterfaceSummary>;
  generatedAt: string;
}

export interface ScriptState {
  /** Last month (YYYY-MM) whose monthly rollover completed */
  lastRolledMonth: string | null;
}
