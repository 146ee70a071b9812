import type { CounterWidth } from '@netpulse/shared';
import type { DataQualityCode } from './monitorErrors';

export interface CounterDeltaInput {
  previous: bigint | null;
  current: bigint;
  width: CounterWidth;
  elapsedMs: number;
  /** Readings implying a faster rate than this are discarded */
  maxBytesPerSecond?: number;
}

export interface CounterDeltaResult {
  delta: number;
  wrapped: boolean;
  issue?: {
    code: DataQualityCode;
    message: string;
  };
}

const COUNTER_MODULI: Record<CounterWidth, bigint> = {
  32: 1n << 32n,
  64: 1n << 64n
};

export function counterModulus(width: CounterWidth): bigint {
  return COUNTER_MODULI[width];
}

/**
 * Convert two raw octet counter samples into a non-negative delta.
 *
 * A current value below the previous one means the counter wrapped once:
 * delta = (2^width - previous) + current. The first sample of a counter has
 * no baseline and yields 0.
 */
export function computeCounterDelta(input: CounterDeltaInput): CounterDeltaResult {
  const { previous, current, width, elapsedMs, maxBytesPerSecond } = input;

  if (previous === null) {
    return { delta: 0, wrapped: false };
  }

  const modulus = counterModulus(width);
  if (previous < 0n || current < 0n || previous >= modulus || current >= modulus) {
    return {
      delta: 0,
      wrapped: false,
      issue: {
        code: 'counter_out_of_range',
        message: `counter value outside ${width}-bit range (previous=${previous}, current=${current})`
      }
    };
  }

  const wrapped = current < previous;
  const raw = wrapped ? modulus - previous + current : current - previous;

  if (maxBytesPerSecond !== undefined && elapsedMs > 0) {
    const ceiling = BigInt(Math.ceil((maxBytesPerSecond * elapsedMs) / 1000));
    if (raw > ceiling) {
      return {
        delta: 0,
        wrapped,
        issue: {
          code: 'implausible_rate',
          message: `delta of ${raw} bytes in ${elapsedMs}ms exceeds ${maxBytesPerSecond} B/s`
        }
      };
    }
  }

  return { delta: Number(raw), wrapped };
}
