import { performance } from 'node:perf_hooks';

import { TelemetryStore, type TelemetryEvent, type TelemetryEventInput } from './TelemetryStore';

export type TelemetryEnv = Readonly<Record<string, string | undefined>>;

export type Telemetry = {
  readonly enabled: boolean;
  readonly store: TelemetryStore;
  nowMs(): number;
  record(event: TelemetryEventInput): void;
  /** Runs `fn`, recording its duration under `name` along with the metrics it returns. */
  measure<T>(
    name: string,
    fn: () => T,
    describe?: (result: T) => Pick<TelemetryEvent, 'tags' | 'metrics' | 'message'>,
  ): T;
  /** Writes the per-stage aggregates as one log line, when logs are on. */
  flushSummary(): void;
};

export type TelemetryOptions = {
  env: TelemetryEnv;
  /** Receives whole lines, newline included. */
  log: (line: string) => void;
  store?: TelemetryStore;
};

const isTruthy = (v: string): boolean => {
  const lower = v.toLowerCase();
  return v === '1' || lower === 'true' || lower === 'yes';
};

const flag = (env: TelemetryEnv, name: string): string => (env[name] ?? '').trim();

export function createTelemetry(options: TelemetryOptions): Telemetry {
  const store = options.store ?? new TelemetryStore();

  const enabledFlag = flag(options.env, 'FWAUDIT_TELEMETRY');
  const enabled = enabledFlag === '' || isTruthy(enabledFlag);
  // stdout carries the report, so logs are opt-in and go to the caller's stderr.
  const logsEnabled = enabled && isTruthy(flag(options.env, 'FWAUDIT_TELEMETRY_LOGS'));

  const writeLine = (payload: Record<string, unknown>) => {
    options.log(`${JSON.stringify(payload)}\n`);
  };

  const nowMs = (): number => performance.now();

  const record = (event: TelemetryEventInput) => {
    if (!enabled) return;
    const stored = store.record(event);
    if (logsEnabled) writeLine({ type: 'fwaudit.telemetry', ...stored });
  };

  return {
    enabled,
    store,
    nowMs,
    record,

    measure<T>(
      name: string,
      fn: () => T,
      describe?: (result: T) => Pick<TelemetryEvent, 'tags' | 'metrics' | 'message'>,
    ): T {
      const startedAtMs = nowMs();
      const result = fn();
      record({ name, durationMs: nowMs() - startedAtMs, ...(describe ? describe(result) : {}) });
      return result;
    },

    flushSummary() {
      if (logsEnabled) writeLine({ type: 'fwaudit.telemetry.summary', stages: store.summary() });
    },
  };
}
