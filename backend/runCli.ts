import fs from 'node:fs';

import { runPolicyAudit } from './audit/PolicyAudit';
import { loadAuditConfig, USAGE } from './config/AuditConfig';
import { GraphRenderingAdapter } from './graph/GraphRenderingAdapter';
import { loadExportRecords } from './io/ExportLoader';
import { DomainError } from './reliability/DomainError';
import { mapErrorToExit } from './reliability/FailureHandling';
import { buildAuditReport, renderJsonReport, renderTextReport } from './report/AuditReport';
import { createTelemetry } from './telemetry/Telemetry';
import type { TelemetryStore } from './telemetry/TelemetryStore';

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

export type RunCliOptions = {
  /** Receives the run's telemetry events; a fresh store is used otherwise. */
  telemetryStore?: TelemetryStore;
};

const writeGraph = (file: string, contents: string) => {
  try {
    fs.writeFileSync(file, contents);
  } catch (err) {
    throw new DomainError({
      code: 'LOAD_ERROR',
      message: `Cannot write graph file "${file}": ${err instanceof Error ? err.message : String(err)}.`,
      details: { file },
      cause: err,
    });
  }
};

/**
 * One audit run. Returns the process exit code; the report is written only
 * after every stage has succeeded. Telemetry reads its switches from `env` and
 * logs to `io.stderr`.
 */
export function runCli(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>>,
  io: CliIo,
  options: RunCliOptions = {},
): number {
  const telemetry = createTelemetry({ env, log: io.stderr, store: options.telemetryStore });

  try {
    const request = loadAuditConfig(argv, env);
    if (request.kind === 'help') {
      io.stdout(USAGE);
      return 0;
    }

    const { config } = request;
    const records = loadExportRecords(config.source);
    const result = runPolicyAudit({ ...records, target: config.target }, telemetry);

    const report = buildAuditReport({
      targetName: result.target.name,
      associated: result.associated,
      inbound: result.inbound,
      outbound: result.outbound,
      catalog: result.catalog,
    });
    const output = config.format === 'json' ? renderJsonReport(report) : renderTextReport(report);

    if (config.graphPath) {
      const graph = new GraphRenderingAdapter().toCytoscape(
        result.graph,
        result.associated.map((o) => o.uid),
      );
      writeGraph(config.graphPath, `${JSON.stringify(graph, null, 2)}\n`);
    }

    io.stdout(output);
    return 0;
  } catch (err) {
    const failure = mapErrorToExit(err, { operation: 'audit', telemetry });
    io.stderr(`${failure.message}\n`);
    return failure.exitCode;
  } finally {
    telemetry.flushSummary();
  }
}
