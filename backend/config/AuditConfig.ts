import { parseArgs } from 'node:util';

import type { TargetSelector } from '../catalog/ObjectCatalog';
import type { ExportSource } from '../io/ExportLoader';
import { DomainError } from '../reliability/DomainError';

export type OutputFormat = 'table' | 'json';

export type AuditConfig = {
  source: ExportSource;
  target: TargetSelector;
  format: OutputFormat;
  /** Where to write the Cytoscape elements of the associated subgraph, if requested. */
  graphPath: string | null;
};

export type CliRequest = { kind: 'help' } | { kind: 'audit'; config: AuditConfig };

export const USAGE = `Usage: fwaudit (--objs <file> --acls <file> | --package <zip>) (-t <name> | --uid <uid>) [options]

Lists the objects related to a target and the enabled accept rules that
reference them, from a firewall policy export.

Options:
  --objs <file>      objects export (.json or .json.gz)         [FWAUDIT_OBJECTS]
  --acls <file>      rulebase export (.json or .json.gz)        [FWAUDIT_ACLS]
  --package <zip>    ZIP holding both exports                   [FWAUDIT_PACKAGE]
  -t, --target <name>  target object name                       [FWAUDIT_TARGET]
  --uid <uid>        target object uid (for duplicate names)
  --format <fmt>     table | json (default: table)              [FWAUDIT_FORMAT]
  --graph <file>     write the associated subgraph as Cytoscape elements JSON
  -h, --help         show this help
`;

type Env = Readonly<Record<string, string | undefined>>;

const envValue = (env: Env, name: string): string | undefined => {
  const v = env[name]?.trim();
  return v ? v : undefined;
};

const invalid = (message: string) =>
  new DomainError({ code: 'VALIDATION_ERROR', message: `${message} Run with --help for usage.` });

const isOutputFormat = (value: string): value is OutputFormat =>
  value === 'table' || value === 'json';

/** Merges command-line flags over environment variables. */
export function loadAuditConfig(argv: readonly string[], env: Env): CliRequest {
  let values: ReturnType<typeof parse>['values'];
  try {
    values = parse(argv).values;
  } catch (err) {
    throw invalid(err instanceof Error ? err.message : String(err));
  }

  if (values.help) return { kind: 'help' };

  const objectsPath = values.objs ?? envValue(env, 'FWAUDIT_OBJECTS');
  const rulesPath = values.acls ?? envValue(env, 'FWAUDIT_ACLS');
  const packagePath = values.package ?? envValue(env, 'FWAUDIT_PACKAGE');

  let source: ExportSource;
  if (objectsPath && rulesPath) {
    source = { kind: 'files', objectsPath, rulesPath };
  } else if (packagePath && !objectsPath && !rulesPath) {
    source = { kind: 'package', packagePath };
  } else if (objectsPath || rulesPath) {
    throw invalid('Both --objs and --acls are required when reading separate export files.');
  } else {
    throw invalid('No export given: pass --objs and --acls, or --package.');
  }

  const targetName = values.target ?? envValue(env, 'FWAUDIT_TARGET');
  let target: TargetSelector;
  if (values.uid) target = { uid: values.uid };
  else if (targetName) target = { name: targetName };
  else throw invalid('No target given: pass -t <name> or --uid <uid>.');

  const format = values.format ?? envValue(env, 'FWAUDIT_FORMAT') ?? 'table';
  if (!isOutputFormat(format)) {
    throw invalid(`Unknown output format "${format}" (expected table or json).`);
  }

  return {
    kind: 'audit',
    config: { source, target, format, graphPath: values.graph ?? null },
  };
}

const parse = (argv: readonly string[]) =>
  parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: false,
    options: {
      objs: { type: 'string' },
      acls: { type: 'string' },
      package: { type: 'string' },
      target: { type: 'string', short: 't' },
      uid: { type: 'string' },
      format: { type: 'string' },
      graph: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
