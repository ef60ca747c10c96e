import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { runCli } from '../runCli';
import { TelemetryStore } from '../telemetry/TelemetryStore';
import {
  basicObjectRecords,
  hostRecord,
  ruleRecord,
  serviceRecord,
} from '../testing/policyFixtures';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'fwaudit-cli-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

const writeJson = (name: string, value: unknown) => {
  const file = path.join(dir, name);
  fs.writeFileSync(file, JSON.stringify(value));
  return file;
};

const run = (argv: string[], env: Record<string, string> = {}) => {
  const out: string[] = [];
  const err: string[] = [];
  const store = new TelemetryStore();
  const code = runCli(
    argv,
    env,
    {
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
    },
    { telemetryStore: store },
  );
  return { code, stdout: out.join(''), stderr: err.join(''), store };
};

const exportFiles = () => ({
  objs: writeJson('objects.json', [
    ...basicObjectRecords(),
    hostRecord('x', 'X', '192.168.0.1'),
    serviceRecord('s-ssh', 'ssh', 'service-tcp', '22'),
  ]),
  acls: writeJson('rules.json', [
    ruleRecord({ uid: 'r1', 'rule-number': 1, source: ['h1'], destination: ['any-0'], service: ['s-ssh'] }),
    ruleRecord({ uid: 'r2', 'rule-number': 2, source: ['x'], destination: ['n1'], service: ['s-ssh'] }),
    ruleRecord({ uid: 'r3', 'rule-number': 3, source: ['h1'], 'source-negate': true }),
  ]),
});

describe('runCli', () => {
  test('prints the three tables for the target', () => {
    const { objs, acls } = exportFiles();
    const result = run(['--objs', objs, '--acls', acls, '-t', 'H1']);

    expect(result.code).toBe(0);
    expect(result.stderr).toBe('');
    expect(result.stdout).toBe(
      [
        'H1 Belongs To',
        '+------+---------+-------------+------------+-----+',
        '| Name | Type    | Extra       | Comment    | UID |',
        '+------+---------+-------------+------------+-----+',
        '| H1   | host    | 10.0.0.5    | web server | h1  |',
        '+------+---------+-------------+------------+-----+',
        '| N1   | network | 10.0.0.0/24 |            | n1  |',
        '+------+---------+-------------+------------+-----+',
        '| G1   | group   | Members 1   |            | g1  |',
        '+------+---------+-------------+------------+-----+',
        '',
        'H1 -> Destination',
        '+-----+-----+-----+--------------------+',
        '| No. | Src | Dst | Service            |',
        '+-----+-----+-----+--------------------+',
        '| 1   | H1  | Any | ssh:service-tcp:22 |',
        '+-----+-----+-----+--------------------+',
        '',
        'Source -> H1',
        '+-----+-----+-----+--------------------+',
        '| No. | Src | Dst | Service            |',
        '+-----+-----+-----+--------------------+',
        '| 2   | X   | N1  | ssh:service-tcp:22 |',
        '+-----+-----+-----+--------------------+',
        '',
      ].join('\n'),
    );
  });

  test('records a telemetry event per stage', () => {
    const { objs, acls } = exportFiles();
    const { store } = run(['--objs', objs, '--acls', acls, '-t', 'H1']);

    const names = store.recent().map((e) => e.name);
    expect(names).toEqual([
      'audit.catalog.load',
      'audit.graph.build',
      'audit.associated',
      'audit.rules.classify',
    ]);
    const classify = store.recent(1)[0];
    expect(classify.metrics).toEqual({ ruleCount: 3, inboundCount: 1, outboundCount: 1 });
  });

  test('FWAUDIT_TELEMETRY_LOGS writes one JSON line per stage to stderr', () => {
    const { objs, acls } = exportFiles();
    const argv = ['--objs', objs, '--acls', acls, '-t', 'H1'];
    const quiet = run(argv);
    const logged = run(argv, { FWAUDIT_TELEMETRY_LOGS: '1' });

    expect(logged.code).toBe(0);
    expect(logged.stdout).toBe(quiet.stdout);

    const lines = logged.stderr.split('\n');
    expect(lines.pop()).toBe('');
    const parsed = lines.map((line): unknown => JSON.parse(line));
    expect(parsed).toMatchObject([
      { type: 'fwaudit.telemetry', name: 'audit.catalog.load' },
      { type: 'fwaudit.telemetry', name: 'audit.graph.build' },
      { type: 'fwaudit.telemetry', name: 'audit.associated', tags: { targetUid: 'h1' } },
      { type: 'fwaudit.telemetry', name: 'audit.rules.classify' },
      {
        type: 'fwaudit.telemetry.summary',
        stages: [
          { name: 'audit.catalog.load', count: 1 },
          { name: 'audit.graph.build', count: 1 },
          { name: 'audit.associated', count: 1, metrics: { associatedCount: { avg: 3, max: 3 } } },
          { name: 'audit.rules.classify', count: 1 },
        ],
      },
    ]);
  });

  test('FWAUDIT_TELEMETRY=0 records nothing', () => {
    const { objs, acls } = exportFiles();
    const result = run(['--objs', objs, '--acls', acls, '-t', 'nobody'], {
      FWAUDIT_TELEMETRY: '0',
      FWAUDIT_TELEMETRY_LOGS: '1',
    });

    expect(result.code).toBe(1);
    expect(result.store.recent()).toEqual([]);
    expect(result.stderr).toBe('error [NOT_FOUND]: No object named "nobody" in the export.\n');
  });

  test('writes the associated subgraph when asked', () => {
    const { objs, acls } = exportFiles();
    const graphPath = path.join(dir, 'graph.json');
    const result = run(['--objs', objs, '--acls', acls, '-t', 'H1', '--format', 'json', '--graph', graphPath]);

    expect(result.code).toBe(0);
    const graph: unknown = JSON.parse(fs.readFileSync(graphPath, 'utf8'));
    expect(graph).toMatchObject({ elements: expect.any(Array) });
    const report: unknown = JSON.parse(result.stdout);
    expect(report).toMatchObject({ associated: { title: 'H1 Belongs To' } });
  });

  test('an unknown target fails with a single diagnostic line and no report', () => {
    const { objs, acls } = exportFiles();
    const result = run(['--objs', objs, '--acls', acls, '-t', 'nobody']);

    expect(result.code).toBe(1);
    expect(result.stdout).toBe('');
    expect(result.stderr).toBe('error [NOT_FOUND]: No object named "nobody" in the export.\n');
    expect(result.store.recent(1)[0].tags).toMatchObject({ operation: 'audit', code: 'NOT_FOUND' });
  });

  test('usage errors exit with 2', () => {
    const result = run(['-t', 'H1']);
    expect(result.code).toBe(2);
    expect(result.stderr).toBe(
      'error [VALIDATION_ERROR]: No export given: pass --objs and --acls, or --package. Run with --help for usage.\n',
    );
  });

  test('--help prints usage', () => {
    const result = run(['--help']);
    expect(result.code).toBe(0);
    expect(result.stdout.startsWith('Usage: fwaudit')).toBe(true);
  });
});
