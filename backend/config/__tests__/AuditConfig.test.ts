import { loadAuditConfig } from '../AuditConfig';
import { expectDomainError } from '../../testing/expectDomainError';

describe('loadAuditConfig', () => {
  test('reads the export files and target from flags', () => {
    expect(loadAuditConfig(['--objs', 'o.json', '--acls', 'r.json', '-t', 'H1'], {})).toEqual({
      kind: 'audit',
      config: {
        source: { kind: 'files', objectsPath: 'o.json', rulesPath: 'r.json' },
        target: { name: 'H1' },
        format: 'table',
        graphPath: null,
      },
    });
  });

  test('falls back to the environment and lets flags win', () => {
    const env = {
      FWAUDIT_PACKAGE: 'policy.zip',
      FWAUDIT_TARGET: 'from-env',
      FWAUDIT_FORMAT: 'json',
    };
    expect(loadAuditConfig(['--target', 'from-flag', '--graph', 'g.json'], env)).toEqual({
      kind: 'audit',
      config: {
        source: { kind: 'package', packagePath: 'policy.zip' },
        target: { name: 'from-flag' },
        format: 'json',
        graphPath: 'g.json',
      },
    });
  });

  test('--uid selects the target by identifier', () => {
    const request = loadAuditConfig(['--package', 'p.zip', '--uid', 'abc', '-t', 'ignored'], {});
    expect(request.kind === 'audit' && request.config.target).toEqual({ uid: 'abc' });
  });

  test('help short-circuits validation', () => {
    expect(loadAuditConfig(['-h'], {})).toEqual({ kind: 'help' });
  });

  test('rejects incomplete or unknown input', () => {
    const cases: Array<[string[], string]> = [
      [['-t', 'H1'], 'No export given: pass --objs and --acls, or --package.'],
      [['--objs', 'o.json', '-t', 'H1'], 'Both --objs and --acls are required when reading separate export files.'],
      [['--package', 'p.zip'], 'No target given: pass -t <name> or --uid <uid>.'],
      [['--package', 'p.zip', '-t', 'H1', '--format', 'xml'], 'Unknown output format "xml" (expected table or json).'],
    ];

    for (const [argv, message] of cases) {
      const err = expectDomainError(() => loadAuditConfig(argv, {}), 'VALIDATION_ERROR');
      expect(err.message).toBe(`${message} Run with --help for usage.`);
    }

    expectDomainError(() => loadAuditConfig(['--verbose'], {}), 'VALIDATION_ERROR');
  });

  test('blank environment values are ignored', () => {
    const err = expectDomainError(
      () => loadAuditConfig(['--package', 'p.zip'], { FWAUDIT_TARGET: '   ' }),
      'VALIDATION_ERROR',
    );
    expect(err.message).toBe('No target given: pass -t <name> or --uid <uid>. Run with --help for usage.');
  });
});
