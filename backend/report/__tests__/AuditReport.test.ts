import { loadCatalog } from '../../catalog/ObjectCatalog';
import { collectAccessRules } from '../../rules/AccessRule';
import {
  associatedObjectRows,
  buildAuditReport,
  renderJsonReport,
  renderTextReport,
  ruleRows,
  serviceLines,
} from '../AuditReport';
import { renderTable } from '../TextTable';
import {
  ANY_RECORD,
  basicObjectRecords,
  groupRecord,
  ruleRecord,
  serviceRecord,
} from '../../testing/policyFixtures';

const objectRecords = () => [
  ...basicObjectRecords(),
  serviceRecord('s-https', 'https', 'service-tcp', '443'),
  serviceRecord('s-echo', 'echo-request', 'service-icmp'),
  serviceRecord('s-ssh', 'ssh', 'service-tcp', '22'),
  groupRecord('web-svcs', 'web-services', ['s-https', 's-echo'], 'service-group'),
];

describe('associatedObjectRows', () => {
  test('summarises each kind and trims comments', () => {
    const catalog = loadCatalog(objectRecords());
    const objects = ['h1', 'n1', 'g1', 'any-0'].map((uid) => catalog.require(uid, 'test'));

    expect(associatedObjectRows(objects)).toEqual([
      ['H1', 'host', '10.0.0.5', 'web server', 'h1'],
      ['N1', 'network', '10.0.0.0/24', '', 'n1'],
      ['G1', 'group', 'Members 1', '', 'g1'],
      ['Any', ANY_RECORD.type, '', '', 'any-0'],
    ]);
  });
});

describe('serviceLines', () => {
  test('expands service groups one level and omits ICMP ports', () => {
    const catalog = loadCatalog(objectRecords());
    const [rule] = collectAccessRules([ruleRecord({ service: ['web-svcs', 's-ssh', 'any-0'] })]);

    expect(serviceLines(rule, catalog)).toEqual([
      'https:service-tcp:443',
      'echo-request:service-icmp',
      'ssh:service-tcp:22',
      'Any:CpmiAnyObject',
    ]);
  });
});

describe('ruleRows', () => {
  test('resolves names and marks negated sides', () => {
    const catalog = loadCatalog(objectRecords());
    const rules = collectAccessRules([
      ruleRecord({
        'rule-number': 3,
        source: ['h1', 'g1'],
        'source-negate': true,
        destination: ['any-0'],
        service: ['s-ssh'],
      }),
    ]);

    expect(ruleRows(rules, catalog)).toEqual([['3', '!H1\n!G1', 'Any', 'ssh:service-tcp:22']]);
  });
});

describe('buildAuditReport', () => {
  const build = () => {
    const catalog = loadCatalog(objectRecords());
    const [outbound, inbound] = collectAccessRules([
      ruleRecord({ uid: 'out', 'rule-number': 1, source: ['h1'], destination: ['any-0'] }),
      ruleRecord({ uid: 'in', 'rule-number': 2, source: ['any-0'], destination: ['n1'], service: ['s-https'] }),
    ]);
    return buildAuditReport({
      targetName: 'H1',
      associated: [catalog.require('h1', 'test')],
      inbound: [inbound],
      outbound: [outbound],
      catalog,
    });
  };

  test('titles the three tables after the target', () => {
    const report = build();
    expect([report.associated.title, report.outbound.title, report.inbound.title]).toEqual([
      'H1 Belongs To',
      'H1 -> Destination',
      'Source -> H1',
    ]);
  });

  test('text output prints associated objects, then outbound, then inbound rules', () => {
    const report = build();
    expect(renderTextReport(report)).toBe(
      [renderTable(report.associated), renderTable(report.outbound), renderTable(report.inbound)].join('\n'),
    );
  });

  test('json output keys each row by its column header', () => {
    const parsed: unknown = JSON.parse(renderJsonReport(build()));
    expect(parsed).toEqual({
      associated: {
        title: 'H1 Belongs To',
        rows: [{ Name: 'H1', Type: 'host', Extra: '10.0.0.5', Comment: 'web server', UID: 'h1' }],
      },
      inbound: {
        title: 'Source -> H1',
        rows: [{ 'No.': '2', Src: 'Any', Dst: 'N1', Service: 'https:service-tcp:443' }],
      },
      outbound: {
        title: 'H1 -> Destination',
        rows: [{ 'No.': '1', Src: 'H1', Dst: 'Any', Service: '' }],
      },
    });
  });
});
