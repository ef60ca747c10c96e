import type { ObjectCatalog } from '../catalog/ObjectCatalog';
import type { PolicyObject } from '../catalog/PolicyObject';
import type { AccessRule } from '../rules/AccessRule';
import { formatCidr } from '../graph/Ipv4';
import { renderTable, type ReportTable } from './TextTable';

export const ASSOCIATED_HEADERS = ['Name', 'Type', 'Extra', 'Comment', 'UID'] as const;
export const RULE_HEADERS = ['No.', 'Src', 'Dst', 'Service'] as const;

const NEGATION_MARKER = '!';

export const extraFor = (object: PolicyObject): string => {
  switch (object.kind) {
    case 'host':
      return object.ipv4Address;
    case 'network':
      return formatCidr(object.subnet4, object.maskLength4);
    case 'group':
      return `Members ${object.members.length}`;
    default:
      return '';
  }
};

export const associatedObjectRows = (objects: readonly PolicyObject[]): string[][] =>
  objects.map((o) => [o.name, o.type, extraFor(o), o.comments.trim(), o.uid]);

const serviceLine = (service: PolicyObject): string => {
  const port = service.kind === 'service' ? service.port : '';
  if (service.type.includes('icmp') || !port) return `${service.name}:${service.type}`;
  return `${service.name}:${service.type}:${port}`;
};

/** One line per service; group-typed services are expanded one level into their members. */
export const serviceLines = (rule: AccessRule, catalog: ObjectCatalog): string[] => {
  const context = `the services of rule ${rule.ruleNumber} (${rule.uid})`;
  const lines: string[] = [];

  for (const uid of rule.service) {
    const service = catalog.require(uid, context);
    if (service.type.includes('group')) {
      const members = service.kind === 'group' ? service.members : [];
      for (const memberUid of members) {
        lines.push(serviceLine(catalog.require(memberUid, context)));
      }
      continue;
    }
    lines.push(serviceLine(service));
  }

  return lines;
};

const sideCell = (
  uids: readonly string[],
  negate: boolean,
  catalog: ObjectCatalog,
  context: string,
): string =>
  uids
    .map((uid) => `${negate ? NEGATION_MARKER : ''}${catalog.require(uid, context).name}`)
    .join('\n');

export const ruleRows = (rules: readonly AccessRule[], catalog: ObjectCatalog): string[][] =>
  rules.map((rule) => {
    const context = `rule ${rule.ruleNumber} (${rule.uid})`;
    return [
      String(rule.ruleNumber),
      sideCell(rule.source, rule.sourceNegate, catalog, context),
      sideCell(rule.destination, rule.destinationNegate, catalog, context),
      serviceLines(rule, catalog).join('\n'),
    ];
  });

export type AuditReportInput = {
  targetName: string;
  associated: readonly PolicyObject[];
  inbound: readonly AccessRule[];
  outbound: readonly AccessRule[];
  catalog: ObjectCatalog;
};

export type AuditReport = {
  associated: ReportTable;
  inbound: ReportTable;
  outbound: ReportTable;
};

export function buildAuditReport(input: AuditReportInput): AuditReport {
  const { targetName, catalog } = input;
  return {
    associated: {
      title: `${targetName} Belongs To`,
      headers: ASSOCIATED_HEADERS,
      rows: associatedObjectRows(input.associated),
    },
    inbound: {
      title: `Source -> ${targetName}`,
      headers: RULE_HEADERS,
      rows: ruleRows(input.inbound, catalog),
    },
    outbound: {
      title: `${targetName} -> Destination`,
      headers: RULE_HEADERS,
      rows: ruleRows(input.outbound, catalog),
    },
  };
}

export const renderTextReport = (report: AuditReport): string =>
  [report.associated, report.outbound, report.inbound].map(renderTable).join('\n');

const tableToJson = (table: ReportTable) => ({
  title: table.title,
  rows: table.rows.map((row) =>
    Object.fromEntries(table.headers.map((header, c) => [header, row[c] ?? ''])),
  ),
});

export const renderJsonReport = (report: AuditReport): string =>
  `${JSON.stringify(
    {
      associated: tableToJson(report.associated),
      inbound: tableToJson(report.inbound),
      outbound: tableToJson(report.outbound),
    },
    null,
    2,
  )}\n`;
