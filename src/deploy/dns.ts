/**
 * DNS record planning for the site domain
 *
 * Produces the records a registrar needs: the root A record, a www CNAME,
 * and the MX/TXT records of the chosen mail provider.
 */

import net from 'net';
import { SiteError, SiteErrorType } from '../utils/error-handler';

export type DnsRecordType = 'A' | 'CNAME' | 'MX' | 'TXT';

export const DNS_RECORD_TYPES: readonly DnsRecordType[] = ['A', 'CNAME', 'MX', 'TXT'];

export interface DnsRecord {
  type: DnsRecordType;
  /** "@" for the root domain, otherwise a relative label */
  host: string;
  value: string;
  ttl: number;
  priority?: number;
  purpose: string;
}

export interface MailProvider {
  id: string;
  name: string;
  mx(domain: string): Array<{ host: string; priority: number }>;
  spf: string;
}

export const MAIL_PROVIDERS: readonly MailProvider[] = [
  {
    id: 'google-workspace',
    name: 'Google Workspace',
    mx: () => [{ host: 'smtp.google.com', priority: 1 }],
    spf: 'v=spf1 include:_spf.google.com ~all'
  },
  {
    id: 'zoho',
    name: 'Zoho Mail',
    mx: () => [
      { host: 'mx.zoho.com', priority: 10 },
      { host: 'mx2.zoho.com', priority: 20 },
      { host: 'mx3.zoho.com', priority: 50 }
    ],
    spf: 'v=spf1 include:zoho.com ~all'
  },
  {
    id: 'microsoft-365',
    name: 'Microsoft 365',
    mx: domain => [{ host: `${domain.replace(/\./g, '-')}.mail.protection.outlook.com`, priority: 0 }],
    spf: 'v=spf1 include:spf.protection.outlook.com -all'
  }
];

export interface DnsPlanOptions {
  domain: string;
  ipAddress: string;
  mailProvider?: string;
  dmarcEmail?: string;
  ttl?: number;
}

export interface DnsPlan {
  domain: string;
  ttl: number;
  records: DnsRecord[];
}

export const DEFAULT_TTL = 3600;

const LABEL_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

export function isValidDomain(domain: string): boolean {
  if (domain.length === 0 || domain.length > 253) {
    return false;
  }
  const labels = domain.split('.');
  if (labels.length < 2) {
    return false;
  }
  const tld = labels[labels.length - 1];
  return labels.every(label => LABEL_PATTERN.test(label)) && /^[a-z]{2,63}$/.test(tld);
}

export function findMailProvider(id: string): MailProvider | undefined {
  return MAIL_PROVIDERS.find(provider => provider.id === id);
}

function invalid(message: string): SiteError {
  return new SiteError(message, SiteErrorType.VALIDATION_ERROR, 'dns-plan');
}

export function buildDnsPlan(options: DnsPlanOptions): DnsPlan {
  const domain = options.domain.trim().toLowerCase().replace(/\.$/, '');
  const ttl = options.ttl ?? DEFAULT_TTL;

  if (!isValidDomain(domain)) {
    throw invalid(`Invalid domain: ${options.domain}`);
  }
  if (!net.isIPv4(options.ipAddress)) {
    throw invalid(`A record needs an IPv4 address: ${options.ipAddress}`);
  }
  if (!Number.isInteger(ttl) || ttl < 60) {
    throw invalid(`TTL must be a whole number of seconds, at least 60: ${ttl}`);
  }

  const records: DnsRecord[] = [
    { type: 'A', host: '@', value: options.ipAddress, ttl, purpose: 'Root domain to the web server' },
    { type: 'CNAME', host: 'www', value: domain, ttl, purpose: 'www subdomain to the root domain' }
  ];

  if (options.mailProvider) {
    const provider = findMailProvider(options.mailProvider);
    if (!provider) {
      const known = MAIL_PROVIDERS.map(candidate => candidate.id).join(', ');
      throw invalid(`Unknown mail provider: ${options.mailProvider} (expected one of ${known})`);
    }

    for (const mx of provider.mx(domain)) {
      records.push({
        type: 'MX',
        host: '@',
        value: mx.host,
        priority: mx.priority,
        ttl,
        purpose: `Mail delivery via ${provider.name}`
      });
    }
    records.push({ type: 'TXT', host: '@', value: provider.spf, ttl, purpose: 'SPF sender policy' });
  }

  if (options.dmarcEmail) {
    records.push({
      type: 'TXT',
      host: '_dmarc',
      value: `v=DMARC1; p=none; rua=mailto:${options.dmarcEmail}`,
      ttl,
      purpose: 'DMARC reporting'
    });
  }

  return { domain, ttl, records };
}

function fullyQualified(name: string): string {
  return name.endsWith('.') ? name : `${name}.`;
}

function recordData(record: DnsRecord): string {
  switch (record.type) {
    case 'A':
      return record.value;
    case 'CNAME':
      return fullyQualified(record.value);
    case 'MX':
      return `${record.priority ?? 10} ${fullyQualified(record.value)}`;
    case 'TXT':
      return `"${record.value.replace(/"/g, '\\"')}"`;
  }
}

/**
 * BIND zone file fragment for the plan
 */
export function formatZoneFile(plan: DnsPlan): string {
  const lines = [`$ORIGIN ${plan.domain}.`, `$TTL ${plan.ttl}`];
  for (const record of plan.records) {
    lines.push([record.host, String(record.ttl), 'IN', record.type, recordData(record)].join(' '));
  }
  return lines.join('\n') + '\n';
}
