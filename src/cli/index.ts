#!/usr/bin/env node

/**
 * Site management command line tool
 */

import { Command, InvalidArgumentError } from 'commander';
import { Table } from 'console-table-printer';
import chalk from 'chalk';
import { ConfigManager } from '../config';
import { EnvLoader } from '../config/env';
import { ValidationReport, validateDeployment } from '../config/validator';
import { openLeadStore } from '../db/connection';
import { DemoRequestRepository } from '../db/repositories/demo-request.repository';
import { NewsletterRepository } from '../db/repositories/newsletter.repository';
import { buildEnvChecklist, renderEnvTemplate } from '../deploy/checklist';
import { DEFAULT_TTL, DnsPlan, MAIL_PROVIDERS, buildDnsPlan, formatZoneFile } from '../deploy/dns';
import { main as serve } from '../main';
import { toError } from '../utils/error-handler';

interface CheckEnvOptions {
  json?: boolean;
}

interface DnsOptions {
  ip: string;
  mail?: string;
  dmarc?: string;
  ttl: number;
  zone?: boolean;
  json?: boolean;
}

interface LeadsOptions {
  limit: number;
  newsletter?: boolean;
  json?: boolean;
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Not a whole number.');
  }
  return parsed;
}

function fail(message: string): void {
  console.error(chalk.red(`✗ ${message}`));
  process.exitCode = 1;
}

export function printValidationReport(report: ValidationReport, env: NodeJS.ProcessEnv): void {
  console.log(chalk.blue(`Environment: ${report.environment}`));

  const table = new Table({
    columns: [
      { name: 'name', title: 'Variable', alignment: 'left' },
      { name: 'level', title: 'Level', alignment: 'left' },
      { name: 'value', title: 'Value', alignment: 'left' }
    ]
  });
  for (const item of buildEnvChecklist(env)) {
    table.addRow(
      { name: item.name, level: item.level, value: item.display },
      { color: item.set ? 'green' : item.level === 'optional' ? 'white' : 'yellow' }
    );
  }
  table.printTable();

  for (const error of report.errors) {
    console.log(chalk.red(`✗ ${error}`));
  }
  for (const warning of report.warnings) {
    console.log(chalk.yellow(`⚠ ${warning}`));
  }
  for (const recommendation of report.recommendations) {
    console.log(chalk.cyan(`→ ${recommendation}`));
  }

  console.log(report.status === 'pass' ? chalk.green('✓ Configuration check passed') : chalk.red('✗ Configuration check failed'));
}

export function printDnsPlan(plan: DnsPlan): void {
  const table = new Table({
    columns: [
      { name: 'type', title: 'Type', alignment: 'left' },
      { name: 'host', title: 'Host', alignment: 'left' },
      { name: 'value', title: 'Value', alignment: 'left' },
      { name: 'priority', title: 'Priority', alignment: 'right' },
      { name: 'ttl', title: 'TTL', alignment: 'right' },
      { name: 'purpose', title: 'Purpose', alignment: 'left' }
    ]
  });
  table.addRows(plan.records.map(record => ({
    type: record.type,
    host: record.host,
    value: record.value,
    priority: record.priority ?? '',
    ttl: record.ttl,
    purpose: record.purpose
  })));
  table.printTable();
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('vigil-site')
    .description('Marketing site server and deployment tools')
    .version('1.0.0');

  // serve
  program
    .command('serve')
    .description('Start the HTTP server on HOST:PORT')
    .action(async () => {
      await serve();
    });

  // check-env
  program
    .command('check-env')
    .description('Validate deployment environment variables')
    .option('--json', 'print the report as JSON')
    .action((options: CheckEnvOptions) => {
      EnvLoader.initialize();
      const report = validateDeployment(process.env);

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
      } else {
        printValidationReport(report, process.env);
      }

      if (report.status === 'fail') {
        process.exitCode = 1;
      }
    });

  // env-template
  program
    .command('env-template')
    .description('Print a .env template listing every deployment variable')
    .action(() => {
      process.stdout.write(renderEnvTemplate());
    });

  // dns
  program
    .command('dns <domain>')
    .description('Plan the DNS records for a domain')
    .requiredOption('--ip <address>', 'IPv4 address of the web server')
    .option('--mail <provider>', `mail provider (${MAIL_PROVIDERS.map(provider => provider.id).join('|')})`)
    .option('--dmarc <email>', 'address receiving DMARC reports')
    .option('--ttl <seconds>', 'record TTL', parseInteger, DEFAULT_TTL)
    .option('--zone', 'print a zone file fragment')
    .option('--json', 'print the records as JSON')
    .action((domain: string, options: DnsOptions) => {
      try {
        const plan = buildDnsPlan({
          domain,
          ipAddress: options.ip,
          mailProvider: options.mail,
          dmarcEmail: options.dmarc,
          ttl: options.ttl
        });

        if (options.json) {
          console.log(JSON.stringify(plan, null, 2));
        } else if (options.zone) {
          process.stdout.write(formatZoneFile(plan));
        } else {
          printDnsPlan(plan);
        }
      } catch (error) {
        fail(toError(error).message);
      }
    });

  // leads
  program
    .command('leads')
    .description('List recent demo requests or newsletter subscribers')
    .option('-l, --limit <number>', 'number of rows', parseInteger, 20)
    .option('-n, --newsletter', 'list newsletter subscribers instead of demo requests')
    .option('--json', 'print JSON')
    .action(async (options: LeadsOptions) => {
      EnvLoader.initialize();
      const config = new ConfigManager().getConfig();
      const db = await openLeadStore(config.leadsDbPath);

      try {
        const rows = options.newsletter
          ? await new NewsletterRepository(db).findRecent(options.limit)
          : (await new DemoRequestRepository(db).findRecent(options.limit)).map(lead => ({
              id: lead.id,
              submitted: lead.submitted_at,
              name: `${lead.first_name} ${lead.last_name}`,
              email: lead.email,
              company: lead.company,
              industry: lead.industry,
              notified: lead.sales_notified ? 'yes' : 'no'
            }));

        if (options.json) {
          console.log(JSON.stringify(rows, null, 2));
        } else if (rows.length === 0) {
          console.log(chalk.yellow('No entries found'));
        } else {
          const table = new Table();
          table.addRows(rows);
          table.printTable();
        }
      } finally {
        await db.close();
      }
    });

  return program;
}

if (require.main === module) {
  createProgram().parseAsync(process.argv).catch(error => {
    fail(toError(error).message);
  });
}
