/**
 * Deployment variable listing and launch checklist
 */

import { EnvReader, EnvSource } from '../config/env';
import { SECRET_VARS, maskSecret } from '../config/validator';

/**
 * required: the process refuses to start in production without it
 * production: needed for a complete production deployment
 * optional: has a working default
 */
export type VariableLevel = 'required' | 'production' | 'optional';

export interface DeploymentVariable {
  name: string;
  description: string;
  level: VariableLevel;
  example?: string;
}

export const DEPLOYMENT_VARIABLES: readonly DeploymentVariable[] = [
  { name: 'NODE_ENV', description: 'Deployment mode (development, staging, production)', level: 'required', example: 'production' },
  { name: 'FLASK_ENV', description: 'Deployment mode for platforms configured before NODE_ENV; read when NODE_ENV is unset', level: 'optional' },
  { name: 'SECRET_KEY', description: 'Key used to sign flash cookies', level: 'required' },
  { name: 'DATABASE_URL', description: 'Application database connection string', level: 'required' },
  { name: 'ES_HOST', description: 'Search cluster URL', level: 'production', example: 'http://localhost:9200' },
  { name: 'ES_USER', description: 'Search cluster user', level: 'production', example: 'elastic' },
  { name: 'ES_PASS', description: 'Search cluster password', level: 'production' },
  { name: 'SMTP_SERVER', description: 'Outgoing mail server', level: 'optional', example: 'smtp.gmail.com' },
  { name: 'SMTP_PORT', description: 'Outgoing mail port (587 STARTTLS, 465 TLS)', level: 'optional', example: '587' },
  { name: 'SMTP_USER', description: 'Mail account used as the sender', level: 'production' },
  { name: 'SMTP_PASS', description: 'Mail account password', level: 'production' },
  { name: 'EMAIL_PASSWORD', description: 'Mail account password; preferred over SMTP_PASS on platforms that filter it', level: 'optional' },
  { name: 'MARKETING_EMAIL', description: 'Public contact address', level: 'optional', example: 'info@vigilbuild.com' },
  { name: 'SALES_EMAIL', description: 'Inbox that receives demo requests', level: 'optional', example: 'info@vigilbuild.com' },
  { name: 'WEATHER_API_KEY', description: 'Weather service API key', level: 'production' },
  { name: 'OLLAMA_HOST', description: 'Language model service URL', level: 'optional', example: 'http://127.0.0.1:11434' },
  { name: 'HOST', description: 'Interface the HTTP server binds to', level: 'optional', example: '0.0.0.0' },
  { name: 'PORT', description: 'Port the HTTP server listens on; usually assigned by the platform', level: 'optional', example: '5001' },
  { name: 'DEBUG', description: 'Verbose error responses; ignored in production', level: 'optional', example: 'false' },
  { name: 'LOG_LEVEL', description: 'Minimum log level (debug, info, warn, error, fatal)', level: 'optional', example: 'info' },
  { name: 'LOG_FILE', description: 'Append log lines to this file', level: 'optional' },
  { name: 'LEADS_DB_PATH', description: 'SQLite file storing demo requests and newsletter signups', level: 'optional', example: './data/leads.db' },
  { name: 'NEWSLETTER_WEBHOOK_URL', description: 'Mailing list endpoint that receives newsletter signups', level: 'optional' }
];

export interface ChecklistStep {
  title: string;
  /** Variables this step sets or depends on */
  variables: string[];
}

export const PRODUCTION_CHECKLIST: readonly ChecklistStep[] = [
  { title: 'Set NODE_ENV=production', variables: ['NODE_ENV'] },
  { title: 'Generate a random SECRET_KEY', variables: ['SECRET_KEY'] },
  { title: 'Point DATABASE_URL at the managed database', variables: ['DATABASE_URL'] },
  { title: 'Configure search credentials', variables: ['ES_HOST', 'ES_USER', 'ES_PASS'] },
  { title: 'Configure SMTP and test a demo request', variables: ['SMTP_SERVER', 'SMTP_PORT', 'SMTP_USER', 'EMAIL_PASSWORD', 'SALES_EMAIL'] },
  { title: 'Set the public contact address', variables: ['MARKETING_EMAIL'] },
  { title: 'Add the weather API key', variables: ['WEATHER_API_KEY'] },
  { title: 'Bind to 0.0.0.0 on the platform port', variables: ['HOST', 'PORT'] },
  { title: 'Add A, CNAME, MX and TXT records at the registrar', variables: [] },
  { title: 'Confirm /health responds over HTTPS', variables: [] }
];

export interface ChecklistItem {
  name: string;
  level: VariableLevel;
  set: boolean;
  /** Value for display, secrets masked, "-" when unset */
  display: string;
}

export function findVariable(name: string): DeploymentVariable | undefined {
  return DEPLOYMENT_VARIABLES.find(variable => variable.name === name);
}

export function buildEnvChecklist(env: EnvSource = process.env): ChecklistItem[] {
  const reader = new EnvReader(env);

  return DEPLOYMENT_VARIABLES.map(variable => {
    const value = reader.get(variable.name);
    return {
      name: variable.name,
      level: variable.level,
      set: value !== undefined,
      display: value === undefined ? '-' : SECRET_VARS.has(variable.name) ? maskSecret(value) : value
    };
  });
}

/**
 * .env template: one commented line per variable, secrets left blank
 */
export function renderEnvTemplate(): string {
  const lines: string[] = [];

  for (const variable of DEPLOYMENT_VARIABLES) {
    lines.push(`# ${variable.description} (${variable.level})`);
    const value = SECRET_VARS.has(variable.name) ? '' : variable.example ?? '';
    lines.push(`${variable.name}=${value}`);
  }

  return lines.join('\n') + '\n';
}
