/**
 * Deployment configuration validation
 *
 * Checks an environment map against the variables a deployment of the site
 * needs, without touching any of the services they point at.
 */

import { EnvReader, EnvSource } from './env';
import { Environment, resolveEnvironment } from './index';

export interface ValidationReport {
  status: 'pass' | 'fail';
  environment: Environment;
  errors: string[];
  warnings: string[];
  /** Set variables, secrets masked */
  configItems: Record<string, string>;
  recommendations: string[];
}

export const PRODUCTION_REQUIRED_VARS = ['SECRET_KEY', 'DATABASE_URL', 'ES_HOST', 'ES_USER', 'ES_PASS'] as const;
export const PRODUCTION_WARNED_VARS = ['WEATHER_API_KEY', 'SMTP_USER', 'SMTP_PASS'] as const;
export const DEVELOPMENT_REQUIRED_VARS = ['SECRET_KEY', 'DATABASE_URL'] as const;

export const SECRET_VARS: ReadonlySet<string> = new Set([
  'SECRET_KEY',
  'DATABASE_URL',
  'ES_PASS',
  'SMTP_PASS',
  'EMAIL_PASSWORD',
  'WEATHER_API_KEY'
]);

const REPORTED_VARS = [
  'NODE_ENV',
  'FLASK_ENV',
  'SECRET_KEY',
  'DATABASE_URL',
  'ES_HOST',
  'ES_USER',
  'ES_PASS',
  'SMTP_SERVER',
  'SMTP_PORT',
  'SMTP_USER',
  'SMTP_PASS',
  'EMAIL_PASSWORD',
  'MARKETING_EMAIL',
  'SALES_EMAIL',
  'WEATHER_API_KEY',
  'OLLAMA_HOST'
];

/**
 * One asterisk per character, at most twenty
 */
export function maskSecret(value: string): string {
  return '*'.repeat(Math.min(value.length, 20));
}

/**
 * The SMTP password may come from either variable
 */
function isSet(reader: EnvReader, name: string): boolean {
  if (name === 'SMTP_PASS') {
    return reader.has('SMTP_PASS') || reader.has('EMAIL_PASSWORD');
  }
  return reader.has(name);
}

export function validateDeployment(env: EnvSource = process.env): ValidationReport {
  const reader = new EnvReader(env);
  const environment = resolveEnvironment(env);
  const errors: string[] = [];
  const warnings: string[] = [];
  const configItems: Record<string, string> = {};

  for (const name of REPORTED_VARS) {
    const value = reader.get(name);
    if (value !== undefined) {
      configItems[name] = SECRET_VARS.has(name) ? maskSecret(value) : value;
    }
  }

  if (environment === 'production') {
    for (const name of PRODUCTION_REQUIRED_VARS) {
      if (!isSet(reader, name)) {
        errors.push(`Missing required environment variable: ${name}`);
      }
    }
    for (const name of PRODUCTION_WARNED_VARS) {
      if (!isSet(reader, name)) {
        warnings.push(`Missing optional environment variable: ${name} - Some features may be disabled`);
      }
    }
    if (reader.getBoolean('DEBUG')) {
      warnings.push('DEBUG was set to True in production - forcing to False');
    }
  } else {
    for (const name of DEVELOPMENT_REQUIRED_VARS) {
      if (!isSet(reader, name)) {
        warnings.push(`Missing environment variable: ${name} - using defaults`);
      }
    }
  }

  return {
    status: errors.length === 0 ? 'pass' : 'fail',
    environment,
    errors,
    warnings,
    configItems,
    recommendations: buildRecommendations(reader, environment)
  };
}

function buildRecommendations(reader: EnvReader, environment: Environment): string[] {
  const recommendations: string[] = [];

  if (environment !== 'production') {
    recommendations.push('Set NODE_ENV=production on the hosting platform');
  }
  if (!isSet(reader, 'SMTP_USER') || !isSet(reader, 'SMTP_PASS')) {
    recommendations.push('Configure SMTP_USER and EMAIL_PASSWORD so demo requests reach the sales inbox');
  }
  if (reader.get('SMTP_SERVER', 'smtp.gmail.com') === 'smtp.gmail.com' && isSet(reader, 'SMTP_USER')) {
    recommendations.push('Use an app password for Gmail SMTP accounts');
  }
  if (!reader.has('SALES_EMAIL')) {
    recommendations.push('Set SALES_EMAIL to the inbox that follows up on demo requests');
  }
  const secret = reader.get('SECRET_KEY');
  if (secret !== undefined && secret.length < 32) {
    recommendations.push('Use a SECRET_KEY of at least 32 random characters');
  }

  return recommendations;
}
