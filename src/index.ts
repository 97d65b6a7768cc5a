/**
 * Marketing site service
 *
 * Public pages, demo requests, newsletter signups and the deployment tooling around them.
 */

export * from './config';
export * from './config/env';
export * from './config/validator';
export * from './db/types';
export * from './db/connection';
export * from './db/migrations';
export * from './db/repositories/demo-request.repository';
export * from './db/repositories/newsletter.repository';
export * from './deploy/checklist';
export * from './deploy/dns';
export * from './email/address';
export * from './email/email-service';
export * from './marketing/demo-request';
export * from './marketing/newsletter';
export * from './marketing/pages';
export * from './marketing/routes';
export * from './server/app';
export * from './server/flash';
export * from './server/server';
export * from './templates/html-template';
export * from './utils/error-handler';
export * from './utils/logger';
