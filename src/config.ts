/**
 * Application Configuration
 *
 * Centralizes all environment variable access. Follows the same
 * requiredEnv/optionalEnv pattern as the per-module config files, but builds
 * the config on demand so the CLI can report every problem at once.
 *
 * Environment variables:
 * - AZURE_CLIENT_ID / AZURE_CLIENT_SECRET: Required app registration credentials
 * - AZURE_TENANT_ID: Tenant id or alias (default "common")
 * - AZURE_AUTHORITY_HOST: Identity platform host (default https://login.microsoftonline.com)
 * - OAUTH_REDIRECT_URI: Registered redirect URI served by the local listener
 * - EBOOK_TO_SEND_DIR / EBOOK_SENT_DIR: Required source and destination folders
 * - RECIPIENTS: Required comma-separated list of e-reader inbox addresses
 * - TOKEN_PATH: Credential file location (default ~/.ebook_mailer/auth.json)
 * - AUTH_CALLBACK_TIMEOUT_MS: How long to wait for the browser redirect (0 = forever)
 * - OPEN_BROWSER: Set to 'false' to only print the sign-in URL
 * - MAIL_SUBJECT / GRAPH_SEND_MAIL_URL: Mail gateway overrides
 */

import 'dotenv/config';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { z } from 'zod';

export interface AppConfig {
  azure: {
    clientId: string;
    clientSecret: string;
    tenantId: string;
    authorityHost: string;
  };
  /** URI for the OAuth redirect, also the address the callback listener binds */
  redirectUri: string;
  /** Directory holding e-books waiting to be sent */
  sourceDir: string;
  /** Directory e-books are moved to after a confirmed send */
  sentDir: string;
  /** E-reader inbox addresses every file is mailed to */
  recipients: string[];
  auth: {
    tokenPath: string;
    callbackTimeoutMs: number;
    openBrowser: boolean;
  };
  mail: {
    subject: string;
    sendMailUrl: string;
  };
}

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  readonly code: string;
  readonly problems: string[];

  constructor(problems: string[]) {
    super(
      `Configuration incomplete:\n` +
      problems.map(p => `  - ${p}`).join('\n') +
      `\n\nCopy .env.example to .env and fill in the required values.`
    );
    this.name = 'ConfigError';
    this.code = 'CONFIG_INVALID';
    this.problems = problems;
  }
}

export const DEFAULT_REDIRECT_URI = 'http://localhost:8080/callback';
export const DEFAULT_CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;

const RecipientsSchema = z
  .array(z.string().email({ message: 'is not a valid email address' }))
  .min(1, { message: 'must list at least one address' });

/** Expands a leading "~" to the user's home directory */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function defaultTokenPath(): string {
  return join(homedir(), '.ebook_mailer', 'auth.json');
}

/**
 * Builds the application config from environment variables.
 *
 * @throws ConfigError listing every missing or invalid variable
 */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  function requiredEnv(key: string): string {
    const value = env[key]?.trim();
    if (!value) {
      problems.push(`${key} is required`);
      return '';
    }
    return value;
  }

  function optionalEnv(key: string, fallback = ''): string {
    const value = env[key]?.trim();
    return value ? value : fallback;
  }

  const clientId = requiredEnv('AZURE_CLIENT_ID');
  const clientSecret = requiredEnv('AZURE_CLIENT_SECRET');
  const sourceDir = requiredEnv('EBOOK_TO_SEND_DIR');
  const sentDir = requiredEnv('EBOOK_SENT_DIR');
  const recipientsRaw = requiredEnv('RECIPIENTS');

  const recipients = recipientsRaw
    .split(',')
    .map(r => r.trim())
    .filter(r => r.length > 0);

  if (recipientsRaw) {
    const parsed = RecipientsSchema.safeParse(recipients);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        const index = issue.path[0];
        const subject = typeof index === 'number' ? `RECIPIENTS entry "${recipients[index]}"` : 'RECIPIENTS';
        problems.push(`${subject} ${issue.message}`);
      }
    }
  }

  const redirectUri = optionalEnv('OAUTH_REDIRECT_URI', DEFAULT_REDIRECT_URI);
  if (!URL.canParse(redirectUri)) {
    problems.push(`OAUTH_REDIRECT_URI "${redirectUri}" is not a valid URL`);
  }

  const timeoutRaw = optionalEnv('AUTH_CALLBACK_TIMEOUT_MS', String(DEFAULT_CALLBACK_TIMEOUT_MS));
  const callbackTimeoutMs = Number(timeoutRaw);
  if (!Number.isInteger(callbackTimeoutMs) || callbackTimeoutMs < 0) {
    problems.push(`AUTH_CALLBACK_TIMEOUT_MS "${timeoutRaw}" must be a non-negative integer`);
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    azure: {
      clientId,
      clientSecret,
      tenantId: optionalEnv('AZURE_TENANT_ID', 'common'),
      authorityHost: optionalEnv('AZURE_AUTHORITY_HOST', 'https://login.microsoftonline.com').replace(/\/+$/, ''),
    },
    redirectUri,
    sourceDir: resolve(expandHome(sourceDir)),
    sentDir: resolve(expandHome(sentDir)),
    recipients,
    auth: {
      tokenPath: resolve(expandHome(optionalEnv('TOKEN_PATH', defaultTokenPath()))),
      callbackTimeoutMs,
      openBrowser: optionalEnv('OPEN_BROWSER', 'true').toLowerCase() !== 'false',
    },
    mail: {
      subject: optionalEnv('MAIL_SUBJECT', 'Your e-book'),
      sendMailUrl: optionalEnv('GRAPH_SEND_MAIL_URL', 'https://graph.microsoft.com/v1.0/me/sendMail'),
    },
  };
}

/** Renders the configuration for display, with the client secret masked */
export function describeConfig(config: AppConfig): string {
  const secret = config.azure.clientSecret;
  const masked = secret.length > 4 ? `${'*'.repeat(secret.length - 4)}${secret.slice(-4)}` : '****';

  return [
    'Configuration:',
    `  Client ID: ${config.azure.clientId}`,
    `  Client secret: ${masked}`,
    `  Tenant: ${config.azure.tenantId}`,
    `  Callback URI: ${config.redirectUri}`,
    `  Ebook to send directory: ${config.sourceDir}`,
    `  Ebook sent directory: ${config.sentDir}`,
    `  Token file: ${config.auth.tokenPath}`,
    '  Receivers:',
    ...config.recipients.map((email, index) => `    ${index + 1}. ${email}`),
  ].join('\n');
}
