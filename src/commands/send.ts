/**
 * Send Command
 *
 * Wires the production collaborators from AppConfig and runs one delivery.
 * Resolves with the outcome when every file was delivered; otherwise the
 * DeliveryIncompleteError (or OrchestrationError) propagates to the CLI.
 */

import type { AppConfig } from '../config.js';
import {
  createAuthenticationManager,
  createFileTokenStore,
  createIdentityClient,
} from '../auth/index.js';
import type { AuthSettings } from '../auth/index.js';
import { createMailGatewayClient } from '../mail/index.js';
import { assertDeliveryComplete, nodeFileSystem, runDelivery } from '../delivery/index.js';
import type { BatchOutcome } from '../delivery/index.js';

export function authSettingsFrom(config: AppConfig): AuthSettings {
  return {
    ...config.azure,
    redirectUri: config.redirectUri,
    ...config.auth,
  };
}

export async function executeSendCommand(config: AppConfig): Promise<BatchOutcome> {
  const settings = authSettingsFrom(config);
  const auth = createAuthenticationManager({
    settings,
    tokenStore: createFileTokenStore(settings.tokenPath),
    identityClient: createIdentityClient(settings),
  });

  const mailer = createMailGatewayClient({
    recipients: config.recipients,
    subject: config.mail.subject,
    sendMailUrl: config.mail.sendMailUrl,
  });

  console.log('[send] Starting delivery', {
    sourceDir: config.sourceDir,
    sentDir: config.sentDir,
    recipients: config.recipients.length,
  });

  const outcome = await runDelivery({
    settings: { sourceDir: config.sourceDir, sentDir: config.sentDir },
    auth,
    mailer,
    fileSystem: nodeFileSystem,
  });

  assertDeliveryComplete(outcome);
  return outcome;
}
