/**
 * Microsoft Graph Mail Client
 *
 * Sends one e-book per call as a single email with the file attached:
 *   read file → base64 → build payload → POST /me/sendMail (bearer)
 *
 * Error handling: every failure is a SendError tagged with the stage that
 * failed. A non-2xx reply carries the status and the response body verbatim;
 * provider error bodies are not parsed.
 *
 * Exactly one outbound email per successful call. No retries and no
 * deduplication; the gateway's delivery semantics are its own.
 *
 * Logs file names and sizes only, never content or tokens.
 */

import { readFile } from 'node:fs/promises';
import { errorMessage } from '../errors.js';
import { SendError } from './errors.js';
import { attachmentFileName, buildSendMailPayload } from './payload.js';
import type { MailSettings } from './types.js';

export interface MailGatewayClient {
  send(accessToken: string, filePath: string): Promise<void>;
}

export interface MailGatewayClientDeps {
  readFile?: (filePath: string) => Promise<Buffer>;
}

export function createMailGatewayClient(
  settings: MailSettings,
  deps: MailGatewayClientDeps = {},
): MailGatewayClient {
  const read = deps.readFile ?? ((filePath: string) => readFile(filePath));

  return {
    async send(accessToken: string, filePath: string): Promise<void> {
      const fileName = attachmentFileName(filePath);
      if (!fileName) {
        throw new SendError(`Failed to get filename from file path "${filePath}"`, 'filename', filePath);
      }

      let content: Buffer;
      try {
        content = await read(filePath);
      } catch (err) {
        throw new SendError(`Failed to read file ${fileName}: ${errorMessage(err)}`, 'read', filePath, { cause: err });
      }

      const payload = buildSendMailPayload({
        subject: settings.subject,
        recipients: settings.recipients,
        attachment: { fileName, content },
      });

      let response: Response;
      try {
        response = await fetch(settings.sendMailUrl, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${accessToken}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(payload),
        });
      } catch (err) {
        throw new SendError(`Failed to send email for ${fileName}: ${errorMessage(err)}`, 'transport', filePath, { cause: err });
      }

      if (!response.ok) {
        let responseBody = '';
        try {
          responseBody = await response.text();
        } catch (err) {
          responseBody = `<unreadable response body: ${errorMessage(err)}>`;
        }
        throw new SendError(
          `Failed to send email for ${fileName}: ${response.status} ${responseBody}`,
          'rejected',
          filePath,
          { statusCode: response.status, responseBody },
        );
      }

      // Discard the (empty) 202 body so the socket is freed.
      await response.body?.cancel().catch((err: unknown) => {
        console.warn('[mail] Could not discard response body', { file: fileName, error: errorMessage(err) });
      });

      console.log('[mail] Email with attachment sent', {
        file: fileName,
        bytes: content.length,
        recipients: settings.recipients.length,
        status: response.status,
      });
    },
  };
}
