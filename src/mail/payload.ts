/**
 * sendMail Payload Builder
 *
 * Pure construction of the Graph `sendMail` request body for one e-book:
 * - one toRecipients entry per configured address, in order
 * - empty plain-text body
 * - exactly one file attachment, base64 of the full file content
 * - saveToSentItems always true
 *
 * No I/O. Reading the file and posting live in graph-mail-client.ts.
 */

import { basename } from 'node:path';
import type { AttachmentInput, GraphRecipient, SendMailPayload } from './types.js';

export const FILE_ATTACHMENT_TYPE = '#microsoft.graph.fileAttachment';
export const ATTACHMENT_CONTENT_TYPE = 'application/octet-stream';

/**
 * Final path segment of a file path, used as the attachment name.
 * Returns undefined when there is none (e.g. "" or "/").
 */
export function attachmentFileName(filePath: string): string | undefined {
  const name = basename(filePath);
  return name.length > 0 ? name : undefined;
}

export function buildRecipients(addresses: string[]): GraphRecipient[] {
  return addresses.map(address => ({ emailAddress: { address } }));
}

export function buildSendMailPayload(input: {
  subject: string;
  recipients: string[];
  attachment: AttachmentInput;
}): SendMailPayload {
  return {
    message: {
      subject: input.subject,
      body: {
        contentType: 'Text',
        content: '',
      },
      toRecipients: buildRecipients(input.recipients),
      attachments: [
        {
          '@odata.type': FILE_ATTACHMENT_TYPE,
          name: input.attachment.fileName,
          contentType: ATTACHMENT_CONTENT_TYPE,
          contentBytes: input.attachment.content.toString('base64'),
        },
      ],
    },
    saveToSentItems: true,
  };
}
