// ============================================================================
// Mail Module — Barrel Export
// ============================================================================

export type {
  AttachmentInput,
  GraphFileAttachment,
  GraphMessage,
  GraphRecipient,
  MailSettings,
  SendMailPayload,
} from './types.js';

export { SendError } from './errors.js';
export type { SendStage } from './errors.js';

export { attachmentFileName, buildSendMailPayload } from './payload.js';
export { createMailGatewayClient } from './graph-mail-client.js';
export type { MailGatewayClient } from './graph-mail-client.js';
