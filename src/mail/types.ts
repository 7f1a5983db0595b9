/**
 * Mail Module Type Definitions
 *
 * Shapes of the Microsoft Graph `POST /me/sendMail` request body. Property
 * names are the wire names, including the OData type annotation.
 */

export interface GraphEmailAddress {
  address: string;
}

export interface GraphRecipient {
  emailAddress: GraphEmailAddress;
}

export interface GraphItemBody {
  /** "Text" or "HTML" */
  contentType: 'Text' | 'HTML';
  content: string;
}

export interface GraphFileAttachment {
  '@odata.type': '#microsoft.graph.fileAttachment';
  name: string;
  contentType: string;
  /** Base64 of the full file content */
  contentBytes: string;
}

export interface GraphMessage {
  subject: string;
  body: GraphItemBody;
  toRecipients: GraphRecipient[];
  attachments: GraphFileAttachment[];
}

/** Request body for POST /me/sendMail */
export interface SendMailPayload {
  message: GraphMessage;
  saveToSentItems: boolean;
}

/** Input for building a payload for one file */
export interface AttachmentInput {
  fileName: string;
  content: Buffer;
}

export interface MailSettings {
  recipients: string[];
  subject: string;
  sendMailUrl: string;
}
