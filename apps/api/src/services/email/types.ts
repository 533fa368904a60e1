export interface EmailOptions {
  to: string;
  subject: string;
  html: string;
  text?: string | undefined;
  from?: string | undefined;
  /** Defaults to the support address */
  replyTo?: string | undefined;
}

export interface EmailClient {
  sendEmail(options: EmailOptions): Promise<void>;
}

export type SentEmail = EmailOptions;

export interface MockEmailClient extends EmailClient {
  getSentEmails(): SentEmail[];
  clearSentEmails(): void;
}
