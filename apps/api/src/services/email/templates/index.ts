export type { EmailContent } from './builder.js';
export { defineEmailTemplate, escapeHtml } from './builder.js';
export { verificationEmail } from './verification.js';
export { passwordResetEmail } from './password-reset.js';
export { passwordChangedEmail } from './password-changed.js';
