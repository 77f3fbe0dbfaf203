import { Resend } from "resend";
import type { UserProfile } from "@daybrief/shared";
import type { EmailDocument } from "./composer.js";

export interface EmailSendResult {
  ok: boolean;
  id?: string;
  error?: string;
}

export interface EmailSender {
  send(user: UserProfile, document: EmailDocument): Promise<EmailSendResult>;
}

export interface EmailSenderOptions {
  apiKey?: string;
  from: string;
}

export function createEmailSender(options: EmailSenderOptions): EmailSender {
  if (!options.apiKey) {
    return {
      async send() {
        return { ok: false, error: "RESEND_API_KEY is not configured" };
      },
    };
  }

  const resend = new Resend(options.apiKey);

  return {
    async send(user, document) {
      try {
        const { data, error } = await resend.emails.send({
          from: options.from,
          to: user.email,
          subject: document.subject,
          html: document.html,
          text: document.text,
        });
        if (error) {
          return { ok: false, error: error.message };
        }
        return { ok: true, id: data?.id };
      } catch (err) {
        return { ok: false, error: err instanceof Error ? err.message : String(err) };
      }
    },
  };
}
