import { z } from "zod";

export interface Notifier {
  deliver(recipient: string, text: string): Promise<boolean>;
}

export const telegramMessageLimit = 4096;

export const escapeHtml = (value: unknown): string =>
  String(value).replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

export const truncateMessage = (text: string, limit = telegramMessageLimit): string => {
  if (text.length <= limit) {
    return text;
  }
  return `${text.slice(0, limit - 20)}\n… (truncated)`;
};

export const deliverSafely = async (notifier: Notifier, recipient: string, text: string): Promise<boolean> => {
  try {
    const delivered = await notifier.deliver(recipient, text);
    if (!delivered) {
      console.warn(`[ping-status] delivery to ${recipient} failed`);
    }
    return delivered;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[ping-status] delivery to ${recipient} failed: ${message}`);
    return false;
  }
};

export class ConsoleNotifier implements Notifier {
  async deliver(recipient: string, text: string): Promise<boolean> {
    console.log(`[ping-status] message for ${recipient}:\n${text}`);
    return true;
  }
}

export interface TelegramNotifierOptions {
  botToken: string;
  apiBase?: string;
  fetchImpl?: typeof fetch;
}

const telegramErrorSchema = z.object({ description: z.string() });

export class TelegramNotifier implements Notifier {
  private readonly botToken: string;
  private readonly apiBase: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TelegramNotifierOptions) {
    this.botToken = options.botToken;
    this.apiBase = options.apiBase ?? "https://api.telegram.org";
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async deliver(recipient: string, text: string): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.apiBase}/bot${this.botToken}/sendMessage`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json"
        },
        body: JSON.stringify({
          chat_id: recipient,
          text: truncateMessage(text),
          parse_mode: "HTML"
        })
      });

      if (!response.ok) {
        const parsed = telegramErrorSchema.safeParse(await response.json().catch(() => null));
        const description = parsed.success ? parsed.data.description : response.statusText;
        console.warn(`[ping-status] telegram sendMessage returned ${response.status}: ${description}`);
        return false;
      }

      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[ping-status] telegram sendMessage failed: ${message}`);
      return false;
    }
  }
}
