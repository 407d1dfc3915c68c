import { escapeHtml, Notifier, telegramMessageLimit } from "./notifier";

interface ReportTarget {
  notifier: Notifier;
  recipient: string;
}

const truncatedMarker = "\n… (truncated)";

// Escapes first, then cuts without splitting an entity.
export const formatPreBlock = (text: string, limit = telegramMessageLimit): string => {
  const escaped = escapeHtml(text);
  const room = limit - "<pre></pre>".length;
  if (escaped.length <= room) {
    return `<pre>${escaped}</pre>`;
  }

  const head = escaped.slice(0, room - truncatedMarker.length).replace(/&[a-z]*$/, "");
  return `<pre>${head}${truncatedMarker}</pre>`;
};

export class ErrorReporter {
  private target: ReportTarget | null = null;

  attach(notifier: Notifier, recipient: string): void {
    this.target = { notifier, recipient };
  }

  format(error: unknown, context: string): string {
    const lines = ["Ping Status — Error"];
    if (context) {
      lines.push(`Context: ${context}`);
    }

    if (error instanceof Error) {
      lines.push(`${error.name}: ${error.message}`);
      if (error.stack) {
        lines.push("", error.stack);
      }
    } else {
      lines.push(String(error));
    }

    return lines.join("\n").trim();
  }

  async report(error: unknown, context = ""): Promise<void> {
    const text = this.format(error, context);

    if (!this.target) {
      console.error(`[ping-status] ${text}`);
      return;
    }

    try {
      const delivered = await this.target.notifier.deliver(this.target.recipient, formatPreBlock(text));
      if (!delivered) {
        console.error(`[ping-status] ${text}`);
      }
    } catch (deliveryError) {
      const message = deliveryError instanceof Error ? deliveryError.message : String(deliveryError);
      console.error(`[ping-status] error report delivery failed: ${message}`);
      console.error(`[ping-status] ${text}`);
    }
  }
}
